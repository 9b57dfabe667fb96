import { InstallerConfig, describeConfig } from '../config';
import { fetchArtifact, withWorkspace } from '../lib/artifact-fetcher';
import { HttpClient } from '../lib/http-client';
import { Logger } from '../lib/logger';
import { SystemInfo, nodeSystemInfo, probePlatform } from '../lib/platform-probe';
import { PrivilegeBroker, detectEscalation } from '../lib/privilege';
import { AssumeYesPrompt, ConfirmPrompt, InquirerConfirmPrompt } from '../lib/prompt';
import { listVersions, parseReleaseVersion, resolveVersion } from '../lib/release-resolver';
import { LATEST } from '../shared-constants';
import { InstallerContext } from './base-installer';
import { BinaryInstaller } from './binary-installer';
import { BinaryUninstaller } from './binary-uninstaller';
import { InstallOutcome, UninstallOutcome } from './types';

export interface PipelineDeps extends InstallerContext {
  http: HttpClient;
  system?: SystemInfo;
  shell?: string;
}

/**
 * Real collaborators for a CLI run
 */
export async function createInstallerContext(config: InstallerConfig, logger: Logger): Promise<InstallerContext> {
  const escalated = await detectEscalation(config.searchPath, config.interactive, logger);
  return {
    config,
    logger,
    broker: new PrivilegeBroker({ escalated, logger }),
    prompt: config.skipConfirm ? new AssumeYesPrompt() : new InquirerConfirmPrompt()
  };
}

/**
 * probe → existing install → resolve → fetch + verify → place → verify.
 * Each stage throws InstallerError and nothing after it runs; the workspace
 * is gone before the error leaves this function.
 */
export async function runInstall(deps: PipelineDeps): Promise<InstallOutcome> {
  const { config, logger, http } = deps;
  for (const line of describeConfig(config)) {
    logger.debug(line);
  }

  const platform = probePlatform(config, logger, deps.system ?? nodeSystemInfo);

  // Reject a malformed pin before asking the user anything
  if (config.versionRequest !== LATEST) {
    parseReleaseVersion(config.versionRequest);
  }

  const installer = new BinaryInstaller(deps);
  if ((await installer.checkExisting()) === 'declined') {
    logger.info('Installation cancelled');
    return { status: 'declined' };
  }

  const resolverDeps = { http, logger, repo: config.repo };
  const version = await resolveVersion(config.versionRequest, resolverDeps);
  logger.success(`Target version: ${version}`);

  const installedPath = await withWorkspace(async workDir => {
    const binary = await fetchArtifact(version, platform, workDir, {
      ...resolverDeps,
      binaryName: config.binaryName
    });
    return installer.install(binary);
  }, logger);

  const reportedVersion = await installer.verify(deps.shell);
  installer.checkPath(deps.shell);
  installer.printUsage();

  return { status: 'installed', version, path: installedPath, reportedVersion };
}

export async function runUninstall(context: InstallerContext): Promise<UninstallOutcome> {
  return new BinaryUninstaller(context).uninstall();
}

export async function runList(config: InstallerConfig, logger: Logger, http: HttpClient): Promise<string[]> {
  return listVersions(config.listLimit, { http, logger, repo: config.repo });
}
