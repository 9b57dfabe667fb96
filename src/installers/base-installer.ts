import * as fs from 'fs';
import * as path from 'path';
import { InstallerConfig } from '../config';
import { Logger } from '../lib/logger';
import { describeInstalledVersion, findOnPath } from '../lib/path-search';
import { PrivilegeBroker } from '../lib/privilege';
import { ConfirmPrompt } from '../lib/prompt';
import { ExistingInstallation, InstallationTarget, InstallerError, toError } from './types';

export interface InstallerContext {
  config: InstallerConfig;
  logger: Logger;
  broker: PrivilegeBroker;
  prompt: ConfirmPrompt;
}

export interface LocatedInstallation extends ExistingInstallation {
  /** true when found at <installDir>/<binaryName> rather than elsewhere on PATH */
  canonical: boolean;
}

export abstract class BaseInstaller {
  constructor(protected readonly context: InstallerContext) {}

  get target(): InstallationTarget {
    const { installDir, binaryName } = this.context.config;
    return {
      directory: installDir,
      binaryName,
      binaryPath: path.join(installDir, binaryName)
    };
  }

  /**
   * Canonical location first, then the search path
   */
  protected async locateExisting(): Promise<LocatedInstallation | null> {
    const { config, logger } = this.context;
    const { binaryPath } = this.target;

    let found: string | null = null;
    let canonical = false;
    if (await isRegularFile(binaryPath)) {
      found = binaryPath;
      canonical = true;
    } else {
      found = await findOnPath(config.binaryName, config.searchPath);
    }

    if (!found) {
      return null;
    }

    logger.debug(`Found ${config.binaryName} at ${found}`);
    return {
      path: found,
      reportedVersion: await describeInstalledVersion(found, logger),
      canonical
    };
  }

  /**
   * --yes answers for the user; otherwise only an explicit yes proceeds
   */
  protected async confirm(question: string, skippedNote: string): Promise<boolean> {
    const { config, logger, prompt } = this.context;
    if (config.skipConfirm) {
      logger.info(skippedNote);
      return true;
    }
    return prompt.confirm(question);
  }

  /**
   * Filesystem errors other than permission problems (EISDIR, ENOSPC, ...)
   * become InstallationFailed; InstallerErrors pass through unchanged
   */
  protected failure(error: unknown, message: string, directory: string): InstallerError {
    if (error instanceof InstallerError) {
      return error;
    }
    const cause = toError(error);
    return new InstallerError(message, 'InstallationFailed', [
      `Reason: ${cause.message}`,
      `Check that ${directory} is a directory with free space, or choose another one with --dir`
    ], cause);
  }
}

export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
