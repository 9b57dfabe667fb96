import * as fs from 'fs';
import * as path from 'path';
import { findOnPath, queryInstalledVersion } from '../lib/path-search';
import { BaseInstaller } from './base-installer';
import { InstallerError, toError } from './types';
import { isOnSearchPath, shellProfileFor } from './utils';

export type ExistingDecision = 'none' | 'overwrite' | 'declined';

export class BinaryInstaller extends BaseInstaller {
  /**
   * Must run before anything is created: an empty directory left behind by a
   * declined run would confuse the next detection
   */
  async checkExisting(): Promise<ExistingDecision> {
    const { config, logger } = this.context;
    const existing = await this.locateExisting();
    if (!existing) {
      return 'none';
    }

    logger.warn(`${config.binaryName} is already installed`);
    logger.info(`  Version: ${existing.reportedVersion}`);
    logger.info(`  Location: ${existing.path}`);

    const overwrite = await this.confirm('Do you want to overwrite it?', 'Overwriting (--yes flag enabled)');
    return overwrite ? 'overwrite' : 'declined';
  }

  /**
   * Place the extracted binary at <installDir>/<binaryName> with mode 0755
   */
  async install(extractedBinary: string): Promise<string> {
    const { logger, broker } = this.context;
    const { directory, binaryPath, binaryName } = this.target;

    const existing = await fs.promises.stat(directory).catch(() => null);
    if (existing && !existing.isDirectory()) {
      throw new InstallerError(`Installation failed: ${directory} is not a directory`, 'InstallationFailed', [
        'Choose a directory with --dir, for example --dir ~/.local/bin'
      ]);
    }

    if (!existing) {
      logger.info(`Creating directory ${directory}...`);
      try {
        await broker.mutate(directory, 'create directory', mutator => mutator.makeDirectory(directory));
      } catch (error) {
        throw this.failure(error, `Installation failed: could not create ${directory}`, directory);
      }
    }

    logger.info(`Installing to ${directory}...`);
    try {
      await broker.mutate(directory, 'install binary', mutator => mutator.placeFile(extractedBinary, binaryPath));
    } catch (error) {
      throw this.failure(error, `Installation failed: could not write ${binaryPath}`, directory);
    }
    logger.success(`Installed ${binaryName} to ${directory}`);
    return binaryPath;
  }

  /**
   * The placed file must resolve on PATH and answer --version itself; a copy
   * earlier on PATH only earns a warning
   */
  async verify(shell: string | undefined = process.env.SHELL): Promise<string> {
    const { config, logger } = this.context;
    const { directory, binaryPath, binaryName } = this.target;

    const resolved = await findOnPath(binaryName, config.searchPath);
    if (!resolved) {
      throw new InstallerError(`Installation failed: ${binaryName} not found in PATH`, 'InstallationFailed', [
        `Make sure ${directory} is in your PATH`,
        ...pathSetupLines(directory, shell)
      ]);
    }
    if (path.resolve(resolved) !== path.resolve(binaryPath)) {
      logger.warn(`${resolved} comes before ${binaryPath} on your PATH`);
      logger.info('Remove the other copy or reorder PATH to use the new installation');
    }

    let version: string;
    try {
      version = await queryInstalledVersion(binaryPath);
    } catch (error) {
      throw new InstallerError(`Installation failed: ${binaryPath} --version did not succeed`, 'InstallationFailed', [
        'The binary may not be compatible with this system'
      ], toError(error));
    }

    logger.success(`Verified installation: ${binaryName} ${version}`);
    return version;
  }

  checkPath(shell: string | undefined = process.env.SHELL): void {
    const { config, logger } = this.context;
    if (isOnSearchPath(config.installDir, config.searchPath)) {
      return;
    }
    logger.warn(`${config.installDir} is not in your PATH`);
    for (const line of pathSetupLines(config.installDir, shell)) {
      logger.info(line);
    }
  }

  printUsage(): void {
    const { logger, config } = this.context;
    const name = config.binaryName;
    logger.success('Installation complete!');
    logger.info(`To get started with ${name}:`);
    logger.info(`  sudo ${name} list-domains                    # list available RAPL domains`);
    logger.info(`  sudo ${name} simple -- <your-command>        # measure energy consumption`);
    logger.info(`  sudo ${name} phases -- <your-command>        # measure with phase detection`);
    logger.info(`  sudo ${name} simple --json -- <your-command> # export to JSON`);
    logger.info(`  ${name} --help`);
  }
}

function pathSetupLines(directory: string, shell: string | undefined): string[] {
  const profile = shellProfileFor(shell);
  return [
    'Add it to your PATH by adding this line to your shell profile:',
    `  echo 'export PATH="${directory}:$PATH"' >> ${profile}`,
    `  source ${profile}`
  ];
}
