import * as path from 'path';
import { BaseInstaller } from './base-installer';
import { InstallerError, UninstallOutcome } from './types';

export class BinaryUninstaller extends BaseInstaller {
  async uninstall(): Promise<UninstallOutcome> {
    const { config, logger, broker } = this.context;
    const name = config.binaryName;

    const existing = await this.locateExisting();
    if (!existing) {
      throw new InstallerError(`${name} is not installed`, 'NotInstalled', [
        `Looked in ${config.installDir} and on your PATH`
      ]);
    }

    if (!existing.canonical) {
      logger.warn(`${name} found at ${existing.path} (not in ${config.installDir})`);
      logger.info(`This will remove ${existing.path}`);
    }
    logger.info(`Found ${name} at ${existing.path}`);
    logger.info(`Version: ${existing.reportedVersion}`);

    const proceed = await this.confirm(`Do you want to uninstall ${name}?`, 'Removing (--yes flag enabled)');
    if (!proceed) {
      logger.info('Uninstallation cancelled');
      return { status: 'declined', path: existing.path };
    }

    logger.info(`Removing ${name}...`);
    const dir = path.dirname(existing.path);
    try {
      await broker.mutate(dir, 'remove binary', mutator => mutator.removeFile(existing.path));
    } catch (error) {
      throw this.failure(error, `Uninstallation failed: could not remove ${existing.path}`, dir);
    }
    logger.success(`${name} has been uninstalled`);
    return { status: 'removed', path: existing.path };
  }
}
