import { execFile } from 'child_process';
import { promisify } from 'util';
import which from 'which';
import { InstallerError, toError } from '../installers/types';
import { splitSearchPath } from '../installers/utils';
import { TIMEOUTS } from '../shared-constants';
import { Logger } from './logger';

const execFileAsync = promisify(execFile);

// `joule-profiler 0.1.0` as printed by --version; a leading v is tolerated
const REPORTED_VERSION = /^(\S+)\s+v?(\d+\.\d+\.\d+)$/;

export const UNKNOWN_VERSION = 'unknown';

/**
 * Resolve a bare command name against searchPath; null when absent
 */
export async function findOnPath(command: string, searchPath: string): Promise<string | null> {
  if (splitSearchPath(searchPath).length === 0) {
    return null;
  }
  return which(command, { path: searchPath, nothrow: true });
}

/**
 * Strict: the first line of --version output must be `<name> <X.Y.Z>`
 */
export function parseReportedVersion(output: string): string {
  const firstLine = output.trim().split('\n')[0]?.trim() ?? '';
  const match = firstLine.match(REPORTED_VERSION);
  if (!match) {
    throw new InstallerError(`Unrecognized version output: "${firstLine}"`, 'VersionFormatInvalid');
  }
  return match[2];
}

export async function queryInstalledVersion(binaryPath: string): Promise<string> {
  const { stdout } = await execFileAsync(binaryPath, ['--version'], {
    timeout: TIMEOUTS.VERSION_QUERY_MS,
    encoding: 'utf8'
  });
  return parseReportedVersion(stdout);
}

/**
 * For display only: a binary that cannot report its version shows as unknown
 */
export async function describeInstalledVersion(binaryPath: string, logger: Logger): Promise<string> {
  try {
    return await queryInstalledVersion(binaryPath);
  } catch (error) {
    logger.debug(`Version query for ${binaryPath} failed: ${toError(error).message}`);
    return UNKNOWN_VERSION;
  }
}
