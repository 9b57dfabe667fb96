import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InstallerConfig } from '../config';
import { InstallerError, PlatformReport, TargetPlatform } from '../installers/types';
import { RAPL_PATH_ENV, SUPPORTED_ARCHITECTURES, SUPPORTED_OS } from '../shared-constants';
import { Logger } from './logger';

/**
 * Facts about the host; swapped out in tests
 */
export interface SystemInfo {
  osType(): string;
  arch(): string;
  readTextFile(filePath: string): string | null;
  listDirectory(dirPath: string): string[] | null;
}

export const nodeSystemInfo: SystemInfo = {
  osType: () => os.type(),
  arch: () => os.arch(),
  readTextFile: (filePath) => {
    try {
      return fs.readFileSync(filePath, 'utf8');
    } catch {
      return null;
    }
  },
  listDirectory: (dirPath) => {
    try {
      return fs
        .readdirSync(dirPath, { withFileTypes: true })
        .filter(entry => entry.isDirectory() || entry.isSymbolicLink())
        .map(entry => entry.name);
    } catch {
      return null;
    }
  }
};

export function checkOperatingSystem(osType: string): 'Linux' {
  if (osType !== SUPPORTED_OS) {
    throw new InstallerError(`This installer only supports Linux (detected OS: ${osType})`, 'UnsupportedPlatform', [
      'joule-profiler reads Intel RAPL counters through the Linux powercap interface'
    ]);
  }
  return SUPPORTED_OS;
}

export function mapArchitecture(arch: string): TargetPlatform {
  const triple = SUPPORTED_ARCHITECTURES[arch];
  if (!triple) {
    throw new InstallerError(`Unsupported architecture: ${arch}`, 'UnsupportedPlatform', [
      'joule-profiler only supports x86_64 (Intel/AMD 64-bit)'
    ]);
  }
  return { operatingSystem: SUPPORTED_OS, architecture: 'x86_64', triple };
}

/**
 * `NAME VERSION_ID` from an os-release file, or null when neither is present
 */
export function parseOsRelease(content: string): string | null {
  const fields: Record<string, string> = {};
  for (const line of content.split('\n')) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match) {
      fields[match[1]] = match[2].trim().replace(/^["']|["']$/g, '');
    }
  }
  const parts = [fields.NAME, fields.VERSION_ID].filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join(' ') : null;
}

export function probePlatform(
  config: InstallerConfig,
  logger: Logger,
  system: SystemInfo = nodeSystemInfo
): PlatformReport {
  const osType = system.osType();
  logger.debug(`Detected OS: ${osType}`);
  checkOperatingSystem(osType);

  const rawArch = system.arch();
  logger.debug(`Detected architecture: ${rawArch}`);
  const platform = mapArchitecture(rawArch);
  logger.success(`Detected architecture: ${platform.triple}`);

  const osRelease = system.readTextFile('/etc/os-release');
  const distribution = osRelease === null ? null : parseOsRelease(osRelease);
  logger.debug(`Distribution: ${distribution ?? 'Unknown'}`);

  return { ...platform, distribution, rapl: checkRapl(config.raplPath, logger, system) };
}

/**
 * RAPL may be missing at install time and appear later, so this only warns
 */
export function checkRapl(raplPath: string, logger: Logger, system: SystemInfo): PlatformReport['rapl'] {
  logger.debug(`Checking for Intel RAPL support at ${raplPath}...`);
  const entries = system.listDirectory(raplPath);

  if (entries === null) {
    logger.warn(`Intel RAPL interface not found at ${raplPath}`);
    logger.warn('joule-profiler requires Intel RAPL support');
    logger.warn(`Set ${RAPL_PATH_ENV} if the interface lives elsewhere on this system`);
    logger.warn('Continuing installation, but the tool may not work on this system');
    return { present: false, path: raplPath, domainCount: 0 };
  }

  const base = path.basename(raplPath);
  const domainCount = entries.filter(name => name.startsWith(`${base}:`) || name.startsWith('intel-rapl:')).length;
  logger.success('Intel RAPL detected');
  logger.debug(`Found ${domainCount} RAPL domain(s)`);
  return { present: true, path: raplPath, domainCount };
}
