/**
 * Installer configuration
 *
 * Flags win over environment variables, which win over defaults. The result
 * is frozen and handed to every stage; nothing reads process.env after this.
 */

import * as path from 'path';
import { expandTilde } from './installers/utils';
import {
  BINARY_NAME,
  DEFAULT_INSTALL_DIR,
  DEFAULT_LIST_LIMIT,
  DEFAULT_RAPL_PATH,
  LATEST,
  RAPL_PATH_ENV,
  REPO
} from './shared-constants';

export interface InstallerConfig {
  readonly installDir: string;
  /** `latest` or an unvalidated explicit version */
  readonly versionRequest: string;
  readonly skipConfirm: boolean;
  readonly verbose: boolean;
  readonly searchPath: string;
  readonly repo: string;
  readonly binaryName: string;
  readonly raplPath: string;
  readonly listLimit: number;
  readonly interactive: boolean;
}

export interface CliOptions {
  dir?: string;
  version?: string;
  yes?: boolean;
  verbose?: boolean;
  limit?: string | number;
}

export type Environment = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const TRUE_VALUES = ['true', '1', 'yes', 'y', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'n', 'off', ''];

/**
 * Parse a boolean environment variable; unset means the fallback
 */
export function parseBooleanEnv(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  throw new ConfigError(`Invalid value for ${name}: "${value}" (expected true or false)`);
}

export function parseListLimit(value: string | number | undefined): number {
  if (value === undefined) {
    return DEFAULT_LIST_LIMIT;
  }
  const limit = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
    throw new ConfigError(`Invalid version count: ${value} (expected 1-100)`);
  }
  return limit;
}

export function resolveInstallDir(dir: string): string {
  if (dir.trim() === '') {
    throw new ConfigError('Installation directory must not be empty');
  }
  return path.resolve(expandTilde(dir.trim()));
}

export function resolveInstallerConfig(
  options: CliOptions = {},
  env: Environment = process.env,
  interactive: boolean = Boolean(process.stdin.isTTY)
): InstallerConfig {
  const skipConfirm = options.yes === true || parseBooleanEnv('SKIP_CONFIRM', env.SKIP_CONFIRM, false);
  const versionRequest = (options.version ?? env.TARGET_VERSION ?? LATEST).trim() || LATEST;

  const config: InstallerConfig = {
    installDir: resolveInstallDir(options.dir ?? env.INSTALL_DIR ?? DEFAULT_INSTALL_DIR),
    versionRequest,
    skipConfirm,
    verbose: options.verbose === true || parseBooleanEnv('VERBOSE', env.VERBOSE, false),
    searchPath: env.PATH ?? '',
    repo: REPO,
    binaryName: BINARY_NAME,
    raplPath: env[RAPL_PATH_ENV] || DEFAULT_RAPL_PATH,
    listLimit: parseListLimit(options.limit),
    interactive: interactive && !skipConfirm
  };

  return Object.freeze(config);
}

export function describeConfig(config: InstallerConfig): string[] {
  return [
    `Installation directory: ${config.installDir}`,
    `Target version: ${config.versionRequest}`,
    `Skip confirm: ${config.skipConfirm}`,
    `Verbose mode: ${config.verbose}`
  ];
}
