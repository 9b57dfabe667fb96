import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import which from 'which';
import { InstallerError, toError } from '../installers/types';
import { Logger } from './logger';

export const BINARY_MODE = 0o755;

/**
 * Every filesystem change the installer makes goes through one of these.
 * The pipeline never knows whether it holds the direct or the sudo one.
 */
export interface FilesystemMutator {
  readonly kind: 'direct' | 'escalated';
  probeWritable(targetPath: string): Promise<boolean>;
  makeDirectory(dir: string): Promise<void>;
  /** Copy src to destPath with BINARY_MODE so readers see the old file or the whole new one */
  placeFile(src: string, destPath: string): Promise<void>;
  removeFile(filePath: string): Promise<void>;
}

export function tempPathFor(destPath: string): string {
  return path.join(path.dirname(destPath), `.${path.basename(destPath)}.${process.pid}.tmp`);
}

/**
 * Walk up until something exists; that is what decides whether mkdir -p can succeed
 */
export async function nearestExistingPath(targetPath: string): Promise<string> {
  let current = path.resolve(targetPath);
  for (;;) {
    try {
      await fs.promises.stat(current);
      return current;
    } catch {
      const parent = path.dirname(current);
      if (parent === current) return current;
      current = parent;
    }
  }
}

export function isPermissionError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  const { code } = error;
  return code === 'EACCES' || code === 'EPERM' || code === 'EROFS';
}

export class DirectMutator implements FilesystemMutator {
  readonly kind = 'direct';

  async probeWritable(targetPath: string): Promise<boolean> {
    try {
      await fs.promises.access(await nearestExistingPath(targetPath), fs.constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  async makeDirectory(dir: string): Promise<void> {
    await fs.promises.mkdir(dir, { recursive: true });
  }

  async placeFile(src: string, destPath: string): Promise<void> {
    const tempPath = tempPathFor(destPath);
    try {
      await fs.promises.copyFile(src, tempPath);
      await fs.promises.chmod(tempPath, BINARY_MODE);
      await fs.promises.rename(tempPath, destPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
  }

  async removeFile(filePath: string): Promise<void> {
    await fs.promises.unlink(filePath);
  }
}

export type CommandRunner = (args: string[]) => Promise<void>;

/**
 * Runs `sudo <args>`. Non-interactive runs pass -n so sudo fails instead of
 * waiting for a password nobody will type.
 */
export function createSudoRunner(sudoPath: string, interactive: boolean): CommandRunner {
  return (args) =>
    new Promise((resolve, reject) => {
      const sudoArgs = interactive ? args : ['-n', ...args];
      const child = spawn(sudoPath, sudoArgs, {
        stdio: interactive ? 'inherit' : ['ignore', 'ignore', 'pipe']
      });

      let stderr = '';
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('error', reject);
      child.on('close', (code) => {
        if (code === 0) {
          resolve();
        } else {
          const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
          reject(new Error(`sudo ${args.join(' ')} exited with code ${code}${detail}`));
        }
      });
    });
}

export class EscalatedMutator implements FilesystemMutator {
  readonly kind = 'escalated';

  constructor(
    private readonly run: CommandRunner,
    private readonly logger: Logger
  ) {}

  async probeWritable(): Promise<boolean> {
    return true;
  }

  async makeDirectory(dir: string): Promise<void> {
    await this.run(['mkdir', '-p', dir]);
  }

  async placeFile(src: string, destPath: string): Promise<void> {
    const tempPath = tempPathFor(destPath);
    try {
      await this.run(['install', '-m', BINARY_MODE.toString(8), src, tempPath]);
      await this.run(['mv', '-f', tempPath, destPath]);
    } catch (error) {
      await this.run(['rm', '-f', tempPath]).catch((cleanupError: unknown) => {
        this.logger.warn(`Could not remove ${tempPath}: ${toError(cleanupError).message}`);
      });
      throw error;
    }
  }

  async removeFile(filePath: string): Promise<void> {
    await this.run(['rm', '-f', filePath]);
  }
}

/**
 * sudo is only offered to non-root users who have it on their search path
 */
export async function detectEscalation(
  searchPath: string,
  interactive: boolean,
  logger: Logger
): Promise<EscalatedMutator | null> {
  if (typeof process.getuid === 'function' && process.getuid() === 0) {
    return null;
  }
  if (searchPath === '') {
    return null;
  }
  const sudoPath = await which('sudo', { path: searchPath, nothrow: true });
  if (!sudoPath) {
    return null;
  }
  logger.debug(`Privilege escalation available via ${sudoPath}`);
  return new EscalatedMutator(createSudoRunner(sudoPath, interactive), logger);
}

export interface PrivilegeBrokerOptions {
  direct?: FilesystemMutator;
  escalated: FilesystemMutator | null;
  logger: Logger;
}

export class PrivilegeBroker {
  private readonly direct: FilesystemMutator;
  private readonly escalated: FilesystemMutator | null;
  private readonly logger: Logger;

  constructor(options: PrivilegeBrokerOptions) {
    this.direct = options.direct ?? new DirectMutator();
    this.escalated = options.escalated;
    this.logger = options.logger;
  }

  get canEscalate(): boolean {
    return this.escalated !== null;
  }

  /**
   * Probe targetPath, then run op with the direct mutator when it is
   * writable. Otherwise (or when the direct attempt hits a permission error)
   * fall back to the escalated mutator, or fail with PermissionDenied.
   */
  async mutate<T>(targetPath: string, action: string, op: (mutator: FilesystemMutator) => Promise<T>): Promise<T> {
    if (await this.direct.probeWritable(targetPath)) {
      this.logger.debug(`${action}: ${targetPath} is writable, no sudo needed`);
      try {
        return await op(this.direct);
      } catch (error) {
        if (!isPermissionError(error)) throw error;
        this.logger.debug(`${action}: direct attempt failed (${toError(error).message})`);
      }
    }
    return this.escalate(targetPath, action, op);
  }

  private async escalate<T>(targetPath: string, action: string, op: (mutator: FilesystemMutator) => Promise<T>): Promise<T> {
    if (!this.escalated) {
      throw new InstallerError(`Permission denied: cannot ${action} in ${targetPath}`, 'PermissionDenied', [
        'sudo is required to modify this location',
        'Please run as root, install sudo, or choose a writable directory with --dir ~/.local/bin'
      ]);
    }

    this.logger.debug(`${action}: using sudo for ${targetPath}`);
    try {
      return await op(this.escalated);
    } catch (error) {
      throw new InstallerError(`Permission denied: sudo could not ${action} in ${targetPath}`, 'PermissionDenied', [
        'Check that your account may use sudo, or choose a writable directory with --dir ~/.local/bin'
      ], toError(error));
    }
  }
}
