import * as path from 'path';
import * as os from 'os';

/**
 * Expand tilde (~) to home directory in file paths
 */
export function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/') || filePath === '~') {
    return path.join(os.homedir(), filePath.slice(1));
  }
  return filePath;
}

/**
 * Split a PATH-style string into absolute, de-duplicated entries
 */
export function splitSearchPath(searchPath: string): string[] {
  const seen = new Set<string>();
  for (const entry of searchPath.split(path.delimiter)) {
    if (entry === '') continue;
    seen.add(path.resolve(entry));
  }
  return [...seen];
}

export function isOnSearchPath(directory: string, searchPath: string): boolean {
  return splitSearchPath(searchPath).includes(path.resolve(directory));
}

/**
 * Profile file a user of the given login shell would edit to extend PATH
 */
export function shellProfileFor(shell: string | undefined): string {
  const name = shell ? path.basename(shell) : '';
  if (name === 'bash') return '~/.bashrc';
  if (name === 'zsh') return '~/.zshrc';
  return '~/.profile';
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ['KB', 'MB', 'GB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}
