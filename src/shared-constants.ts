/**
 * Shared constants between the installer and the uninstaller
 * NEVER duplicate these strings - always import from here
 */

// GitHub repository publishing the releases
export const REPO = 'jwoirhaye/joule-profiler';

// Name of the binary inside the archive and on disk
export const BINARY_NAME = 'joule-profiler';

export const DEFAULT_INSTALL_DIR = '/usr/local/bin';

export const LATEST = 'latest';

// How many tags `--list` shows
export const DEFAULT_LIST_LIMIT = 10;

// Where the profiler reads RAPL counters unless overridden
export const DEFAULT_RAPL_PATH = '/sys/class/powercap/intel-rapl';
export const RAPL_PATH_ENV = 'JOULE_PROFILER_RAPL_PATH';

export const GITHUB_API = 'https://api.github.com';
export const GITHUB_WEB = 'https://github.com';

export const RELEASE_URLS = {
  latest: (repo: string) => `${GITHUB_API}/repos/${repo}/releases/latest`,
  list: (repo: string, limit: number) => `${GITHUB_API}/repos/${repo}/releases?per_page=${limit}`,
  tag: (repo: string, version: string) => `${GITHUB_WEB}/${repo}/releases/tag/${version}`,
  page: (repo: string) => `${GITHUB_WEB}/${repo}/releases`,
  asset: (repo: string, version: string, name: string) =>
    `${GITHUB_WEB}/${repo}/releases/download/${version}/${name}`
} as const;

// Architectures the release pipeline builds for, keyed by what uname/Node report
export const SUPPORTED_ARCHITECTURES: Readonly<Record<string, string>> = {
  x86_64: 'x86_64-unknown-linux-gnu',
  amd64: 'x86_64-unknown-linux-gnu',
  x64: 'x86_64-unknown-linux-gnu'
};

export const SUPPORTED_OS = 'Linux';

export const USER_AGENT = 'joule-installer/0.1';

// Timeouts (milliseconds)
export const TIMEOUTS = {
  INDEX_REQUEST_MS: 15000,
  DOWNLOAD_MS: 120000,
  VERSION_QUERY_MS: 5000
} as const;
