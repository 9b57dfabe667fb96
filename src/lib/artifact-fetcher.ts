import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as tar from 'tar';
import { ArtifactBundle, InstallerError, ReleaseVersion, TargetPlatform, toError } from '../installers/types';
import { formatBytes } from '../installers/utils';
import { RELEASE_URLS } from '../shared-constants';
import { verifyChecksum } from './checksum';
import { HttpClient } from './http-client';
import { Logger } from './logger';

export interface FetcherDeps {
  http: HttpClient;
  logger: Logger;
  repo: string;
  binaryName: string;
}

const CLEANUP_SIGNALS: Array<{ signal: NodeJS.Signals; code: number }> = [
  { signal: 'SIGINT', code: 130 },
  { signal: 'SIGTERM', code: 143 },
  { signal: 'SIGHUP', code: 129 }
];

const WORKSPACE_PREFIX = 'joule-installer-';

/**
 * Runs fn with a fresh temp directory and removes it afterwards, including
 * when the process is interrupted by a signal
 */
export async function withWorkspace<T>(fn: (workDir: string) => Promise<T>, logger?: Logger): Promise<T> {
  const workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), WORKSPACE_PREFIX));
  logger?.debug(`Temporary directory: ${workDir}`);

  const handlers = CLEANUP_SIGNALS.map(({ signal, code }) => {
    const handler = () => {
      fs.rmSync(workDir, { recursive: true, force: true });
      process.exit(code);
    };
    process.once(signal, handler);
    return { signal, handler };
  });

  try {
    return await fn(workDir);
  } finally {
    for (const { signal, handler } of handlers) {
      process.removeListener(signal, handler);
    }
    await fs.promises.rm(workDir, { recursive: true, force: true });
    logger?.debug(`Removed temporary directory: ${workDir}`);
  }
}

export function archiveNameFor(binaryName: string, version: ReleaseVersion, platform: TargetPlatform): string {
  return `${binaryName}-${version}-${platform.triple}.tar.gz`;
}

export function describeBundle(
  version: ReleaseVersion,
  platform: TargetPlatform,
  workDir: string,
  { repo, binaryName }: Pick<FetcherDeps, 'repo' | 'binaryName'>
): ArtifactBundle {
  const archiveName = archiveNameFor(binaryName, version, platform);
  const manifestName = `${archiveName}.sha256`;
  return {
    version,
    archiveName,
    manifestName,
    archiveUrl: RELEASE_URLS.asset(repo, version, archiveName),
    manifestUrl: RELEASE_URLS.asset(repo, version, manifestName),
    archivePath: path.join(workDir, archiveName),
    manifestPath: path.join(workDir, manifestName)
  };
}

async function download(url: string, destPath: string, http: HttpClient): Promise<number> {
  try {
    return await http.download(url, destPath);
  } catch (error) {
    throw new InstallerError(`Network error while downloading ${path.basename(destPath)}`, 'NetworkError', [
      'Please check your internet connection or try again later'
    ], toError(error));
  }
}

async function downloadArchive(bundle: ArtifactBundle, { http, logger, repo }: FetcherDeps): Promise<void> {
  logger.debug(`Download URL: ${bundle.archiveUrl}`);
  const status = await download(bundle.archiveUrl, bundle.archivePath, http);

  if (status === 404) {
    throw new InstallerError(`Release asset not found: ${bundle.archiveName} (HTTP 404)`, 'DownloadFailed', [
      `Release ${bundle.version} has no build for this platform`,
      `Available releases: ${RELEASE_URLS.page(repo)}`,
      "Or use 'latest' to install the most recent version"
    ]);
  }
  if (status !== 200) {
    throw new InstallerError(`Failed to download binary (HTTP ${status})`, 'DownloadFailed', [
      `URL: ${bundle.archiveUrl}`,
      'Try again later'
    ]);
  }
}

async function downloadManifest(bundle: ArtifactBundle, { http, logger }: FetcherDeps): Promise<string> {
  logger.debug(`Checksum URL: ${bundle.manifestUrl}`);
  const status = await download(bundle.manifestUrl, bundle.manifestPath, http);

  if (status !== 200) {
    throw new InstallerError(`Failed to download checksum (HTTP ${status})`, 'DownloadFailed', [
      `Checksum file not found for release ${bundle.version}`,
      'This release may be incomplete or corrupted'
    ]);
  }
  return fs.promises.readFile(bundle.manifestPath, 'utf8');
}

export async function extractBinary(archivePath: string, destDir: string, binaryName: string): Promise<string> {
  await fs.promises.mkdir(destDir, { recursive: true });
  try {
    await tar.x({ file: archivePath, cwd: destDir, strict: true });
  } catch (error) {
    throw new InstallerError('Failed to extract archive', 'ExtractionFailed', [
      'The archive may be corrupt; try the download again'
    ], toError(error));
  }

  const binaryPath = path.join(destDir, binaryName);
  const stats = await fs.promises.lstat(binaryPath).catch(() => null);
  if (!stats || !stats.isFile()) {
    throw new InstallerError(`Binary not found after extraction: ${binaryName}`, 'ExtractionFailed', [
      'The archive has an unexpected layout'
    ]);
  }
  return binaryPath;
}

/**
 * Download, verify and unpack one release into workDir. Returns the path of
 * the extracted binary, which is only trustworthy because the archive
 * matched its manifest.
 */
export async function fetchArtifact(
  version: ReleaseVersion,
  platform: TargetPlatform,
  workDir: string,
  deps: FetcherDeps
): Promise<string> {
  const { logger } = deps;
  const bundle = describeBundle(version, platform, workDir, deps);
  logger.debug(`Tarball: ${bundle.archiveName}`);

  logger.info(`Downloading ${deps.binaryName} ${version}...`);
  await downloadArchive(bundle, deps);

  logger.info('Downloading checksum...');
  const manifest = await downloadManifest(bundle, deps);

  logger.info('Verifying checksum...');
  await verifyChecksum(bundle.archivePath, bundle.archiveName, manifest);
  logger.success('Checksum verified');

  logger.info('Extracting archive...');
  const binaryPath = await extractBinary(bundle.archivePath, path.join(workDir, 'extract'), deps.binaryName);
  const { size } = await fs.promises.stat(binaryPath);
  logger.debug(`Binary found: ${binaryPath} (${formatBytes(size)})`);
  return binaryPath;
}
