import { z } from 'zod';
import { InstallerError, ReleaseVersion } from '../installers/types';
import { LATEST, RELEASE_URLS } from '../shared-constants';
import { HttpClient, HttpResponse } from './http-client';
import { Logger } from './logger';

const VERSION_PATTERN = /^v(\d+)\.(\d+)\.(\d+)$/;

const releaseSchema = z.object({ tag_name: z.string().min(1) });
const releaseListSchema = z.array(releaseSchema);

export interface ResolverDeps {
  http: HttpClient;
  logger: Logger;
  repo: string;
}

export function isReleaseVersion(value: string): value is ReleaseVersion {
  return VERSION_PATTERN.test(value);
}

/**
 * Exact `vX.Y.Z`; no whitespace trimming, no missing `v`, no suffixes
 */
export function parseReleaseVersion(raw: string): ReleaseVersion {
  if (!isReleaseVersion(raw)) {
    throw new InstallerError(`Invalid version format: ${raw}`, 'VersionFormatInvalid', [
      'Version must be in format: vX.Y.Z (e.g., v0.1.0)'
    ]);
  }
  return raw;
}

function networkError(message: string, repo: string, cause?: Error): InstallerError {
  return new InstallerError(message, 'NetworkError', [
    'Please check your internet connection or try again later',
    `Releases: ${RELEASE_URLS.page(repo)}`
  ], cause);
}

export async function fetchLatestVersion({ http, logger, repo }: ResolverDeps): Promise<ReleaseVersion> {
  const url = RELEASE_URLS.latest(repo);
  logger.info('Fetching latest release...');
  logger.debug(`GitHub API: ${url}`);

  let response: HttpResponse<unknown>;
  try {
    response = await http.getJson(url);
  } catch (error) {
    throw networkError('Failed to fetch latest version', repo, error instanceof Error ? error : undefined);
  }

  if (response.status !== 200) {
    throw networkError(`Failed to fetch latest version (HTTP ${response.status})`, repo);
  }

  const parsed = releaseSchema.safeParse(response.data);
  if (!parsed.success) {
    throw networkError('Failed to fetch latest version: release index returned no tag', repo);
  }

  const tag = parsed.data.tag_name;
  if (!isReleaseVersion(tag)) {
    throw networkError(`Latest release has an unexpected tag: ${tag}`, repo);
  }
  logger.debug(`Latest version: ${tag}`);
  return tag;
}

export async function verifyVersionExists(version: ReleaseVersion, { http, logger, repo }: ResolverDeps): Promise<void> {
  const url = RELEASE_URLS.tag(repo, version);
  logger.debug(`Checking if version ${version} exists...`);

  let status: number;
  try {
    status = await http.getStatus(url);
  } catch (error) {
    throw networkError(`Could not check whether ${version} exists`, repo, error instanceof Error ? error : undefined);
  }

  if (status !== 200) {
    throw new InstallerError(`Version ${version} does not exist`, 'VersionNotFound', [
      'To see available versions:',
      '  joule-installer --list',
      `Or visit: ${RELEASE_URLS.page(repo)}`
    ]);
  }
  logger.debug(`Version ${version} exists`);
}

/**
 * Turns `latest` or an explicit tag into a release that exists upstream.
 * Format errors surface before any request is made.
 */
export async function resolveVersion(request: string, deps: ResolverDeps): Promise<ReleaseVersion> {
  if (request === LATEST) {
    return fetchLatestVersion(deps);
  }

  const version = parseReleaseVersion(request);
  deps.logger.info(`Installing specific version: ${version}`);
  await verifyVersionExists(version, deps);
  return version;
}

/**
 * Most recent tags in index order. Read-only.
 */
export async function listVersions(limit: number, { http, logger, repo }: ResolverDeps): Promise<string[]> {
  const url = RELEASE_URLS.list(repo, limit);
  logger.info('Fetching available versions...');
  logger.debug(`GitHub API: ${url}`);

  let response: HttpResponse<unknown>;
  try {
    response = await http.getJson(url);
  } catch (error) {
    throw networkError('Failed to fetch available versions', repo, error instanceof Error ? error : undefined);
  }

  const parsed = releaseListSchema.safeParse(response.data);
  if (response.status !== 200 || !parsed.success || parsed.data.length === 0) {
    throw networkError('Failed to fetch available versions', repo);
  }

  return parsed.data.slice(0, limit).map(release => release.tag_name);
}
