export type InstallerErrorKind =
  | 'UnsupportedPlatform'
  | 'VersionFormatInvalid'
  | 'VersionNotFound'
  | 'NetworkError'
  | 'DownloadFailed'
  | 'ChecksumMismatch'
  | 'ExtractionFailed'
  | 'PermissionDenied'
  | 'NotInstalled'
  | 'InstallationFailed';

export const EXIT_CODES = {
  SUCCESS: 0,
  USAGE: 1,
  UNSUPPORTED_PLATFORM: 2,
  RESOLUTION: 3,
  PERMISSION: 4,
  INTEGRITY: 5,
  INSTALLATION: 6,
  NOT_INSTALLED: 7
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class InstallerError extends Error {
  constructor(
    message: string,
    public readonly kind: InstallerErrorKind,
    public readonly hints: string[] = [],
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'InstallerError';
  }
}

export function isInstallerError(error: unknown, kind?: InstallerErrorKind): error is InstallerError {
  return error instanceof InstallerError && (kind === undefined || error.kind === kind);
}

export function exitCodeFor(kind: InstallerErrorKind): ExitCode {
  switch (kind) {
    case 'UnsupportedPlatform':
      return EXIT_CODES.UNSUPPORTED_PLATFORM;
    case 'VersionFormatInvalid':
    case 'VersionNotFound':
    case 'NetworkError':
    case 'DownloadFailed':
      return EXIT_CODES.RESOLUTION;
    case 'PermissionDenied':
      return EXIT_CODES.PERMISSION;
    case 'ChecksumMismatch':
    case 'ExtractionFailed':
      return EXIT_CODES.INTEGRITY;
    case 'InstallationFailed':
      return EXIT_CODES.INSTALLATION;
    case 'NotInstalled':
      return EXIT_CODES.NOT_INSTALLED;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** `vMAJOR.MINOR.PATCH`, only produced by parseReleaseVersion */
export type ReleaseVersion = string & { readonly __brand: 'ReleaseVersion' };

export interface TargetPlatform {
  operatingSystem: 'Linux';
  architecture: string;
  triple: string;
}

export interface PlatformReport extends TargetPlatform {
  distribution: string | null;
  rapl: { present: boolean; path: string; domainCount: number };
}

export interface ArtifactBundle {
  version: ReleaseVersion;
  archiveName: string;
  manifestName: string;
  archiveUrl: string;
  manifestUrl: string;
  archivePath: string;
  manifestPath: string;
}

export interface InstallationTarget {
  directory: string;
  binaryName: string;
  binaryPath: string;
}

export interface ExistingInstallation {
  path: string;
  reportedVersion: string;
}

export type InstallOutcome =
  | { status: 'installed'; version: ReleaseVersion; path: string; reportedVersion: string }
  | { status: 'declined' };

export type UninstallOutcome =
  | { status: 'removed'; path: string }
  | { status: 'declined'; path: string };
