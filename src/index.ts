// Main entry point for the joule-installer library
export * from './config';
export * from './installers/types';
export * from './installers/install-pipeline';
export { BinaryInstaller } from './installers/binary-installer';
export { BinaryUninstaller } from './installers/binary-uninstaller';
export type { InstallerContext } from './installers/base-installer';
export * from './lib/artifact-fetcher';
export * from './lib/checksum';
export * from './lib/http-client';
export * from './lib/logger';
export * from './lib/path-search';
export * from './lib/platform-probe';
export * from './lib/privilege';
export * from './lib/prompt';
export * from './lib/release-resolver';
export * from './shared-constants';
