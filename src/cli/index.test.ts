import * as fs from 'fs';
import * as path from 'path';
import { CliDeps, main, readPackageVersion, reportFailure } from './index';
import { ConfigError } from '../config';
import { InstallerError } from '../installers/types';
import { MemoryLogger } from '../lib/logger';
import { PrivilegeBroker } from '../lib/privilege';
import { AssumeYesPrompt } from '../lib/prompt';
import { RELEASE_URLS, REPO } from '../shared-constants';
import {
  FakeHttpClient,
  TEST_INSTALL_DIR,
  TEST_TEMP_DIR,
  fakeSystem,
  publishRelease,
  writeFakeBinary
} from '../test-setup';

describe('CLI', () => {
  let http: FakeHttpClient;
  let logger: MemoryLogger;
  let printed: string[];
  let osType: string;

  const deps = (env: Record<string, string> = {}): CliDeps => ({
    env: { PATH: TEST_INSTALL_DIR, SHELL: '/bin/bash', ...env },
    interactive: false,
    http,
    system: fakeSystem({ osType: () => osType }),
    createLogger: () => logger,
    createContext: async (config, contextLogger) => ({
      config,
      logger: contextLogger,
      broker: new PrivilegeBroker({ escalated: null, logger: contextLogger }),
      prompt: new AssumeYesPrompt()
    }),
    print: (line) => printed.push(line)
  });

  const run = (args: string[], env?: Record<string, string>) =>
    main(['node', 'joule-installer', ...args], deps(env));

  beforeEach(() => {
    http = new FakeHttpClient();
    logger = new MemoryLogger();
    printed = [];
    osType = 'Linux';
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  describe('install', () => {
    it('should install into --dir and exit 0', async () => {
      await publishRelease(http);

      await expect(run(['-y', '-d', TEST_INSTALL_DIR])).resolves.toBe(0);
      expect(fs.existsSync(path.join(TEST_INSTALL_DIR, 'joule-profiler'))).toBe(true);
    });

    it('should read INSTALL_DIR and TARGET_VERSION from the environment', async () => {
      const release = await publishRelease(http, 'v0.1.0');

      await expect(run([], { INSTALL_DIR: TEST_INSTALL_DIR, TARGET_VERSION: 'v0.1.0', SKIP_CONFIRM: '1' })).resolves.toBe(0);
      expect(http.requests).toEqual([RELEASE_URLS.tag(REPO, 'v0.1.0'), release.archiveUrl, release.manifestUrl]);
    });

    it('should exit 3 for a malformed version', async () => {
      await expect(run(['-y', '-d', TEST_INSTALL_DIR, '--version', '1.2'])).resolves.toBe(3);
      expect(logger.messages('error')).toEqual(['Invalid version format: 1.2']);
      expect(logger.messages('info')).toEqual(['Version must be in format: vX.Y.Z (e.g., v0.1.0)']);
    });

    it('should exit 2 on an unsupported platform', async () => {
      osType = 'Darwin';
      await expect(run(['-y', '-d', TEST_INSTALL_DIR])).resolves.toBe(2);
    });

    it('should exit 5 on a checksum mismatch', async () => {
      const release = await publishRelease(http);
      http.serveFile(release.manifestUrl, `${'a'.repeat(64)}  ${release.archiveName}\n`);

      await expect(run(['-y', '-d', TEST_INSTALL_DIR])).resolves.toBe(5);
    });

    it('should accept an explicit install command', async () => {
      await publishRelease(http);

      await expect(run(['install', '-y', '-d', TEST_INSTALL_DIR])).resolves.toBe(0);
      expect(fs.existsSync(path.join(TEST_INSTALL_DIR, 'joule-profiler'))).toBe(true);
    });

    it('should exit 6 when --dir is a file', async () => {
      const notADir = path.join(TEST_TEMP_DIR, 'not-a-dir');
      fs.writeFileSync(notADir, 'notes\n');
      await publishRelease(http);

      await expect(run(['-y', '-d', notADir])).resolves.toBe(6);
      expect(logger.messages('error')).toEqual([`Installation failed: ${notADir} is not a directory`]);
    });

    it('should exit 1 for an invalid environment value', async () => {
      await expect(run([], { SKIP_CONFIRM: 'maybe' })).resolves.toBe(1);
      expect(logger.messages('error')).toEqual(['Invalid value for SKIP_CONFIRM: "maybe" (expected true or false)']);
      expect(http.requests).toEqual([]);
    });
  });

  describe('list', () => {
    const releases = [{ tag_name: 'v1.2.0' }, { tag_name: 'v1.1.0' }];

    it('should print versions for --list', async () => {
      http.serveJson(RELEASE_URLS.list(REPO, 10), releases);

      await expect(run(['--list'])).resolves.toBe(0);
      expect(printed).toEqual(['Available versions:', '  - v1.2.0', '  - v1.1.0']);
    });

    it('should honor list --limit', async () => {
      http.serveJson(RELEASE_URLS.list(REPO, 1), releases);

      await expect(run(['list', '-n', '1'])).resolves.toBe(0);
      expect(printed).toEqual(['Available versions:', '  - v1.2.0']);
    });

    it('should exit 3 when the index cannot be read', async () => {
      await expect(run(['--list'])).resolves.toBe(3);
      expect(printed).toEqual([]);
    });

    it('should exit 1 for an out-of-range limit', async () => {
      await expect(run(['list', '-n', '0'])).resolves.toBe(1);
      expect(http.requests).toEqual([]);
    });
  });

  describe('uninstall', () => {
    it('should remove the binary', async () => {
      const binary = writeFakeBinary(TEST_INSTALL_DIR);

      await expect(run(['uninstall', '-y', '-d', TEST_INSTALL_DIR])).resolves.toBe(0);
      expect(fs.existsSync(binary)).toBe(false);
    });

    it('should exit 7 when nothing is installed', async () => {
      await expect(run(['uninstall', '-y', '-d', TEST_INSTALL_DIR])).resolves.toBe(7);
      expect(logger.messages('error')).toEqual(['joule-profiler is not installed']);
    });
  });

  describe('usage', () => {
    it('should exit 0 for --help', async () => {
      await expect(run(['--help'])).resolves.toBe(0);
    });

    it('should not install on a mistyped command', async () => {
      const binary = writeFakeBinary(TEST_INSTALL_DIR);
      await publishRelease(http);

      await expect(run(['uninstal', '-d', TEST_INSTALL_DIR, '-y'])).resolves.toBe(1);
      expect(http.requests).toEqual([]);
      expect(fs.readFileSync(binary, 'utf8')).toBe('#!/bin/sh\necho "joule-profiler 1.2.0"\n');
    });

    it('should reject extra arguments to a subcommand', async () => {
      await expect(run(['list', 'everything'])).resolves.toBe(1);
      expect(http.requests).toEqual([]);
    });

    it('should exit 1 for an unknown option', async () => {
      await expect(run(['--bogus'])).resolves.toBe(1);
    });

    it('should read its own version from package.json', () => {
      expect(readPackageVersion()).toBe('0.1.0');
    });
  });

  describe('reportFailure', () => {
    it('should map error kinds to exit codes', () => {
      expect(reportFailure(new InstallerError('denied', 'PermissionDenied'), logger)).toBe(4);
      expect(reportFailure(new InstallerError('broken', 'InstallationFailed'), logger)).toBe(6);
      expect(reportFailure(new ConfigError('bad flag'), logger)).toBe(1);
      expect(reportFailure('boom', logger)).toBe(1);
      expect(logger.messages('error')).toEqual(['denied', 'broken', 'bad flag', 'Unexpected error: boom']);
    });
  });
});
