import * as fs from 'fs';
import * as path from 'path';
import { BinaryInstaller } from './binary-installer';
import { MemoryLogger } from '../lib/logger';
import { PrivilegeBroker } from '../lib/privilege';
import {
  ReadOnlyMutator,
  ScriptedPrompt,
  TEST_INSTALL_DIR,
  TEST_TEMP_DIR,
  makeConfig,
  makeContext,
  writeFakeBinary
} from '../test-setup';

describe('BinaryInstaller', () => {
  let logger: MemoryLogger;
  const binaryPath = path.join(TEST_INSTALL_DIR, 'joule-profiler');
  const otherDir = path.join(TEST_TEMP_DIR, 'other-bin');

  beforeEach(() => {
    logger = new MemoryLogger();
  });

  describe('checkExisting', () => {
    it('should report none on a clean system', async () => {
      const installer = new BinaryInstaller(makeContext(makeConfig(), logger));
      await expect(installer.checkExisting()).resolves.toBe('none');
      expect(logger.messages('warn')).toEqual([]);
    });

    it('should overwrite without asking when confirmations are skipped', async () => {
      writeFakeBinary(TEST_INSTALL_DIR, 'joule-profiler 1.0.0');
      const prompt = new ScriptedPrompt(false);
      const installer = new BinaryInstaller(makeContext(makeConfig(), logger, { prompt }));

      await expect(installer.checkExisting()).resolves.toBe('overwrite');
      expect(prompt.questions).toEqual([]);
      expect(logger.messages('warn')).toEqual(['joule-profiler is already installed']);
      expect(logger.messages('info')).toEqual([
        '  Version: 1.0.0',
        `  Location: ${binaryPath}`,
        'Overwriting (--yes flag enabled)'
      ]);
    });

    it('should respect a declined prompt', async () => {
      writeFakeBinary(TEST_INSTALL_DIR, 'joule-profiler 1.0.0');
      const prompt = new ScriptedPrompt(false);
      const installer = new BinaryInstaller(makeContext(makeConfig({ skipConfirm: false }), logger, { prompt }));

      await expect(installer.checkExisting()).resolves.toBe('declined');
      expect(prompt.questions).toEqual(['Do you want to overwrite it?']);
    });

    it('should find a copy elsewhere on PATH', async () => {
      const other = writeFakeBinary(otherDir, 'garbled output');
      const config = makeConfig({ searchPath: otherDir });
      const installer = new BinaryInstaller(makeContext(config, logger));

      await expect(installer.checkExisting()).resolves.toBe('overwrite');
      expect(logger.messages('info').slice(0, 2)).toEqual(['  Version: unknown', `  Location: ${other}`]);
    });
  });

  describe('install', () => {
    let extracted: string;

    beforeEach(() => {
      extracted = writeFakeBinary(path.join(TEST_TEMP_DIR, 'extract'));
    });

    it('should create the directory and place the binary', async () => {
      const installer = new BinaryInstaller(makeContext(makeConfig(), logger));

      await expect(installer.install(extracted)).resolves.toBe(binaryPath);
      expect(fs.statSync(binaryPath).mode & 0o777).toBe(0o755);
      expect(logger.messages('info')).toEqual([
        `Creating directory ${TEST_INSTALL_DIR}...`,
        `Installing to ${TEST_INSTALL_DIR}...`
      ]);
      expect(logger.messages('success')).toEqual([`Installed joule-profiler to ${TEST_INSTALL_DIR}`]);
    });

    it('should refuse an install directory that is a file', async () => {
      const notADir = path.join(TEST_TEMP_DIR, 'not-a-dir');
      fs.writeFileSync(notADir, 'notes\n');
      const installer = new BinaryInstaller(makeContext(makeConfig({ installDir: notADir }), logger));

      await expect(installer.install(extracted)).rejects.toMatchObject({
        kind: 'InstallationFailed',
        message: `Installation failed: ${notADir} is not a directory`
      });
      expect(fs.readFileSync(notADir, 'utf8')).toBe('notes\n');
    });

    it('should report a directory in the way as InstallationFailed', async () => {
      fs.mkdirSync(binaryPath, { recursive: true });
      const installer = new BinaryInstaller(makeContext(makeConfig(), logger));

      const error = await installer.install(extracted).catch((caught: unknown) => caught);

      expect(error).toMatchObject({
        kind: 'InstallationFailed',
        message: `Installation failed: could not write ${binaryPath}`
      });
      expect(error).toHaveProperty('hints.0', expect.stringMatching(/^Reason: EISDIR/));
      expect(fs.readdirSync(TEST_INSTALL_DIR)).toEqual(['joule-profiler']);
      expect(fs.statSync(binaryPath).isDirectory()).toBe(true);
    });

    it('should leave the directory untouched when permission is denied', async () => {
      writeFakeBinary(TEST_INSTALL_DIR, 'joule-profiler 1.0.0');
      const before = fs.readFileSync(binaryPath, 'utf8');
      const broker = new PrivilegeBroker({ direct: new ReadOnlyMutator(), escalated: null, logger });
      const installer = new BinaryInstaller(makeContext(makeConfig(), logger, { broker }));

      await expect(installer.install(extracted)).rejects.toMatchObject({
        kind: 'PermissionDenied',
        message: `Permission denied: cannot install binary in ${TEST_INSTALL_DIR}`
      });
      expect(fs.readFileSync(binaryPath, 'utf8')).toBe(before);
      expect(fs.readdirSync(TEST_INSTALL_DIR)).toEqual(['joule-profiler']);
    });
  });

  describe('verify', () => {
    it('should run the installed binary', async () => {
      writeFakeBinary(TEST_INSTALL_DIR);
      const installer = new BinaryInstaller(makeContext(makeConfig(), logger));

      await expect(installer.verify()).resolves.toBe('1.2.0');
      expect(logger.messages('success')).toEqual(['Verified installation: joule-profiler 1.2.0']);
    });

    it('should fail with the PATH fix when the binary is not on PATH', async () => {
      writeFakeBinary(TEST_INSTALL_DIR);
      const installer = new BinaryInstaller(makeContext(makeConfig({ searchPath: otherDir }), logger));

      await expect(installer.verify('/bin/bash')).rejects.toMatchObject({
        kind: 'InstallationFailed',
        message: 'Installation failed: joule-profiler not found in PATH',
        hints: [
          `Make sure ${TEST_INSTALL_DIR} is in your PATH`,
          'Add it to your PATH by adding this line to your shell profile:',
          `  echo 'export PATH="${TEST_INSTALL_DIR}:$PATH"' >> ~/.bashrc`,
          '  source ~/.bashrc'
        ]
      });
    });

    it('should query the placed binary even when another copy shadows it', async () => {
      writeFakeBinary(TEST_INSTALL_DIR);
      const other = writeFakeBinary(otherDir, 'joule-profiler 0.9.0');
      const searchPath = [otherDir, TEST_INSTALL_DIR].join(path.delimiter);
      const installer = new BinaryInstaller(makeContext(makeConfig({ searchPath }), logger));

      await expect(installer.verify()).resolves.toBe('1.2.0');
      expect(logger.messages('warn')).toEqual([`${other} comes before ${binaryPath} on your PATH`]);
    });

    it('should fail for a broken binary behind a working copy on PATH', async () => {
      writeFakeBinary(TEST_INSTALL_DIR, 'garbage output');
      writeFakeBinary(otherDir, 'joule-profiler 0.9.0');
      const searchPath = [otherDir, TEST_INSTALL_DIR].join(path.delimiter);
      const installer = new BinaryInstaller(makeContext(makeConfig({ searchPath }), logger));

      await expect(installer.verify()).rejects.toMatchObject({
        kind: 'InstallationFailed',
        message: `Installation failed: ${binaryPath} --version did not succeed`
      });
      expect(logger.messages('success')).toEqual([]);
    });

    it('should fail when the binary cannot report its version', async () => {
      writeFakeBinary(TEST_INSTALL_DIR, 'Segmentation fault');
      const installer = new BinaryInstaller(makeContext(makeConfig(), logger));

      await expect(installer.verify()).rejects.toMatchObject({
        kind: 'InstallationFailed',
        message: `Installation failed: ${binaryPath} --version did not succeed`
      });
    });
  });

  describe('checkPath', () => {
    it('should stay quiet when the directory is on PATH', () => {
      new BinaryInstaller(makeContext(makeConfig(), logger)).checkPath('/bin/bash');
      expect(logger.entries).toEqual([]);
    });

    it('should print the line to add to the shell profile', () => {
      const config = makeConfig({ searchPath: '/usr/bin' });
      new BinaryInstaller(makeContext(config, logger)).checkPath('/usr/bin/zsh');

      expect(logger.messages('warn')).toEqual([`${TEST_INSTALL_DIR} is not in your PATH`]);
      expect(logger.messages('info')).toEqual([
        'Add it to your PATH by adding this line to your shell profile:',
        `  echo 'export PATH="${TEST_INSTALL_DIR}:$PATH"' >> ~/.zshrc`,
        '  source ~/.zshrc'
      ]);
    });
  });

  describe('printUsage', () => {
    it('should show the getting-started commands', () => {
      new BinaryInstaller(makeContext(makeConfig(), logger)).printUsage();

      expect(logger.messages('success')).toEqual(['Installation complete!']);
      expect(logger.messages('info')).toContain('  sudo joule-profiler list-domains                    # list available RAPL domains');
      expect(logger.messages('info')).toContain('  joule-profiler --help');
    });
  });
});
