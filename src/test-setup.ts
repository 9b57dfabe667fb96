import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import * as tar from 'tar';
import { InstallerConfig } from './config';
import { InstallerContext } from './installers/base-installer';
import { HttpClient, HttpResponse } from './lib/http-client';
import { MemoryLogger } from './lib/logger';
import { SystemInfo } from './lib/platform-probe';
import { DirectMutator, PrivilegeBroker } from './lib/privilege';
import { ConfirmPrompt } from './lib/prompt';
import { BINARY_NAME, LATEST, RELEASE_URLS, REPO } from './shared-constants';

// One scratch tree per Jest worker so parallel test files never share files
export const TEST_TEMP_DIR = path.join(os.tmpdir(), 'joule-installer-tests', process.env.JEST_WORKER_ID ?? '0');
export const TEST_HOME_DIR = path.join(TEST_TEMP_DIR, 'home');
export const TEST_INSTALL_DIR = path.join(TEST_TEMP_DIR, 'bin');

function removeTestDir(): void {
  // Clean up any existing test data with retry
  let retries = 3;
  while (retries > 0 && fs.existsSync(TEST_TEMP_DIR)) {
    try {
      fs.rmSync(TEST_TEMP_DIR, { recursive: true, force: true });
      break;
    } catch (error) {
      retries--;
      if (retries === 0) {
        console.warn(`Failed to clean up test directory, continuing... (${error})`);
      }
    }
  }
}

beforeEach(() => {
  jest.clearAllMocks();
  jest.restoreAllMocks();

  removeTestDir();
  fs.mkdirSync(TEST_HOME_DIR, { recursive: true });
});

afterAll(() => {
  removeTestDir();
});

// Mock os.homedir to return our test directory
jest.mock('os', () => ({
  ...jest.requireActual<typeof import('os')>('os'),
  homedir: () => TEST_HOME_DIR
}));

export function writeFakeBinary(dir: string, output = `${BINARY_NAME} 1.2.0`, name = BINARY_NAME): string {
  fs.mkdirSync(dir, { recursive: true });
  const binaryPath = path.join(dir, name);
  fs.writeFileSync(binaryPath, `#!/bin/sh\necho "${output}"\n`, { mode: 0o755 });
  return binaryPath;
}

export function makeConfig(overrides: Partial<InstallerConfig> = {}): InstallerConfig {
  return {
    installDir: TEST_INSTALL_DIR,
    versionRequest: LATEST,
    skipConfirm: true,
    verbose: true,
    searchPath: TEST_INSTALL_DIR,
    repo: REPO,
    binaryName: BINARY_NAME,
    raplPath: path.join(TEST_TEMP_DIR, 'intel-rapl'),
    listLimit: 10,
    interactive: false,
    ...overrides
  };
}

export function fakeSystem(overrides: Partial<SystemInfo> = {}): SystemInfo {
  return {
    osType: () => 'Linux',
    arch: () => 'x64',
    readTextFile: () => 'NAME="Ubuntu"\nVERSION_ID="22.04"\n',
    listDirectory: () => ['intel-rapl:0', 'intel-rapl:1'],
    ...overrides
  };
}

/**
 * In-memory release host; anything not served answers 404
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: string[] = [];
  private readonly json = new Map<string, HttpResponse<unknown>>();
  private readonly statuses = new Map<string, number>();
  private readonly files = new Map<string, Buffer>();
  private readonly failures = new Map<string, Error>();

  serveJson(url: string, data: unknown, status = 200): this {
    this.json.set(url, { status, data });
    return this;
  }

  serveStatus(url: string, status: number): this {
    this.statuses.set(url, status);
    return this;
  }

  serveFile(url: string, content: Buffer | string): this {
    this.files.set(url, typeof content === 'string' ? Buffer.from(content) : content);
    return this;
  }

  failOn(url: string, error: Error = new Error('socket hang up')): this {
    this.failures.set(url, error);
    return this;
  }

  async getJson(url: string): Promise<HttpResponse<unknown>> {
    this.record(url);
    return this.json.get(url) ?? { status: 404, data: { message: 'Not Found' } };
  }

  async getStatus(url: string): Promise<number> {
    this.record(url);
    return this.statuses.get(url) ?? (this.files.has(url) ? 200 : 404);
  }

  async download(url: string, destPath: string): Promise<number> {
    this.record(url);
    const status = this.statuses.get(url);
    if (status !== undefined) return status;
    const body = this.files.get(url);
    if (!body) return 404;
    await fs.promises.writeFile(destPath, body);
    return 200;
  }

  private record(url: string): void {
    this.requests.push(url);
    const failure = this.failures.get(url);
    if (failure) throw failure;
  }
}

export interface PublishedRelease {
  archiveName: string;
  archiveUrl: string;
  manifestUrl: string;
  digest: string;
}

/**
 * Pack a fake binary the way the release pipeline does and serve the
 * archive, its manifest and the release index from http
 */
export async function publishRelease(
  http: FakeHttpClient,
  version = 'v1.2.0',
  binaryOutput = `${BINARY_NAME} ${version.slice(1)}`
): Promise<PublishedRelease> {
  const stagingDir = path.join(TEST_TEMP_DIR, 'release', version);
  writeFakeBinary(stagingDir, binaryOutput);

  const archiveName = `${BINARY_NAME}-${version}-x86_64-unknown-linux-gnu.tar.gz`;
  const archivePath = path.join(TEST_TEMP_DIR, 'release', archiveName);
  await tar.c({ gzip: true, file: archivePath, cwd: stagingDir }, [BINARY_NAME]);

  const archive = fs.readFileSync(archivePath);
  const digest = crypto.createHash('sha256').update(archive).digest('hex');
  const archiveUrl = RELEASE_URLS.asset(REPO, version, archiveName);
  const manifestUrl = `${archiveUrl}.sha256`;

  http
    .serveJson(RELEASE_URLS.latest(REPO), { tag_name: version, name: `Release ${version}` })
    .serveStatus(RELEASE_URLS.tag(REPO, version), 200)
    .serveFile(archiveUrl, archive)
    .serveFile(manifestUrl, `${digest}  ${archiveName}\n`);

  return { archiveName, archiveUrl, manifestUrl, digest };
}

export class ScriptedPrompt implements ConfirmPrompt {
  readonly questions: string[] = [];

  constructor(private readonly answer: boolean) {}

  async confirm(message: string): Promise<boolean> {
    this.questions.push(message);
    return this.answer;
  }
}

/**
 * A direct mutator that reports every location as read-only
 */
export class ReadOnlyMutator extends DirectMutator {
  async probeWritable(): Promise<boolean> {
    return false;
  }
}

export function makeContext(
  config: InstallerConfig,
  logger: MemoryLogger,
  { prompt, broker }: { prompt?: ConfirmPrompt; broker?: PrivilegeBroker } = {}
): InstallerContext {
  return {
    config,
    logger,
    broker: broker ?? new PrivilegeBroker({ escalated: null, logger }),
    prompt: prompt ?? new ScriptedPrompt(true)
  };
}
