#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { CliOptions, ConfigError, Environment, InstallerConfig, resolveInstallerConfig } from '../config';
import { InstallerContext } from '../installers/base-installer';
import { createInstallerContext, runInstall, runList, runUninstall } from '../installers/install-pipeline';
import { EXIT_CODES, InstallerError, exitCodeFor, toError } from '../installers/types';
import { AxiosHttpClient, HttpClient } from '../lib/http-client';
import { ConsoleLogger, Logger } from '../lib/logger';
import { SystemInfo } from '../lib/platform-probe';
import { BINARY_NAME, DEFAULT_INSTALL_DIR, REPO } from '../shared-constants';

export interface CliDeps {
  env?: Environment;
  interactive?: boolean;
  http?: HttpClient;
  system?: SystemInfo;
  createLogger?: (verbose: boolean) => Logger;
  createContext?: (config: InstallerConfig, logger: Logger) => Promise<InstallerContext>;
  /** Where --list writes the tags; stdout by default */
  print?: (line: string) => void;
}

const ENV_HELP = `
Environment variables:
  INSTALL_DIR                Installation directory
  TARGET_VERSION             Version to install
  SKIP_CONFIRM               Skip confirmations (true/false)
  VERBOSE                    Verbose output (true/false)
  JOULE_PROFILER_RAPL_PATH   RAPL location used by ${BINARY_NAME}

Examples:
  $ joule-installer                          # latest version to ${DEFAULT_INSTALL_DIR}
  $ joule-installer install -y               # same, without prompts
  $ joule-installer --dir ~/.local/bin       # custom directory
  $ joule-installer --version v0.1.0         # specific version
  $ joule-installer --list                   # available versions
  $ joule-installer -y                       # non-interactive
  $ joule-installer uninstall

Exit codes:
  0 success or cancelled, 1 usage, 2 unsupported platform,
  3 version/network failure, 4 permission denied, 5 integrity failure,
  6 installation failed, 7 not installed
`;

const packageJsonSchema = z.object({ version: z.string() });

export function readPackageVersion(): string {
  try {
    const content = fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8');
    const parsed = packageJsonSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

/**
 * Print a failure and pick the exit code scripts rely on
 */
export function reportFailure(error: unknown, logger: Logger): number {
  if (error instanceof InstallerError) {
    logger.error(error.message);
    for (const hint of error.hints) {
      logger.info(hint);
    }
    if (error.cause) {
      logger.debug(`Cause: ${error.cause.message}`);
    }
    return exitCodeFor(error.kind);
  }
  if (error instanceof ConfigError) {
    logger.error(error.message);
    logger.info('Run joule-installer --help for usage');
    return EXIT_CODES.USAGE;
  }
  logger.error(`Unexpected error: ${toError(error).message}`);
  return EXIT_CODES.USAGE;
}

export function createProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const env = deps.env ?? process.env;
  const interactive = deps.interactive ?? Boolean(process.stdin.isTTY);
  const createLogger = deps.createLogger ?? ((verbose: boolean) => new ConsoleLogger(verbose));
  const createContext = deps.createContext ?? createInstallerContext;
  const print = deps.print ?? ((line: string) => console.log(line));
  const http = () => deps.http ?? new AxiosHttpClient();

  const run = async (options: CliOptions, action: (config: InstallerConfig, logger: Logger) => Promise<number>) => {
    let logger = createLogger(options.verbose === true);
    try {
      const config = resolveInstallerConfig(options, env, interactive);
      logger = createLogger(config.verbose);
      setExitCode(await action(config, logger));
    } catch (error) {
      setExitCode(reportFailure(error, logger));
    }
  };

  const listAction = async (config: InstallerConfig, logger: Logger) => {
    const versions = await runList(config, logger, http());
    print('Available versions:');
    for (const version of versions) {
      print(`  - ${version}`);
    }
    return EXIT_CODES.SUCCESS;
  };

  const installAction = (options: CliOptions) =>
    run(options, async (config, logger) => {
      const context = await createContext(config, logger);
      await runInstall({ ...context, http: http(), system: deps.system, shell: env.SHELL });
      return EXIT_CODES.SUCCESS;
    });

  const program = new Command();
  program
    .name('joule-installer')
    .description(`Install ${BINARY_NAME} from https://github.com/${REPO}`)
    .version(readPackageVersion(), '-V, --installer-version', 'output the installer version')
    .enablePositionalOptions()
    // a mistyped command name must not fall through to an install
    .allowExcessArguments(false)
    .option('-d, --dir <dir>', `installation directory (default: ${DEFAULT_INSTALL_DIR})`)
    .option('-v, --version <version>', 'install a specific version (default: latest)')
    .option('-y, --yes', 'skip confirmation prompts')
    .option('--verbose', 'enable verbose output')
    .option('--list', 'list available versions and exit')
    .addHelpText('after', ENV_HELP)
    .action(async (options: CliOptions & { list?: boolean }) => {
      if (options.list) {
        await run(options, listAction);
        return;
      }
      await installAction(options);
    });

  program
    .command('install')
    .description(`install ${BINARY_NAME} (the default command)`)
    .option('-d, --dir <dir>', `installation directory (default: ${DEFAULT_INSTALL_DIR})`)
    .option('-v, --version <version>', 'install a specific version (default: latest)')
    .option('-y, --yes', 'skip confirmation prompts')
    .option('--verbose', 'enable verbose output')
    .action(async (options: CliOptions) => {
      await installAction(options);
    });

  program
    .command('list')
    .description('list the most recent releases')
    .option('-n, --limit <count>', 'how many versions to show', '10')
    .option('--verbose', 'enable verbose output')
    .action(async (options: CliOptions) => {
      await run(options, listAction);
    });

  program
    .command('uninstall')
    .description(`remove ${BINARY_NAME}`)
    .option('-d, --dir <dir>', `directory it was installed to (default: ${DEFAULT_INSTALL_DIR})`)
    .option('-y, --yes', 'skip confirmation prompt')
    .option('--verbose', 'enable verbose output')
    .action(async (options: CliOptions) => {
      await run(options, async (config, logger) => {
        await runUninstall(await createContext(config, logger));
        return EXIT_CODES.SUCCESS;
      });
    });

  return program;
}

export async function main(argv: string[] = process.argv, deps: CliDeps = {}): Promise<number> {
  let exitCode: number = EXIT_CODES.SUCCESS;
  const program = createProgram(deps, code => {
    exitCode = code;
  });
  program.exitOverride();
  program.commands.forEach(command => command.exitOverride().allowExcessArguments(false));

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE;
    }
    throw error;
  }
  return exitCode;
}

if (require.main === module) {
  main()
    .then(code => process.exit(code))
    .catch((error: unknown) => {
      console.error('❌ Unexpected error:', toError(error).message);
      process.exit(EXIT_CODES.USAGE);
    });
}
