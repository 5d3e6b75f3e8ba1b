import * as readline from 'readline';
import {
  ConfigError,
  ConsoleLogger,
  LogLevel,
  PlaywrightSessionProvider,
  TYPES,
  createContainer,
  errorMessage,
  journalPath,
  loadExportConfig,
  parseLogLevel,
  slugifyRepository,
} from '@issuevault/core';
import type {
  ConfigOptions,
  ExportConfig,
  IGitService,
  IPipelineRunner,
  RepositoryRun,
  Stage,
} from '@issuevault/core';
import * as path from 'path';

export interface CommandOptions extends ConfigOptions {
  verbose?: boolean;
  commit?: boolean;
}

export type Print = (line: string) => void;

export function createLogger(options: CommandOptions, env: NodeJS.ProcessEnv): ConsoleLogger {
  const level = options.verbose ? LogLevel.DEBUG : parseLogLevel(env.EXPORT_LOG_LEVEL) ?? LogLevel.INFO;
  return new ConsoleLogger(level);
}

/**
 * Runs the given stages for every configured repository and prints one
 * summary line per repository. Resolves to the process exit code.
 */
export async function runStages(
  stages: readonly Stage[],
  options: CommandOptions,
  env: NodeJS.ProcessEnv = process.env,
  print: Print = line => console.log(line)
): Promise<number> {
  const logger = createLogger(options, env);
  let config: ExportConfig;
  try {
    config = loadExportConfig(options, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  const container = createContainer(config, logger);
  const runner = container.get<IPipelineRunner>(TYPES.IPipelineRunner);
  const runs = await runner.run(stages);
  runs.forEach(run => print(formatRun(run)));
  let exitCode = runs.some(run => run.error !== undefined) ? 1 : 0;

  if (options.commit) {
    const git = container.get<IGitService>(TYPES.IGitService);
    try {
      const committed = await git.commitSnapshot(snapshotPaths(config), `Export ${config.repositories.join(', ')}`);
      print(committed ? `Committed snapshot in ${config.outRoot}` : 'No changes to commit');
    } catch (error) {
      logger.error(`Snapshot failed: ${errorMessage(error)}`);
      exitCode = 1;
    }
  }

  return exitCode;
}

export function formatRun(run: RepositoryRun): string {
  const parts: string[] = [];
  if (run.export) {
    parts.push(
      `exported ${run.export.issues} issues, ${run.export.pulls} PRs` +
      (run.export.failures.length > 0 ? ` (${run.export.failures.length} skipped)` : ''));
  }
  if (run.fetch) {
    parts.push(`attachments ${run.fetch.fetched}/${run.fetch.total} (${run.fetch.missing} missing)`);
  }
  if (run.normalize) {
    parts.push(`renamed ${run.normalize.renamed}, relinked ${run.normalize.documentsUpdated} docs`);
  }
  if (run.error !== undefined) {
    parts.push(`FAILED: ${errorMessage(run.error)}`);
  }
  return `${run.repository}: ${parts.join('; ') || 'nothing to do'}`;
}

/** Output-root relative paths a snapshot commits; the browser profile is never among them. */
export function snapshotPaths(config: Pick<ExportConfig, 'repositories' | 'outRoot'>): string[] {
  return config.repositories.flatMap(repository => [
    slugifyRepository(repository),
    path.relative(config.outRoot, journalPath(config.outRoot, repository)),
  ]);
}

export async function runLogin(
  options: CommandOptions,
  env: NodeJS.ProcessEnv = process.env,
  waitForUser: () => Promise<void> = pressEnter
): Promise<number> {
  const logger = createLogger(options, env);
  let config: ExportConfig;
  try {
    config = loadExportConfig(options, env, { requireRepositories: false });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  const provider = new PlaywrightSessionProvider(config, logger);
  try {
    await provider.login(waitForUser);
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }
  logger.info(`Session saved to ${config.profileDir}`);
  return 0;
}

function pressEnter(): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  return new Promise(resolve => {
    rl.question('Log in in the opened browser, then press Enter to save the session... ', () => {
      rl.close();
      resolve();
    });
  });
}
