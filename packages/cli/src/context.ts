import { randomUUID } from 'node:crypto';
import {
  ConfigLoader,
  CostCache,
  CostOracle,
  resolveCacheFile,
  withCostStore,
  type JsonlCostStore,
} from '@rebisect/core';
import { CommandBuildInvoker } from '@rebisect/exec';
import { GitService, findRepoRoot, withWorktree, type WorktreePool } from '@rebisect/repo';
import {
  ConsoleLogger,
  JsonlLogger,
  UsageError,
  type BuildCommand,
  type Config,
  type ConfigInput,
  type Logger,
} from '@rebisect/shared';
import { OutputRenderer } from './output/renderer';

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  trace?: string;
  yes?: boolean;
  nonInteractive?: boolean;
};

export interface CliContext {
  globals: GlobalOptions;
  repoRoot: string;
  config: Config;
  sessionId: string;
  logger: Logger;
  renderer: OutputRenderer;
  git: GitService;
  cacheFile: string;
}

export interface ContextOptions {
  /** Configuration taken from command flags */
  flags?: ConfigInput;
  /** Fall back to the working directory outside a git repository */
  repoOptional?: boolean;
  env?: NodeJS.ProcessEnv;
}

async function locateRepo(repoOptional: boolean): Promise<string> {
  try {
    return await findRepoRoot();
  } catch (error: unknown) {
    if (repoOptional && error instanceof UsageError) {
      return process.cwd();
    }
    throw error;
  }
}

export function createLogger(globals: GlobalOptions): Logger {
  const options = { verbose: globals.verbose, quiet: globals.json };
  return globals.trace ? new JsonlLogger(globals.trace, {}, options) : new ConsoleLogger(options);
}

export async function createContext(
  globals: GlobalOptions,
  options: ContextOptions = {},
): Promise<CliContext> {
  const repoRoot = await locateRepo(options.repoOptional ?? false);
  const config = ConfigLoader.load({
    cwd: repoRoot,
    configPath: globals.config,
    flags: options.flags,
  });
  const logger = createLogger(globals);
  await logger.debug(`Repository root: ${repoRoot}`);

  return {
    globals,
    repoRoot,
    config,
    sessionId: randomUUID(),
    logger,
    renderer: new OutputRenderer(globals.json ?? false),
    git: new GitService({ repoRoot }),
    cacheFile: resolveCacheFile(config, options.env ?? process.env),
  };
}

/** Builds a command from the words after `--` and the configured working directory. */
export function buildCommandOf(argv: string[], config: Config): BuildCommand {
  if (argv.length === 0) {
    throw new UsageError('No build command given. Pass it after `--`, e.g. `-- nix-build -A hello`.');
  }
  return { argv, cwd: config.build.cwd };
}

export interface Measurement {
  store: JsonlCostStore;
  pool: WorktreePool;
  invoker: CommandBuildInvoker;
  cache: CostCache;
}

/**
 * Opens the cost store and a worktree pool sized for the configured concurrency,
 * runs `fn`, and releases both however it ends.
 */
export async function withMeasurement<T>(
  ctx: CliContext,
  fn: (measurement: Measurement) => Promise<T>,
): Promise<T> {
  const { config, logger, sessionId } = ctx;

  return withCostStore(ctx.cacheFile, { logger, sessionId }, (store) =>
    withWorktree(ctx.git, { size: config.measure.concurrency }, (pool) => {
      const invoker = new CommandBuildInvoker(config.build);
      const cache = new CostCache({
        store,
        oracle: new CostOracle(pool, invoker),
        logger,
        sessionId,
        dryRunFlag: config.build.dryRunFlag,
        attempts: config.measure.attempts,
      });
      return fn({ store, pool, invoker, cache });
    }),
  );
}
