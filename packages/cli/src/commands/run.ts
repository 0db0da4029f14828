import { Command } from 'commander';
import { GitBisectState } from '@rebisect/repo';
import { BisectionDriver, ScriptVerdictSource, type VerdictSource } from '@rebisect/core';
import { UsageError } from '@rebisect/shared';
import { buildCommandOf, createContext, withMeasurement, type GlobalOptions } from '../context';
import { ConsoleUI, PromptVerdictSource } from '../ui/console';
import { addBuildOptions, buildFlags, parseCount, type BuildOptions } from './options';

interface RunOptions extends BuildOptions {
  test?: string;
  interactive?: boolean;
  maxSteps?: number;
}

function verdictSourceFor(options: RunOptions, globals: GlobalOptions): VerdictSource {
  if (options.test !== undefined && options.interactive) {
    throw new UsageError('Pass either --test <command> or --interactive, not both.');
  }
  if (options.test !== undefined) {
    return new ScriptVerdictSource(options.test);
  }
  if (!options.interactive) {
    throw new UsageError('Pass --test <command> or --interactive to decide each verdict.');
  }

  const ui = new ConsoleUI({ nonInteractive: globals.nonInteractive || globals.json });
  if (!ui.canPrompt) {
    throw new UsageError('--interactive needs a terminal; use --test <command> instead.');
  }
  return new PromptVerdictSource(ui);
}

export const registerRunCommand = (program: Command) => {
  const command = new Command('run');

  addBuildOptions(command)
    .description('Bisect to the first bad revision, testing the cheapest revisions in expectation')
    .option('--test <command>', 'Command run in the built tree; exit code 0 means good')
    .option('--interactive', 'Ask for each verdict')
    .option('--max-steps <n>', 'Stop after this many verdicts', parseCount)
    .action(async (argv: string[], options: RunOptions, cmd: Command) => {
      const globals = cmd.optsWithGlobals<GlobalOptions>();
      const verdicts = verdictSourceFor(options, globals);

      const ctx = await createContext(globals, {
        flags: { ...buildFlags(options), driver: { maxSteps: options.maxSteps } },
      });
      const { config, git, logger, sessionId } = ctx;
      const build = buildCommandOf(argv, config);

      // git bisect checks out the next revision in the main tree after each verdict.
      await git.ensureCleanWorkingTree();

      const report = await withMeasurement(ctx, ({ pool, invoker, cache }) =>
        new BisectionDriver({
          control: new GitBisectState(git),
          checkout: pool,
          invoker,
          verdicts,
          logger,
          sessionId,
          cache,
          command: build,
          concurrency: config.measure.concurrency,
          maxSteps: config.driver.maxSteps,
          maxCandidates: config.selection.maxCandidates,
        }).run(),
      );

      ctx.renderer.report(report);
    });

  program.addCommand(command);
};
