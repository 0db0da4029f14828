import { Command } from 'commander';
import { GitBisectState } from '@rebisect/repo';
import { suggestProbes } from '@rebisect/core';
import { buildCommandOf, createContext, withMeasurement, type GlobalOptions } from '../context';
import { shortRevision } from '../output/renderer';
import { addBuildOptions, buildFlags, parseCount, type BuildOptions } from './options';

interface NextOptions extends BuildOptions {
  checkout?: boolean;
  top?: number;
}

export const registerNextCommand = (program: Command) => {
  const command = new Command('next');

  addBuildOptions(command)
    .description('Rank the revisions of the current git bisect range by expected rebuilds')
    .option('--checkout', 'Check out the best revision in the repository')
    .option('--top <n>', 'Number of probes to print', parseCount)
    .action(async (argv: string[], options: NextOptions, cmd: Command) => {
      const ctx = await createContext(cmd.optsWithGlobals<GlobalOptions>(), {
        flags: {
          ...buildFlags(options),
          selection: { maxCandidates: options.maxCandidates, top: options.top },
        },
      });
      const { config, git, renderer } = ctx;
      const build = buildCommandOf(argv, config);

      if (options.checkout) {
        await git.ensureCleanWorkingTree();
      }

      const range = await new GitBisectState(git).currentRange();
      const suggestion = await withMeasurement(ctx, ({ cache }) =>
        suggestProbes(range, {
          cache,
          command: build,
          concurrency: config.measure.concurrency,
          maxCandidates: config.selection.maxCandidates,
        }),
      );

      renderer.suggestion(suggestion, config.selection.top);

      const best = suggestion.probes[0];
      if (options.checkout && best) {
        await git.checkout(best.revision);
        renderer.log(`Checked out ${shortRevision(best.revision)}.`);
      }
    });

  program.addCommand(command);
};
