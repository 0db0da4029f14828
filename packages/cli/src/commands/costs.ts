import { Command } from 'commander';
import { GitBisectState } from '@rebisect/repo';
import { measureRange } from '@rebisect/core';
import { buildCommandOf, createContext, withMeasurement, type GlobalOptions } from '../context';
import { addBuildOptions, buildFlags, type BuildOptions } from './options';

export const registerCostsCommand = (program: Command) => {
  const command = new Command('costs');

  addBuildOptions(command)
    .description('Measure the rebuild cost of every revision in the current git bisect range')
    .action(async (argv: string[], options: BuildOptions, cmd: Command) => {
      const ctx = await createContext(cmd.optsWithGlobals<GlobalOptions>(), {
        flags: buildFlags(options),
      });
      const build = buildCommandOf(argv, ctx.config);

      const range = await new GitBisectState(ctx.git).currentRange();
      const costs = await withMeasurement(ctx, ({ cache }) =>
        measureRange(range, {
          cache,
          command: build,
          concurrency: ctx.config.measure.concurrency,
        }),
      );

      ctx.renderer.costs(costs);
    });

  program.addCommand(command);
};
