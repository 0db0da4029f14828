import { Command } from 'commander';
import { withCostStore } from '@rebisect/core';
import { UsageError } from '@rebisect/shared';
import { createContext, type CliContext, type GlobalOptions } from '../context';
import { ConsoleUI } from '../ui/console';

function contextOf(cmd: Command): Promise<CliContext> {
  return createContext(cmd.optsWithGlobals<GlobalOptions>(), { repoOptional: true });
}

export const registerCacheCommand = (program: Command) => {
  const cache = new Command('cache').description('Inspect and maintain the rebuild-cost cache');

  cache
    .command('path')
    .description('Print the location of the cache file')
    .action(async (_options: unknown, cmd: Command) => {
      const ctx = await contextOf(cmd);
      ctx.renderer.value('path', ctx.cacheFile);
    });

  cache
    .command('stats')
    .description('Count the cached costs')
    .action(async (_options: unknown, cmd: Command) => {
      const { cacheFile, logger, sessionId, renderer } = await contextOf(cmd);
      const stats = await withCostStore(cacheFile, { logger, sessionId }, (store) => store.stats());
      renderer.cacheStats(stats);
    });

  cache
    .command('clear')
    .description('Delete every cached cost')
    .action(async (_options: unknown, cmd: Command) => {
      const { globals, cacheFile, logger, sessionId, renderer } = await contextOf(cmd);
      const ui = new ConsoleUI({
        yes: globals.yes,
        nonInteractive: globals.nonInteractive || globals.json,
      });
      if (!globals.yes && !ui.canPrompt) {
        throw new UsageError('Clearing the cache needs confirmation; pass --yes.');
      }

      await withCostStore(cacheFile, { logger, sessionId }, async (store) => {
        const { entries } = await store.stats();
        const confirmed = await ui.confirm(
          `Delete ${entries} cached costs?`,
          `Cache file: ${cacheFile}`,
          true,
        );
        if (!confirmed) {
          renderer.log('Nothing was deleted.');
          return;
        }
        await store.clear();
        renderer.cleared(entries, cacheFile);
      });
    });

  cache
    .command('compact')
    .description('Rewrite the cache file without duplicate or corrupt records')
    .action(async (_options: unknown, cmd: Command) => {
      const { cacheFile, logger, sessionId, renderer } = await contextOf(cmd);
      const result = await withCostStore(cacheFile, { logger, sessionId }, (store) =>
        store.compact(),
      );
      renderer.compacted(result);
    });

  program.addCommand(cache);
};
