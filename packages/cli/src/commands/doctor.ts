import { Command } from 'commander';
import { promises as fs, constants } from 'fs';
import which from 'which';
import chalk from 'chalk';
import { ConfigLoader, resolveCacheDir } from '@rebisect/core';
import { GitBisectState, GitService, findRepoRoot } from '@rebisect/repo';
import { UsageError, dirname, type Config } from '@rebisect/shared';
import type { GlobalOptions } from '../context';

export type CheckStatus = 'ok' | 'warn' | 'fail';
export type CheckResult = [CheckStatus, string];

const CHECKS: Record<CheckStatus, string> = {
  ok: chalk.green('✔'),
  warn: chalk.yellow('!'),
  fail: chalk.red('✖'),
};

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message.split('\n')[0] : String(error);
}

export async function checkExecutable(
  name: string,
  missing: CheckStatus = 'fail',
  hint = '',
): Promise<CheckResult> {
  try {
    const path = await which(name);
    return ['ok', `${name} found at: ${path}`];
  } catch {
    return [missing, `${name} not found in PATH.${hint ? ' ' + hint : ''}`];
  }
}

export async function checkBisectState(git: GitService): Promise<CheckResult> {
  try {
    const range = await new GitBisectState(git).currentRange();
    return ['ok', `git bisect is in progress: ${range.length} revisions in range.`];
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      return ['warn', error.message];
    }
    return ['fail', `Could not read the bisect state: ${messageOf(error)}`];
  }
}

/** The cache directory is usable when it, or the nearest existing parent, is writable. */
export async function checkCacheDir(dir: string): Promise<CheckResult> {
  let probe = dir;
  for (;;) {
    try {
      await fs.access(probe, constants.W_OK);
      const state = probe === dir ? 'is writable' : 'will be created';
      return ['ok', `Cache directory ${state}: ${dir}`];
    } catch (error: unknown) {
      const parent = dirname(probe);
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'ENOENT' || parent === probe) {
        return ['fail', `Cache directory is not writable: ${dir}`];
      }
      probe = parent;
    }
  }
}

export const registerDoctorCommand = (program: Command) => {
  const command = new Command('doctor');

  command
    .description('Check git, the bisect state, the configuration and the cache directory')
    .action(async (_options: unknown, cmd: Command) => {
      const globals = cmd.optsWithGlobals<GlobalOptions>();
      const results: CheckResult[] = [];

      results.push(await checkExecutable('git'));
      results.push(
        await checkExecutable('nix-build', 'warn', 'The default artifact pattern expects Nix.'),
      );

      let config: Config | undefined;
      try {
        const repoRoot = await findRepoRoot();
        results.push(['ok', `Repository root: ${repoRoot}`]);
        results.push(await checkBisectState(new GitService({ repoRoot })));

        config = ConfigLoader.load({ cwd: repoRoot, configPath: globals.config });
        results.push(['ok', 'Configuration is valid.']);
      } catch (error: unknown) {
        results.push(['fail', messageOf(error)]);
      }

      if (config) {
        results.push(await checkCacheDir(resolveCacheDir(config)));
      }

      const hasFailures = results.some(([status]) => status === 'fail');
      if (hasFailures) {
        process.exitCode = 1;
      }

      if (globals.json) {
        console.log(
          JSON.stringify(
            { checks: results.map(([status, message]) => ({ status, message })) },
            null,
            2,
          ),
        );
        return;
      }

      console.log(chalk.bold('rebisect environment checkup'));
      console.log('---------------------------------');
      results.forEach(([status, message]) => {
        console.log(`${CHECKS[status]} ${message}`);
      });
      console.log('---------------------------------');

      if (hasFailures) {
        console.log(
          chalk.red.bold('Doctor checks failed.') +
            ' Please resolve the issues marked with ' +
            CHECKS.fail,
        );
      } else {
        console.log(chalk.green.bold('All checks passed.'));
      }
    });

  program.addCommand(command);
};
