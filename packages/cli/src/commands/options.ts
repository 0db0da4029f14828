import { InvalidArgumentError, type Command } from 'commander';
import type { ConfigInput } from '@rebisect/shared';

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export interface BuildOptions {
  concurrency?: number;
  attempts?: number;
  dryRunFlag?: string;
  buildCwd?: string;
  maxCandidates?: number;
}

/** Options shared by every command that measures costs. */
export function addBuildOptions(command: Command): Command {
  return command
    .option('-j, --concurrency <n>', 'Dry runs in parallel, each in its own worktree', parseCount)
    .option('--attempts <n>', 'Dry-run attempts per revision', parseCount)
    .option('--dry-run-flag <flag>', 'Flag that turns the build command into a dry run')
    .option('--build-cwd <dir>', 'Directory the build runs in, relative to the checkout')
    .option('--max-candidates <n>', 'Largest range the planner accepts', parseCount)
    .argument('<build...>', 'Build command, after --')
    .passThroughOptions();
}

export function buildFlags(options: BuildOptions): ConfigInput {
  return {
    build: { dryRunFlag: options.dryRunFlag, cwd: options.buildCwd },
    measure: { concurrency: options.concurrency, attempts: options.attempts },
    selection: { maxCandidates: options.maxCandidates },
  };
}
