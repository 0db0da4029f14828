import { CommandRunner, isShellCommand, parseCommand, type ProcessRunner } from '@rebisect/exec';
import {
  AppError,
  UsageError,
  type BuildRunResult,
  type Revision,
  type Verdict,
} from '@rebisect/shared';

export interface VerdictContext {
  revision: Revision;
  /** Working tree the revision was built in */
  checkoutDir: string;
  build: BuildRunResult;
}

/** Decides whether a built revision shows the fault. */
export interface VerdictSource {
  verdictFor(context: VerdictContext): Promise<Verdict>;
}

/**
 * Runs a test command in the built working tree: exit code 0 is good, anything else is bad.
 * The revision under test is exported as `REBISECT_REVISION`.
 */
export class ScriptVerdictSource implements VerdictSource {
  constructor(
    private readonly script: string,
    private readonly runner: ProcessRunner = new CommandRunner(),
  ) {
    if (script.trim().length === 0) {
      throw new UsageError('The test command is empty.');
    }
  }

  async verdictFor({ revision, checkoutDir }: VerdictContext): Promise<Verdict> {
    const env = { REBISECT_REVISION: revision };
    const run = isShellCommand(this.script)
      ? await this.runner.inherit(this.script, [], { cwd: checkoutDir, env, shell: true })
      : await this.runDirect(checkoutDir, env);

    if (run.exitCode === undefined) {
      throw new AppError(
        'VerdictError',
        `Test command ${run.failureReason ?? 'failed'} at ${revision}: ${this.script}`,
      );
    }
    return run.exitCode === 0 ? 'good' : 'bad';
  }

  private async runDirect(cwd: string, env: Record<string, string>) {
    const { bin, args, env: assignments } = parseCommand(this.script);
    if (!bin) {
      throw new UsageError(`The test command has no program to run: ${this.script}`);
    }
    return this.runner.inherit(bin, args, { cwd, env: { ...assignments, ...env } });
  }
}
