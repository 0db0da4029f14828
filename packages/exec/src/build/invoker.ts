import {
  BuildFailureError,
  UsageError,
  join,
  type BuildCommand,
  type BuildConfig,
  type BuildInvoker,
  type BuildRunResult,
  type Revision,
} from '@rebisect/shared';
import { CommandRunner, type ProcessRunner } from '../runner/runner';
import { parsePlannedArtifacts, selectPlanOutput, tail } from './plan';

/**
 * Runs the user's build command inside a checkout.
 *
 * A dry run appends `dryRunFlag` to the argv and counts the distinct artifacts the
 * configured pattern finds in the plan output. With the defaults this is the list of
 * `.drv` files `nix-build --dry-run` reports on stderr.
 */
export class CommandBuildInvoker implements BuildInvoker {
  constructor(
    private readonly config: Pick<BuildConfig, 'dryRunFlag' | 'outputStream' | 'artifactPattern'>,
    private readonly runner: ProcessRunner = new CommandRunner(),
  ) {}

  async dryRun(command: BuildCommand, checkoutDir: string, revision: Revision): Promise<number> {
    const [bin, ...args] = this.argvOf(command);
    const run = await this.runner.capture(bin, [...args, this.config.dryRunFlag], {
      cwd: join(checkoutDir, command.cwd),
    });

    if (run.failed) {
      throw new BuildFailureError(
        revision,
        command.argv,
        `dry run ${run.failureReason ?? 'failed'}`,
        {
          exitCode: run.exitCode,
          details: { stderrTail: tail(run.stderr) },
        },
      );
    }

    const output = selectPlanOutput(run, this.config.outputStream);
    return parsePlannedArtifacts(output, this.config.artifactPattern).length;
  }

  async run(command: BuildCommand, checkoutDir: string, revision: Revision): Promise<BuildRunResult> {
    const [bin, ...args] = this.argvOf(command);
    const run = await this.runner.inherit(bin, args, { cwd: join(checkoutDir, command.cwd) });

    if (run.exitCode === undefined) {
      throw new BuildFailureError(revision, command.argv, `build ${run.failureReason ?? 'failed'}`);
    }

    return { exitCode: run.exitCode, durationMs: run.durationMs };
  }

  private argvOf(command: BuildCommand): [string, ...string[]] {
    const [bin, ...args] = command.argv;
    if (!bin) {
      throw new UsageError('No build command given.');
    }
    return [bin, ...args];
  }
}
