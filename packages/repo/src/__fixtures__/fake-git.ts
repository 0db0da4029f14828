import type { CaptureOptions, CapturedRun, InheritedRun, ProcessRunner } from '@rebisect/exec';

export interface GitCall {
  args: string[];
  cwd: string;
}

type Reply = Partial<CapturedRun> | ((call: GitCall) => Partial<CapturedRun>);

/**
 * In-process stand-in for the git binary. Replies are matched on the joined argument list;
 * unmatched commands succeed with empty output.
 */
export class FakeGit implements ProcessRunner {
  readonly calls: GitCall[] = [];
  private readonly replies = new Map<string, Reply>();

  on(args: string[], reply: Reply): this {
    this.replies.set(args.join(' '), reply);
    return this;
  }

  commands(): string[] {
    return this.calls.map((call) => call.args.join(' '));
  }

  async capture(bin: string, args: string[], options: CaptureOptions): Promise<CapturedRun> {
    const call = { args, cwd: options.cwd };
    this.calls.push(call);
    const reply = this.replies.get(args.join(' '));
    const partial = typeof reply === 'function' ? reply(call) : (reply ?? {});
    return {
      exitCode: 0,
      stdout: '',
      stderr: '',
      durationMs: 1,
      failed: false,
      ...partial,
    };
  }

  async inherit(bin: string, args: string[], options: CaptureOptions): Promise<InheritedRun> {
    const { exitCode, durationMs, failed, failureReason } = await this.capture(bin, args, options);
    return { exitCode, durationMs, failed, failureReason };
  }
}

export function failure(stderr: string, exitCode = 128): Partial<CapturedRun> {
  return { exitCode, stderr, failed: true, failureReason: `exited with code ${exitCode}` };
}
