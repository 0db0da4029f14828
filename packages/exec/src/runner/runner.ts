import { execa } from 'execa';

export interface CaptureOptions {
  cwd: string;
  env?: Record<string, string>;
  /** Run `command` through the system shell instead of as an argv */
  shell?: boolean;
}

export interface CapturedRun {
  /** Undefined when the process could not be started or was killed by a signal */
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  durationMs: number;
  failed: boolean;
  /** Human-readable reason when `failed` is true */
  failureReason?: string;
}

export interface InheritedRun {
  exitCode: number | undefined;
  durationMs: number;
  failed: boolean;
  failureReason?: string;
}

/**
 * Process execution used by the build invoker, git, and verdict scripts.
 * Implementations never reject on a non-zero exit; callers decide what a failure means.
 */
export interface ProcessRunner {
  /** Runs to completion with stdout and stderr captured */
  capture(bin: string, args: string[], options: CaptureOptions): Promise<CapturedRun>;
  /** Runs to completion with stdio attached to the terminal */
  inherit(bin: string, args: string[], options: CaptureOptions): Promise<InheritedRun>;
}

function describeFailure(result: {
  failed: boolean;
  exitCode?: number;
  signal?: string;
}): string | undefined {
  if (!result.failed) return undefined;
  if (result instanceof Error) return result.message;
  if (result.signal) return `terminated by ${result.signal}`;
  if (result.exitCode !== undefined) return `exited with code ${result.exitCode}`;
  return 'could not be started';
}

export class CommandRunner implements ProcessRunner {
  async capture(bin: string, args: string[], options: CaptureOptions): Promise<CapturedRun> {
    const result = await execa(bin, args, {
      cwd: options.cwd,
      env: options.env,
      shell: options.shell ?? false,
      reject: false,
      stdin: 'ignore',
      stripFinalNewline: false,
    });

    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      durationMs: result.durationMs,
      failed: result.failed,
      failureReason: describeFailure(result),
    };
  }

  async inherit(bin: string, args: string[], options: CaptureOptions): Promise<InheritedRun> {
    const result = await execa(bin, args, {
      cwd: options.cwd,
      env: options.env,
      shell: options.shell ?? false,
      reject: false,
      stdio: 'inherit',
    });

    return {
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      failed: result.failed,
      failureReason: describeFailure(result),
    };
  }
}
