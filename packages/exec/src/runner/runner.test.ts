import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execa } from 'execa';
import { CommandRunner } from './runner';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

describe('CommandRunner', () => {
  let runner: CommandRunner;

  beforeEach(() => {
    vi.clearAllMocks();
    runner = new CommandRunner();
  });

  it('captures output without rejecting on a non-zero exit', async () => {
    vi.mocked(execa).mockResolvedValueOnce({
      exitCode: 1,
      stdout: '',
      stderr: 'error: attribute missing\n',
      durationMs: 12,
      failed: true,
    } as never);

    const result = await runner.capture('nix-build', ['-A', 'nope', '--dry-run'], {
      cwd: '/work/tree',
    });

    expect(result).toEqual({
      exitCode: 1,
      stdout: '',
      stderr: 'error: attribute missing\n',
      durationMs: 12,
      failed: true,
      failureReason: 'exited with code 1',
    });
    expect(vi.mocked(execa)).toHaveBeenCalledWith(
      'nix-build',
      ['-A', 'nope', '--dry-run'],
      expect.objectContaining({ cwd: '/work/tree', reject: false, shell: false }),
    );
  });

  it('reports successful runs without a failure reason', async () => {
    vi.mocked(execa).mockResolvedValueOnce({
      exitCode: 0,
      stdout: 'ok\n',
      stderr: '',
      durationMs: 3,
      failed: false,
    } as never);

    const result = await runner.capture('true', [], { cwd: '/tmp' });

    expect(result.failed).toBe(false);
    expect(result.failureReason).toBeUndefined();
  });

  it('describes processes killed by a signal', async () => {
    vi.mocked(execa).mockResolvedValueOnce({
      exitCode: undefined,
      signal: 'SIGKILL',
      stdout: '',
      stderr: '',
      durationMs: 3,
      failed: true,
    } as never);

    const result = await runner.capture('sleep', ['100'], { cwd: '/tmp' });

    expect(result.failureReason).toBe('terminated by SIGKILL');
  });

  it('describes processes that could not start', async () => {
    vi.mocked(execa).mockResolvedValueOnce({
      exitCode: undefined,
      stdout: '',
      stderr: '',
      durationMs: 1,
      failed: true,
    } as never);

    const result = await runner.capture('missing-bin', [], { cwd: '/tmp' });

    expect(result.failureReason).toBe('could not be started');
  });

  it('attaches stdio when inheriting and passes the shell flag', async () => {
    vi.mocked(execa).mockResolvedValueOnce({
      exitCode: 0,
      durationMs: 50,
      failed: false,
    } as never);

    const result = await runner.inherit('make && ./check', [], { cwd: '/work', shell: true });

    expect(result).toEqual({ exitCode: 0, durationMs: 50, failed: false, failureReason: undefined });
    expect(vi.mocked(execa)).toHaveBeenCalledWith(
      'make && ./check',
      [],
      expect.objectContaining({ cwd: '/work', shell: true, stdio: 'inherit', reject: false }),
    );
  });
});
