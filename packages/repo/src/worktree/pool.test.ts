import { describe, it, expect, beforeEach } from 'vitest';
import { access } from 'fs/promises';
import { FakeGit, failure } from '../__fixtures__/fake-git';
import { GitService } from '../git/index';
import { WorktreePool, withWorktree } from './pool';

describe('WorktreePool', () => {
  let git: FakeGit;
  let service: GitService;

  beforeEach(() => {
    git = new FakeGit();
    service = new GitService({ repoRoot: '/repo', runner: git });
  });

  it('creates one worktree and reuses it for sequential revisions', async () => {
    const pool = new WorktreePool(service, { baseDir: '/tmp/pool' });

    const first = await pool.materialize('c1', async (dir) => dir);
    const second = await pool.materialize('c2', async (dir) => dir);

    expect(first).toBe('/tmp/pool/w0');
    expect(second).toBe('/tmp/pool/w0');
    expect(git.calls).toEqual([
      { args: ['worktree', 'add', '--detach', '--quiet', '/tmp/pool/w0', 'c1'], cwd: '/repo' },
      { args: ['checkout', '--detach', '--quiet', 'c1'], cwd: '/tmp/pool/w0' },
      { args: ['checkout', '--detach', '--quiet', 'c2'], cwd: '/tmp/pool/w0' },
    ]);
  });

  it('never hands the same worktree to two holders at once', async () => {
    const pool = new WorktreePool(service, { baseDir: '/tmp/pool', size: 2 });
    const held = new Set<string>();
    let overlap = false;

    const use = async (dir: string) => {
      if (held.has(dir)) overlap = true;
      held.add(dir);
      await new Promise((resolve) => setTimeout(resolve, 5));
      held.delete(dir);
      return dir;
    };

    const dirs = await Promise.all(['c1', 'c2', 'c3', 'c4'].map((rev) => pool.materialize(rev, use)));

    expect(overlap).toBe(false);
    expect(pool.worktrees).toHaveLength(2);
    expect(new Set(dirs)).toEqual(new Set(['/tmp/pool/w0', '/tmp/pool/w1']));
  });

  it('releases the worktree when the holder throws', async () => {
    const pool = new WorktreePool(service, { baseDir: '/tmp/pool' });

    await expect(
      pool.materialize('c1', async () => {
        throw new Error('dry run exploded');
      }),
    ).rejects.toThrow('dry run exploded');

    await expect(pool.materialize('c2', async (dir) => dir)).resolves.toBe('/tmp/pool/w0');
  });

  it('removes every worktree and prunes on close', async () => {
    const pool = new WorktreePool(service, { baseDir: '/tmp/pool' });
    await pool.materialize('c1', async () => undefined);
    git.calls.length = 0;

    await pool.close();

    expect(git.commands()).toEqual(['worktree remove --force /tmp/pool/w0', 'worktree prune']);
    expect(pool.worktrees).toEqual([]);
  });

  it('still prunes when a removal fails, then reports the failure', async () => {
    git.on(['worktree', 'remove', '--force', '/tmp/pool/w0'], failure('fatal: locked'));
    const pool = new WorktreePool(service, { baseDir: '/tmp/pool' });
    await pool.materialize('c1', async () => undefined);

    await expect(pool.close()).rejects.toThrow('fatal: locked');
    expect(git.commands()).toContain('worktree prune');
  });
});

describe('withWorktree', () => {
  it('cleans up after a failing body', async () => {
    const git = new FakeGit();
    const service = new GitService({ repoRoot: '/repo', runner: git });
    let baseDir = '';

    await expect(
      withWorktree(service, {}, async (pool) => {
        await pool.materialize('c1', async (dir) => {
          baseDir = dir.slice(0, dir.lastIndexOf('/'));
        });
        throw new Error('stop');
      }),
    ).rejects.toThrow('stop');

    expect(git.commands().slice(-2)).toEqual([
      `worktree remove --force ${baseDir}/w0`,
      'worktree prune',
    ]);
    await expect(access(baseDir)).rejects.toThrow();
  });
});
