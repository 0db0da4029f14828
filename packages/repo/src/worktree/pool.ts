import { withDir } from 'tmp-promise';
import { join, type Checkout, type Revision } from '@rebisect/shared';
import type { GitService } from '../git/index';

export interface WorktreePoolOptions {
  /** Directory the worktrees are created in */
  baseDir: string;
  /** Most worktrees held at once */
  size?: number;
}

/**
 * Detached git worktrees shared by concurrent measurements.
 * Worktrees are created on demand, up to `size`, and reused across revisions.
 */
export class WorktreePool implements Checkout {
  private readonly baseDir: string;
  private readonly size: number;
  private readonly created: string[] = [];
  private readonly idle: string[] = [];
  private readonly waiters: Array<() => void> = [];
  private pending = 0;
  private nextId = 0;

  constructor(
    private readonly git: GitService,
    options: WorktreePoolOptions,
  ) {
    this.baseDir = options.baseDir;
    this.size = Math.max(1, options.size ?? 1);
  }

  async materialize<T>(revision: Revision, use: (dir: string) => Promise<T>): Promise<T> {
    const dir = await this.acquire(revision);
    try {
      await this.git.checkout(revision, dir);
      return await use(dir);
    } finally {
      this.release(dir);
    }
  }

  /** Worktrees created so far */
  get worktrees(): readonly string[] {
    return this.created;
  }

  private async acquire(revision: Revision): Promise<string> {
    for (;;) {
      const idle = this.idle.pop();
      if (idle !== undefined) {
        return idle;
      }

      if (this.created.length + this.pending < this.size) {
        return this.create(revision);
      }

      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  private async create(revision: Revision): Promise<string> {
    const dir = join(this.baseDir, `w${this.nextId++}`);
    this.pending++;
    try {
      await this.git.addWorktree(dir, revision);
    } catch (error) {
      this.pending--;
      this.wake();
      throw error;
    }
    this.pending--;
    this.created.push(dir);
    return dir;
  }

  private release(dir: string): void {
    this.idle.push(dir);
    this.wake();
  }

  private wake(): void {
    this.waiters.shift()?.();
  }

  /** Removes every worktree, then prunes git's worktree list */
  async close(): Promise<void> {
    let firstError: unknown;
    for (const dir of this.created.splice(0)) {
      try {
        await this.git.removeWorktree(dir);
      } catch (error) {
        firstError ??= error;
      }
    }
    this.idle.length = 0;
    await this.git.pruneWorktrees();
    if (firstError !== undefined) {
      throw firstError;
    }
  }
}

/**
 * Runs `fn` with a worktree pool under a fresh temporary directory.
 * The worktrees and the directory are removed when `fn` settles, whether or not it throws.
 */
export async function withWorktree<T>(
  git: GitService,
  options: { size?: number },
  fn: (pool: WorktreePool) => Promise<T>,
): Promise<T> {
  return withDir(
    async ({ path }) => {
      const pool = new WorktreePool(git, { baseDir: path, size: options.size });
      try {
        return await fn(pool);
      } finally {
        await pool.close();
      }
    },
    { prefix: 'rebisect-', unsafeCleanup: true },
  );
}
