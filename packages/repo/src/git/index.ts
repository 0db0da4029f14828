import { CommandRunner, type ProcessRunner } from '@rebisect/exec';
import { ProcessError, UsageError, type Revision, type Verdict } from '@rebisect/shared';

export interface GitServiceOptions {
  repoRoot: string;
  runner?: ProcessRunner;
}

export class GitService {
  private readonly repoRoot: string;
  private readonly runner: ProcessRunner;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
    this.runner = options.runner ?? new CommandRunner();
  }

  private async exec(args: string[], cwd: string = this.repoRoot): Promise<string> {
    const result = await this.runner.capture('git', args, { cwd });
    if (result.failed) {
      throw new ProcessError(`Git command failed: git ${args.join(' ')}\n${result.stderr.trim()}`, {
        exitCode: result.exitCode,
      });
    }
    return result.stdout.trim();
  }

  private lines(output: string): string[] {
    return output
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async getStatusPorcelain(): Promise<string> {
    return this.exec(['status', '--porcelain', '--untracked-files=no']);
  }

  async ensureCleanWorkingTree(): Promise<void> {
    const status = await this.getStatusPorcelain();
    if (status) {
      throw new UsageError(
        `Working tree is dirty. Please commit or stash your changes.\n\n${status}`,
      );
    }
  }

  /** Full hash of the commit `ref` names, or undefined when the ref does not exist */
  async resolveRef(ref: string): Promise<Revision | undefined> {
    const args = ['rev-parse', '--verify', '--quiet', `${ref}^{commit}`];
    const result = await this.runner.capture('git', args, { cwd: this.repoRoot });
    if (result.exitCode === 1) {
      return undefined;
    }
    if (result.failed) {
      throw new ProcessError(`Git command failed: git ${args.join(' ')}\n${result.stderr.trim()}`, {
        exitCode: result.exitCode,
      });
    }
    return result.stdout.trim();
  }

  /** Commit hashes of every ref matching `pattern`, e.g. `refs/bisect/good-*` */
  async listRefs(pattern: string): Promise<Revision[]> {
    return this.lines(await this.exec(['for-each-ref', '--format=%(objectname)', pattern]));
  }

  /** Commits reachable from `include` but not from `exclude`, oldest first */
  async revList(include: string[], exclude: string[]): Promise<Revision[]> {
    const args = ['rev-list', '--reverse', '--topo-order', ...include];
    if (exclude.length > 0) {
      args.push('--not', ...exclude);
    }
    return this.lines(await this.exec(args));
  }

  async bisect(verdict: Verdict, revision: Revision): Promise<string> {
    return this.exec(['bisect', verdict, revision]);
  }

  async checkout(revision: Revision, cwd: string = this.repoRoot): Promise<void> {
    await this.exec(['checkout', '--detach', '--quiet', revision], cwd);
  }

  async addWorktree(dir: string, revision: Revision = 'HEAD'): Promise<void> {
    await this.exec(['worktree', 'add', '--detach', '--quiet', dir, revision]);
  }

  async removeWorktree(dir: string): Promise<void> {
    await this.exec(['worktree', 'remove', '--force', dir]);
  }

  async pruneWorktrees(): Promise<void> {
    await this.exec(['worktree', 'prune']);
  }
}
