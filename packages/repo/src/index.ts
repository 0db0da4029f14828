import * as fs from 'fs/promises';
import * as path from 'path';
import { UsageError } from '@rebisect/shared';

export * from './git/index';
export * from './git/bisect';
export * from './worktree/pool';

/**
 * Finds the repository root starting from the current directory: the nearest parent
 * containing `.git` (a directory, or a file for linked worktrees).
 */
export async function findRepoRoot(cwd: string = process.cwd()): Promise<string> {
  const root = path.parse(cwd).root;
  let currentDir = path.resolve(cwd);

  while (true) {
    if (await isRepoRoot(currentDir)) {
      return currentDir;
    }

    if (currentDir === root) {
      break;
    }
    currentDir = path.dirname(currentDir);
  }

  throw new UsageError(
    `Could not detect repository root from ${cwd}. Ensure you are inside a git repository.`,
  );
}

async function isRepoRoot(dir: string): Promise<boolean> {
  try {
    await fs.access(path.join(dir, '.git'));
    return true;
  } catch {
    return false;
  }
}
