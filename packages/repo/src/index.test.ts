import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { UsageError } from '@rebisect/shared';
import { findRepoRoot } from './index';

describe('findRepoRoot', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rebisect-repo-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should find root with .git', async () => {
    const root = path.join(tmpDir, 'repo-git');
    await fs.mkdir(path.join(root, '.git'), { recursive: true });

    const subdir = path.join(root, 'pkgs', 'tools');
    await fs.mkdir(subdir, { recursive: true });

    const result = await findRepoRoot(subdir);
    expect(result).toBe(root);
  });

  it('should accept a .git file of a linked worktree', async () => {
    const root = path.join(tmpDir, 'linked');
    await fs.mkdir(root, { recursive: true });
    await fs.writeFile(path.join(root, '.git'), 'gitdir: /elsewhere/.git/worktrees/linked\n');

    const result = await findRepoRoot(root);
    expect(result).toBe(root);
  });

  it('should throw if not found', async () => {
    const nonRepo = path.join(tmpDir, 'non-repo');
    await fs.mkdir(nonRepo, { recursive: true });
    await expect(findRepoRoot(nonRepo)).rejects.toThrow('Could not detect repository root');
    await expect(findRepoRoot(nonRepo)).rejects.toBeInstanceOf(UsageError);
  });
});
