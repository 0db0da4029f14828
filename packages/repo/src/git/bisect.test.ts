import { describe, it, expect, beforeEach } from 'vitest';
import { UsageError } from '@rebisect/shared';
import { FakeGit } from '../__fixtures__/fake-git';
import { GitService } from './index';
import { GitBisectState } from './bisect';

const BAD = ['rev-parse', '--verify', '--quiet', 'refs/bisect/bad^{commit}'];
const GOODS = ['for-each-ref', '--format=%(objectname)', 'refs/bisect/good-*'];

describe('GitBisectState', () => {
  let git: FakeGit;
  let state: GitBisectState;

  beforeEach(() => {
    git = new FakeGit();
    state = new GitBisectState(new GitService({ repoRoot: '/repo', runner: git }));
  });

  it('returns the range between the good refs and the bad ref, bad last', async () => {
    git
      .on(BAD, { stdout: 'bad0\n' })
      .on(GOODS, { stdout: 'good1\ngood2\n' })
      .on(['rev-list', '--reverse', '--topo-order', 'bad0', '--not', 'good1', 'good2'], {
        stdout: 'c1\nc2\nc3\nbad0\n',
      });

    await expect(state.currentRange()).resolves.toEqual(['c1', 'c2', 'c3', 'bad0']);
  });

  it('requires a bad ref', async () => {
    git.on(BAD, { exitCode: 1, failed: true });

    await expect(state.currentRange()).rejects.toThrow(UsageError);
    await expect(state.currentRange()).rejects.toThrow('No bad revision is marked');
  });

  it('requires at least one good ref', async () => {
    git.on(BAD, { stdout: 'bad0\n' }).on(GOODS, { stdout: '' });

    await expect(state.currentRange()).rejects.toThrow('No good revision is marked');
  });

  it('records verdicts through git bisect', async () => {
    await state.recordVerdict('c2', 'good');

    expect(git.commands()).toEqual(['bisect good c2']);
  });
});
