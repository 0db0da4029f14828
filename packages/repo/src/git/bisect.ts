import {
  UsageError,
  type Revision,
  type RevisionControl,
  type Verdict,
} from '@rebisect/shared';
import type { GitService } from './index';

export const BISECT_BAD_REF = 'refs/bisect/bad';
export const BISECT_GOOD_REFS = 'refs/bisect/good-*';

/**
 * Reads and advances the state of a `git bisect` session.
 *
 * The range is every commit reachable from the bad ref and from none of the good refs,
 * oldest first, so the bad commit itself comes last.
 */
export class GitBisectState implements RevisionControl {
  constructor(private readonly git: GitService) {}

  async currentRange(): Promise<Revision[]> {
    const bad = await this.git.resolveRef(BISECT_BAD_REF);
    if (!bad) {
      throw new UsageError(
        'No bad revision is marked. Start with `git bisect start` and `git bisect bad <rev>`.',
      );
    }

    const goods = await this.git.listRefs(BISECT_GOOD_REFS);
    if (goods.length === 0) {
      throw new UsageError('No good revision is marked. Run `git bisect good <rev>` first.');
    }

    return this.git.revList([bad], goods);
  }

  async recordVerdict(revision: Revision, verdict: Verdict): Promise<void> {
    await this.git.bisect(verdict, revision);
  }
}
