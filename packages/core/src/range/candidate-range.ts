import {
  UsageError,
  type Revision,
  type RevisionControl,
  type Verdict,
} from '@rebisect/shared';

/**
 * The range left after a verdict on `revision`. A bad revision becomes the new
 * boundary; a good one drops itself and everything older.
 */
export function narrowRange(
  range: readonly Revision[],
  revision: Revision,
  verdict: Verdict,
): Revision[] {
  const index = range.indexOf(revision);
  if (index < 0) {
    throw new UsageError(`Revision ${revision} is not in the candidate range.`);
  }
  return verdict === 'bad' ? range.slice(0, index + 1) : range.slice(index + 1);
}

/** Position of `inner` inside `outer` when it is a non-empty contiguous run of it. */
export function subRangeOffset(
  outer: readonly Revision[],
  inner: readonly Revision[],
): number | undefined {
  const first = inner[0];
  if (first === undefined || inner.length > outer.length) {
    return undefined;
  }
  const start = outer.indexOf(first);
  if (start < 0 || !inner.every((revision, offset) => outer[start + offset] === revision)) {
    return undefined;
  }
  return start;
}

/**
 * True when `inner` is non-empty, shorter than `outer`, and drawn from it. On merge
 * history a good verdict can remove revisions from the middle of `outer`, so `inner`
 * need not be contiguous.
 */
export function isStrictSubRange(outer: readonly Revision[], inner: readonly Revision[]): boolean {
  if (inner.length === 0 || inner.length >= outer.length) {
    return false;
  }
  const members = new Set(outer);
  return inner.every((revision) => members.has(revision));
}

/**
 * Revision control held in memory, for simulations and tests.
 */
export class ScriptedRevisionControl implements RevisionControl {
  private range: Revision[];
  readonly verdicts: Array<{ revision: Revision; verdict: Verdict }> = [];

  constructor(revisions: readonly Revision[]) {
    this.range = [...revisions];
  }

  async currentRange(): Promise<Revision[]> {
    return [...this.range];
  }

  async recordVerdict(revision: Revision, verdict: Verdict): Promise<void> {
    this.range = narrowRange(this.range, revision, verdict);
    this.verdicts.push({ revision, verdict });
  }
}
