import {
  InconsistentVerdictsError,
  UsageError,
  type Revision,
  type RevisionCost,
} from '@rebisect/shared';

export const DEFAULT_MAX_CANDIDATES = 1500;

export interface SelectorOptions {
  /** Largest range the planner accepts */
  maxCandidates?: number;
}

/** What a verdict on a probe leaves behind. */
export interface ProbeOutcome {
  /** Revisions left in the range, including the known-bad boundary */
  remaining: number;
  /** Expected rebuilds still needed afterwards */
  expectedCost: number;
}

export interface RankedProbe {
  index: number;
  revision: Revision;
  /** Rebuilds paid to test this revision */
  cost: number;
  /** Expected rebuilds until the culprit is identified when this revision is tested next */
  expectedCost: number;
  ifGood: ProbeOutcome;
  ifBad: ProbeOutcome;
}

/**
 * Optimal probes for every contiguous sub-range of a candidate range.
 *
 * Ranges are half-open `[lo, hi)` over positions of the original range. The newest position
 * of a range is its known-bad boundary and is never probed.
 */
export interface BisectionPlan {
  readonly size: number;
  revisionAt(index: number): Revision;
  /** Rebuild cost of the revision at `index` */
  costOf(index: number): number;
  /** Position to test next in `[lo, hi)` */
  pivot(lo: number, hi: number): number;
  /** Expected rebuilds until the culprit is identified, over a uniformly distributed culprit */
  expectedCost(lo: number, hi: number): number;
  /** Every probe of `[lo, hi)`, best first */
  rank(lo: number, hi: number): RankedProbe[];
}

function validateCosts(costs: readonly RevisionCost[], maxCandidates: number): void {
  if (costs.length === 0) {
    throw new InconsistentVerdictsError(
      'No candidate revision is left; the recorded verdicts contradict each other.',
    );
  }
  if (costs.length > maxCandidates) {
    throw new UsageError(
      `The range holds ${costs.length} revisions, more than the ${maxCandidates} the planner accepts. ` +
        'Narrow it with a few plain `git bisect` steps first, or raise selection.maxCandidates.',
    );
  }
  if (costs.length === 1) {
    return;
  }
  for (const { revision, cost } of costs) {
    if (!Number.isSafeInteger(cost) || cost < 0) {
      throw new UsageError(`Invalid rebuild cost ${cost} for revision ${revision}.`);
    }
  }
}

/** Distance of position `i` from the middle of `[lo, hi)`, doubled to stay integral. */
function midpointDistance(i: number, lo: number, hi: number): number {
  return Math.abs(2 * i - (lo + hi - 1));
}

class DynamicPlan implements BisectionPlan {
  readonly size: number;
  private readonly stride: number;
  private readonly cost: Float64Array;
  /** Sum over culprit positions of the rebuilds paid, i.e. `size * expected cost` */
  private readonly total: Float64Array;
  private readonly best: Int32Array;

  constructor(private readonly costs: readonly RevisionCost[]) {
    const n = costs.length;
    this.size = n;
    this.stride = n + 1;
    this.cost = Float64Array.from(costs, (c) => c.cost);
    this.total = new Float64Array(this.stride * this.stride);
    this.best = new Int32Array(this.stride * this.stride).fill(-1);

    for (let lo = 0; lo < n; lo++) {
      this.best[this.at(lo, lo + 1)] = lo;
    }

    for (let len = 2; len <= n; len++) {
      for (let lo = 0; lo + len <= n; lo++) {
        const hi = lo + len;
        let bestTotal = Infinity;
        let bestIndex = -1;
        for (let i = lo; i < hi - 1; i++) {
          const candidate = this.splitTotal(lo, hi, i);
          if (
            candidate < bestTotal ||
            (candidate === bestTotal &&
              midpointDistance(i, lo, hi) < midpointDistance(bestIndex, lo, hi))
          ) {
            bestTotal = candidate;
            bestIndex = i;
          }
        }
        this.total[this.at(lo, hi)] = bestTotal;
        this.best[this.at(lo, hi)] = bestIndex;
      }
    }
  }

  revisionAt(index: number): Revision {
    const entry = this.costs[index];
    if (!entry) {
      throw new RangeError(`No revision at position ${index}`);
    }
    return entry.revision;
  }

  costOf(index: number): number {
    this.revisionAt(index);
    return this.costAt(index);
  }

  pivot(lo: number, hi: number): number {
    this.checkRange(lo, hi);
    return this.best[this.at(lo, hi)] ?? lo;
  }

  expectedCost(lo: number, hi: number): number {
    this.checkRange(lo, hi);
    return this.totalOf(lo, hi) / (hi - lo);
  }

  rank(lo: number, hi: number): RankedProbe[] {
    this.checkRange(lo, hi);
    const probes: Array<RankedProbe & { splitTotal: number }> = [];
    for (let i = lo; i < hi - 1; i++) {
      const splitTotal = this.splitTotal(lo, hi, i);
      probes.push({
        index: i,
        revision: this.revisionAt(i),
        cost: this.costAt(i),
        expectedCost: splitTotal / (hi - lo),
        ifBad: { remaining: i + 1 - lo, expectedCost: this.totalOf(lo, i + 1) / (i + 1 - lo) },
        ifGood: { remaining: hi - i - 1, expectedCost: this.totalOf(i + 1, hi) / (hi - i - 1) },
        splitTotal,
      });
    }

    probes.sort(
      (a, b) =>
        a.splitTotal - b.splitTotal ||
        midpointDistance(a.index, lo, hi) - midpointDistance(b.index, lo, hi) ||
        a.index - b.index,
    );
    return probes.map(({ splitTotal: _splitTotal, ...probe }) => probe);
  }

  /** Total over culprit positions when `i` is tested first in `[lo, hi)` */
  private splitTotal(lo: number, hi: number, i: number): number {
    return (hi - lo) * this.costAt(i) + this.totalOf(lo, i + 1) + this.totalOf(i + 1, hi);
  }

  private costAt(i: number): number {
    return this.cost[i] ?? 0;
  }

  private totalOf(lo: number, hi: number): number {
    return this.total[this.at(lo, hi)] ?? 0;
  }

  private at(lo: number, hi: number): number {
    return lo * this.stride + hi;
  }

  private checkRange(lo: number, hi: number): void {
    if (!Number.isInteger(lo) || !Number.isInteger(hi) || lo < 0 || hi > this.size || hi <= lo) {
      throw new RangeError(`Invalid range [${lo}, ${hi}) for a plan of ${this.size} revisions`);
    }
  }
}

/**
 * Plans a whole bisection session over `costs`, ordered oldest first with the known-bad
 * boundary last. Takes `O(n^3)` time and `O(n^2)` memory.
 */
export function planBisection(
  costs: readonly RevisionCost[],
  options: SelectorOptions = {},
): BisectionPlan {
  validateCosts(costs, options.maxCandidates ?? DEFAULT_MAX_CANDIDATES);
  return new DynamicPlan(costs);
}

/**
 * The revision to test next: the one minimizing the expected rebuilds still needed to
 * identify the culprit. A single remaining revision is the culprit itself.
 */
export function chooseNext(costs: readonly RevisionCost[], options: SelectorOptions = {}): Revision {
  const plan = planBisection(costs, options);
  return plan.revisionAt(plan.pivot(0, plan.size));
}
