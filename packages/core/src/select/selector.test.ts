import { describe, it, expect } from 'vitest';
import { InconsistentVerdictsError, UsageError, type RevisionCost } from '@rebisect/shared';
import { chooseNext, planBisection, type BisectionPlan } from './selector';

function range(costs: number[]): RevisionCost[] {
  return costs.map((cost, i) => ({ revision: String.fromCharCode(65 + i), cost }));
}

/** Rebuilds paid when the plan's pivots are followed and `culprit` is the first bad position. */
function simulate(plan: BisectionPlan, costs: number[], culprit: number): number {
  let lo = 0;
  let hi = plan.size;
  let paid = 0;
  while (hi - lo > 1) {
    const probe = plan.pivot(lo, hi);
    paid += costs[probe] ?? 0;
    if (culprit <= probe) {
      hi = probe + 1;
    } else {
      lo = probe + 1;
    }
  }
  expect(lo).toBe(culprit);
  return paid;
}

describe('chooseNext', () => {
  it('returns the single remaining revision without looking at its cost', () => {
    expect(chooseNext([{ revision: 'abc', cost: -1 }])).toBe('abc');
  });

  it('rejects an empty range', () => {
    expect(() => chooseNext([])).toThrow(InconsistentVerdictsError);
  });

  it('rejects negative, fractional and non-finite costs', () => {
    expect(() => chooseNext(range([1, -2, 3]))).toThrow(UsageError);
    expect(() => chooseNext(range([1, 2.5, 3]))).toThrow('Invalid rebuild cost 2.5 for revision B.');
    expect(() => chooseNext(range([1, Number.NaN, 3]))).toThrow(UsageError);
    expect(() => chooseNext(range([1, Infinity, 3]))).toThrow(UsageError);
  });

  it('refuses ranges above maxCandidates', () => {
    expect(() => chooseNext(range([1, 1, 1, 1]), { maxCandidates: 3 })).toThrow(
      /holds 4 revisions, more than the 3/,
    );
  });

  it('never probes the known-bad boundary', () => {
    expect(chooseNext(range([5, 0]))).toBe('A');
    expect(chooseNext(range([100, 100, 0]))).not.toBe('C');
  });

  it('tests a cheap revision before an expensive one', () => {
    expect(chooseNext(range([1, 100, 1]))).toBe('A');
  });

  it('steps around a mass rebuild', () => {
    expect(chooseNext(range([2, 2, 50, 2, 2]))).toBe('B');
  });

  it('bisects at floor((n - 1) / 2) when every revision costs the same', () => {
    for (let n = 1; n <= 40; n++) {
      const picked = chooseNext(range(Array.from({ length: n }, () => 7)).map((c, i) => ({ ...c, revision: `r${i}` })));
      expect(picked).toBe(`r${Math.floor((n - 1) / 2)}`);
    }
  });

  it('bisects at the midpoint when every revision is free', () => {
    const costs = Array.from({ length: 9 }, (_, i) => ({ revision: `r${i}`, cost: 0 }));
    expect(chooseNext(costs)).toBe('r4');
  });

  it('is deterministic', () => {
    const costs = range([3, 8, 1, 0, 4, 4, 9, 2]);
    expect(chooseNext(costs)).toBe(chooseNext(costs));
  });
});

describe('planBisection', () => {
  it('computes the expected cost exactly', () => {
    const plan = planBisection(range([2, 2, 50, 2, 2]));

    expect(plan.expectedCost(0, 5)).toBe(24);
    expect(plan.expectedCost(0, 3)).toBeCloseTo(10 / 3);
    expect(plan.expectedCost(2, 4)).toBe(50);
    expect(plan.expectedCost(4, 5)).toBe(0);
  });

  it('answers narrowed ranges without replanning', () => {
    const plan = planBisection(range([2, 2, 50, 2, 2]));

    // B good: C, D and E remain
    expect(plan.pivot(2, 5)).toBe(3);
    // B bad: A and B remain
    expect(plan.pivot(0, 2)).toBe(0);
    // ties go to the probe nearest the middle
    expect(plan.pivot(0, 3)).toBe(1);
    expect(plan.pivot(1, 5)).toBe(3);
  });

  it('pays the planned total over every culprit position', () => {
    const cases = [
      [2, 2, 50, 2, 2],
      [1, 100, 1],
      [3, 8, 1, 0, 4, 4, 9, 2],
      [0, 0, 0, 1000, 0, 0, 7, 7, 7, 7, 1],
    ];
    for (const costs of cases) {
      const plan = planBisection(range(costs));
      let total = 0;
      for (let culprit = 0; culprit < costs.length; culprit++) {
        total += simulate(plan, costs, culprit);
      }
      expect(total / costs.length).toBeCloseTo(plan.expectedCost(0, costs.length));
    }
  });

  it('does no worse than plain bisection', () => {
    const costs = [40, 1, 1, 1, 90, 2, 2, 2, 60, 3, 3, 3, 3, 1];
    const plan = planBisection(range(costs));
    const uniform = planBisection(range(costs.map(() => 1)));

    let plain = 0;
    for (let culprit = 0; culprit < costs.length; culprit++) {
      let lo = 0;
      let hi = costs.length;
      while (hi - lo > 1) {
        const probe = uniform.pivot(lo, hi);
        plain += costs[probe] ?? 0;
        if (culprit <= probe) hi = probe + 1;
        else lo = probe + 1;
      }
    }

    expect(plan.expectedCost(0, costs.length)).toBeLessThanOrEqual(plain / costs.length);
  });

  it('ranks every probe with both outcomes', () => {
    const plan = planBisection(range([1, 100, 1]));

    expect(plan.rank(0, 3)).toEqual([
      {
        index: 0,
        revision: 'A',
        cost: 1,
        expectedCost: 203 / 3,
        ifBad: { remaining: 1, expectedCost: 0 },
        ifGood: { remaining: 2, expectedCost: 100 },
      },
      {
        index: 1,
        revision: 'B',
        cost: 100,
        expectedCost: 302 / 3,
        ifBad: { remaining: 2, expectedCost: 1 },
        ifGood: { remaining: 1, expectedCost: 0 },
      },
    ]);
  });

  it('ranks the pivot first', () => {
    const plan = planBisection(range([3, 8, 1, 0, 4, 4, 9, 2]));

    for (let lo = 0; lo < plan.size - 1; lo++) {
      for (let hi = lo + 2; hi <= plan.size; hi++) {
        expect(plan.rank(lo, hi)[0]?.index).toBe(plan.pivot(lo, hi));
        expect(plan.rank(lo, hi)[0]?.expectedCost).toBeCloseTo(plan.expectedCost(lo, hi));
      }
    }
  });

  it('has nothing to rank once the culprit is known', () => {
    const plan = planBisection(range([4, 4]));
    expect(plan.rank(1, 2)).toEqual([]);
    expect(plan.pivot(1, 2)).toBe(1);
  });

  it('rejects ranges outside the plan', () => {
    const plan = planBisection(range([1, 2, 3]));
    expect(() => plan.pivot(0, 4)).toThrow(RangeError);
    expect(() => plan.expectedCost(2, 2)).toThrow(RangeError);
  });
});
