import {
  BuildFailureError,
  InconsistentVerdictsError,
  eventBase,
  type BuildCommand,
  type BuildInvoker,
  type Checkout,
  type Logger,
  type Revision,
  type RevisionControl,
  type RevisionCost,
  type Verdict,
} from '@rebisect/shared';
import type { CostCache } from '../cache/cost-cache';
import { isStrictSubRange, subRangeOffset } from '../range/candidate-range';
import { planBisection, type BisectionPlan, type RankedProbe } from '../select/selector';
import type { VerdictSource } from './verdict';

export const DEFAULT_MAX_STEPS = 64;

export interface MeasureOptions {
  cache: CostCache;
  command: BuildCommand;
  /** Dry runs in flight at once */
  concurrency?: number;
}

export interface BisectionDriverOptions extends MeasureOptions {
  control: RevisionControl;
  checkout: Checkout;
  invoker: BuildInvoker;
  verdicts: VerdictSource;
  logger: Logger;
  sessionId: string;
  maxSteps?: number;
  maxCandidates?: number;
}

export interface BisectionStep {
  revision: Revision;
  cost: number;
  verdict: Verdict;
  /** Size of the range after the verdict */
  remaining: number;
}

export interface BisectionReport {
  culprit: Revision;
  steps: BisectionStep[];
  /** Rebuilds paid for the tested revisions, as measured by dry run */
  totalCost: number;
}

export interface Suggestion {
  range: Revision[];
  costs: RevisionCost[];
  plan: BisectionPlan;
  /** Best probes first; empty when the culprit is already known */
  probes: RankedProbe[];
}

/** Costs of every revision of `range`, through the cache. */
export async function measureRange(
  range: readonly Revision[],
  { cache, command, concurrency }: MeasureOptions,
): Promise<RevisionCost[]> {
  const costs = await cache.getOrComputeMany(command, range, { concurrency });
  return range.map((revision, i) => ({ revision, cost: costs[i] ?? 0 }));
}

/**
 * Costs the planner reads. The known-bad boundary is never built, so it is not measured
 * and carries a cost of 0.
 */
async function planningCosts(
  range: readonly Revision[],
  options: MeasureOptions,
): Promise<RevisionCost[]> {
  const boundary = range[range.length - 1];
  if (boundary === undefined) {
    return [];
  }
  const probes = range.length > 1 ? await measureRange(range.slice(0, -1), options) : [];
  return [...probes, { revision: boundary, cost: 0 }];
}

/**
 * One-shot advice for a bisection driven by hand: measure the range and rank its probes.
 */
export async function suggestProbes(
  range: readonly Revision[],
  options: MeasureOptions & { maxCandidates?: number },
): Promise<Suggestion> {
  const costs = await planningCosts(range, options);
  const plan = planBisection(costs, { maxCandidates: options.maxCandidates });
  return { range: [...range], costs, plan, probes: plan.rank(0, plan.size) };
}

/**
 * Runs a whole bisection: measure, pick the cheapest probe in expectation, build it,
 * ask for a verdict, and repeat until one revision is left.
 *
 * Costs are measured and planned once; later steps reuse the plan while the range
 * is a contiguous run of the planned one, and re-plan from the cache otherwise.
 */
export class BisectionDriver {
  private readonly maxSteps: number;

  constructor(private readonly options: BisectionDriverOptions) {
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  }

  async run(): Promise<BisectionReport> {
    const { control, logger, sessionId } = this.options;
    const steps: BisectionStep[] = [];
    let totalCost = 0;
    let session: { range: Revision[]; plan: BisectionPlan } | undefined;

    let range = await control.currentRange();
    await logger.log({
      ...eventBase(sessionId),
      type: 'RangeLoaded',
      payload: { size: range.length, first: range[0], badBoundary: range[range.length - 1] },
    });

    for (;;) {
      const only = range.length === 1 ? range[0] : undefined;
      if (only !== undefined) {
        await logger.trace(
          {
            ...eventBase(sessionId),
            type: 'CulpritFound',
            payload: { revision: only, steps: steps.length, totalCost },
          },
          `${only} is the first bad revision`,
        );
        return { culprit: only, steps, totalCost };
      }

      if (steps.length >= this.maxSteps) {
        throw new InconsistentVerdictsError(
          `No culprit after ${this.maxSteps} steps; ${range.length} revisions are still in range.`,
        );
      }

      let offset = session ? subRangeOffset(session.range, range) : undefined;
      if (session === undefined || offset === undefined) {
        const costs = await planningCosts(range, this.options);
        session = {
          range,
          plan: planBisection(costs, { maxCandidates: this.options.maxCandidates }),
        };
        offset = 0;
      }

      const { plan } = session;
      const index = plan.pivot(offset, offset + range.length);
      const revision = plan.revisionAt(index);
      const cost = plan.costOf(index);

      await logger.trace(
        {
          ...eventBase(sessionId),
          type: 'CandidateSelected',
          payload: {
            revision,
            cost,
            expectedCost: plan.expectedCost(offset, offset + range.length),
            rangeSize: range.length,
          },
        },
        `Testing ${revision} (${cost} to build, ${range.length} candidates left)`,
      );

      const verdict = await this.buildAndJudge(revision);
      totalCost += cost;

      await control.recordVerdict(revision, verdict);
      const next = await control.currentRange();
      if (next.length === 0) {
        throw new InconsistentVerdictsError(
          `Recording ${verdict} for ${revision} left no candidate revision; earlier verdicts contradict it.`,
        );
      }
      if (!isStrictSubRange(range, next)) {
        throw new InconsistentVerdictsError(
          `Recording ${verdict} for ${revision} did not narrow the candidate range.`,
          { details: { before: range.length, after: next.length } },
        );
      }

      steps.push({ revision, cost, verdict, remaining: next.length });
      await logger.trace(
        {
          ...eventBase(sessionId),
          type: 'VerdictRecorded',
          payload: { revision, verdict, remaining: next.length },
        },
        `${revision} is ${verdict}; ${next.length} candidates left`,
      );
      range = next;
    }
  }

  private async buildAndJudge(revision: Revision): Promise<Verdict> {
    const { checkout, invoker, verdicts, command, logger, sessionId } = this.options;

    return checkout.materialize(revision, async (dir) => {
      await logger.log({
        ...eventBase(sessionId),
        type: 'BuildStarted',
        payload: { revision, command: command.argv.join(' ') },
      });
      const build = await invoker.run(command, dir, revision);
      await logger.log({
        ...eventBase(sessionId),
        type: 'BuildFinished',
        payload: { revision, exitCode: build.exitCode, durationMs: build.durationMs },
      });

      if (build.exitCode !== 0) {
        throw new BuildFailureError(revision, command.argv, `build exited with code ${build.exitCode}`, {
          exitCode: build.exitCode,
        });
      }
      return verdicts.verdictFor({ revision, checkoutDir: dir, build });
    });
  }
}
