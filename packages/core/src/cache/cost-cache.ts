import {
  BuildFailureError,
  eventBase,
  type BuildCommand,
  type CostCacheStore,
  type Logger,
  type Revision,
} from '@rebisect/shared';
import type { CostOracle } from '../cost/oracle';
import { commandSignature } from '../cost/signature';
import { costKey } from './memory-store';

export interface CostCacheOptions {
  store: CostCacheStore;
  oracle: CostOracle;
  logger: Logger;
  sessionId: string;
  /** Dry-run flag; part of the command signature */
  dryRunFlag: string;
  /** Measurement attempts per revision before a BuildFailureError propagates */
  attempts?: number;
}

export interface ManyOptions {
  concurrency?: number;
}

/**
 * Cost lookups backed by a persistent store, filled through the oracle on a miss.
 * Failed measurements are never stored.
 */
export class CostCache {
  private readonly inFlight = new Map<string, Promise<number>>();
  private readonly attempts: number;

  constructor(private readonly options: CostCacheOptions) {
    this.attempts = Math.max(1, options.attempts ?? 1);
  }

  signatureOf(command: BuildCommand): string {
    return commandSignature(command, this.options.dryRunFlag);
  }

  async getOrCompute(command: BuildCommand, revision: Revision): Promise<number> {
    const signature = this.signatureOf(command);
    const key = costKey(signature, revision);

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const computation = this.lookupOrMeasure(command, signature, revision).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, computation);
    return computation;
  }

  /**
   * Costs of `revisions`, in input order. With `concurrency > 1` several measurements run at once;
   * if any fails, the first failure is rethrown once the others have settled.
   */
  async getOrComputeMany(
    command: BuildCommand,
    revisions: readonly Revision[],
    options: ManyOptions = {},
  ): Promise<number[]> {
    const concurrency = Math.max(1, options.concurrency ?? 1);
    const costs = new Array<number>(revisions.length);
    const failures: unknown[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < revisions.length && failures.length === 0) {
        const index = next++;
        const revision = revisions[index];
        if (revision === undefined) return;
        try {
          costs[index] = await this.getOrCompute(command, revision);
        } catch (error) {
          failures.push(error);
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, revisions.length) }, worker));

    if (failures.length > 0) {
      throw failures[0];
    }
    return costs;
  }

  private async lookupOrMeasure(
    command: BuildCommand,
    signature: string,
    revision: Revision,
  ): Promise<number> {
    const { store, logger, sessionId } = this.options;

    const cached = await store.get(signature, revision);
    if (cached) {
      await logger.log({
        ...eventBase(sessionId),
        type: 'CostCacheHit',
        payload: { signature, revision, cost: cached.cost },
      });
      return cached.cost;
    }

    const started = Date.now();
    const cost = await this.measureWithRetry(command, signature, revision);
    const kept = await store.insert({
      signature,
      revision,
      cost,
      measuredAt: new Date().toISOString(),
    });

    await logger.trace(
      {
        ...eventBase(sessionId),
        type: 'CostMeasured',
        payload: { signature, revision, cost: kept.cost, durationMs: Date.now() - started },
      },
      `${revision.slice(0, 12)}: ${kept.cost} to build`,
    );
    return kept.cost;
  }

  private async measureWithRetry(
    command: BuildCommand,
    signature: string,
    revision: Revision,
  ): Promise<number> {
    const { oracle, logger, sessionId } = this.options;

    for (let attempt = 1; ; attempt++) {
      try {
        return await oracle.measure(command, revision);
      } catch (error) {
        if (!(error instanceof BuildFailureError)) throw error;
        await logger.log({
          ...eventBase(sessionId),
          type: 'CostMeasureFailed',
          payload: { signature, revision, attempt, message: error.message },
        });
        if (attempt >= this.attempts) throw error;
        await logger.warn(`${error.message}; retrying (${attempt + 1}/${this.attempts})`);
      }
    }
  }
}
