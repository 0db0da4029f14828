import type { Revision, Verdict } from './bisect';

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Base interface for all bisection events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the CLI invocation */
  sessionId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when the candidate range has been read from revision control */
export interface RangeLoaded extends BaseEvent {
  type: 'RangeLoaded';
  payload: {
    size: number;
    first?: Revision;
    badBoundary?: Revision;
  };
}

/** Emitted when a cost is served from the store */
export interface CostCacheHit extends BaseEvent {
  type: 'CostCacheHit';
  payload: {
    signature: string;
    revision: Revision;
    cost: number;
  };
}

/** Emitted after a successful dry run */
export interface CostMeasured extends BaseEvent {
  type: 'CostMeasured';
  payload: {
    signature: string;
    revision: Revision;
    cost: number;
    durationMs: number;
  };
}

/** Emitted when a dry run fails; nothing is stored */
export interface CostMeasureFailed extends BaseEvent {
  type: 'CostMeasureFailed';
  payload: {
    signature: string;
    revision: Revision;
    attempt: number;
    message: string;
  };
}

/** Emitted when the cost store skips a record it cannot decode */
export interface CacheRecordCorrupt extends BaseEvent {
  type: 'CacheRecordCorrupt';
  payload: {
    location: string;
    message: string;
  };
}

/** Emitted when the selector picks the next probe */
export interface CandidateSelected extends BaseEvent {
  type: 'CandidateSelected';
  payload: {
    revision: Revision;
    cost: number;
    expectedCost: number;
    rangeSize: number;
  };
}

/** Emitted before the real build of a probe */
export interface BuildStarted extends BaseEvent {
  type: 'BuildStarted';
  payload: {
    revision: Revision;
    command: string;
  };
}

/** Emitted after the real build of a probe */
export interface BuildFinished extends BaseEvent {
  type: 'BuildFinished';
  payload: {
    revision: Revision;
    exitCode: number;
    durationMs: number;
  };
}

/** Emitted when a verdict has been forwarded to revision control */
export interface VerdictRecorded extends BaseEvent {
  type: 'VerdictRecorded';
  payload: {
    revision: Revision;
    verdict: Verdict;
    remaining: number;
  };
}

/** Emitted when the range has narrowed to a single revision */
export interface CulpritFound extends BaseEvent {
  type: 'CulpritFound';
  payload: {
    revision: Revision;
    steps: number;
    totalCost: number;
  };
}

export type BisectEvent =
  | RangeLoaded
  | CostCacheHit
  | CostMeasured
  | CostMeasureFailed
  | CacheRecordCorrupt
  | CandidateSelected
  | BuildStarted
  | BuildFinished
  | VerdictRecorded
  | CulpritFound;

export type BisectEventType = BisectEvent['type'];

/**
 * Metadata shared by every event, stamped with the current time.
 *
 * @example
 * ```typescript
 * logger.log({ ...eventBase(sessionId), type: 'RangeLoaded', payload: { size: 12 } });
 * ```
 */
export function eventBase(sessionId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    sessionId,
  };
}
