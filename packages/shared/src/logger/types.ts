import type { BisectEvent } from '../types/events';

export type MaybePromise<T> = T | Promise<T>;

/**
 * Sink for the structured events of a bisection and for plain console messages.
 *
 * @example
 * ```typescript
 * await logger.trace(
 *   { ...eventBase(sessionId), type: 'VerdictRecorded', payload: { revision, verdict, remaining: 3 } },
 *   `${revision} is ${verdict}; 3 candidates left`,
 * );
 * const measuring = logger.child({ rev: revision.slice(0, 12) });
 * measuring.warn('dry run exited with code 1; retrying (1/2)');
 * ```
 */
export interface Logger {
  /** Records an event without printing anything */
  log(event: BisectEvent): MaybePromise<void>;

  /** Records an event and prints `message` as information */
  trace(event: BisectEvent, message: string): MaybePromise<void>;

  /** Printed with `--verbose` only */
  debug(message: string): MaybePromise<void>;

  info(message: string): MaybePromise<void>;

  warn(message: string): MaybePromise<void>;

  error(error: Error, message?: string): MaybePromise<void>;

  /** A logger whose messages start with `[key=value ...]` */
  child(bindings: Record<string, unknown>): Logger;
}

export function formatBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
