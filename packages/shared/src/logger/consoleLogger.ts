import type { BisectEvent } from '../types/events';
import { formatBindings, type Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print debug messages and raw events */
  verbose?: boolean;
  /** Drop informational messages, e.g. when stdout carries JSON */
  quiet?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly quiet: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.quiet = options.quiet ?? false;
  }

  log(event: BisectEvent): void {
    if (this.verbose && !this.quiet) {
      console.debug(JSON.stringify(event));
    }
  }

  trace(event: BisectEvent, message: string): void {
    this.log(event);
    this.info(message);
  }

  debug(message: string): void {
    if (this.verbose && !this.quiet) {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (!this.quiet) {
      console.info(message);
    }
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: BisectEvent) {
    return this.base.log(event);
  }

  trace(event: BisectEvent, message: string) {
    return this.base.trace(event, formatBindings(this.bindings, message));
  }

  debug(message: string) {
    return this.base.debug(formatBindings(this.bindings, message));
  }

  info(message: string) {
    return this.base.info(formatBindings(this.bindings, message));
  }

  warn(message: string) {
    return this.base.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? formatBindings(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }
}
