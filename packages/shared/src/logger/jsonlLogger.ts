import type { BisectEvent } from '../types/events';
import { appendText } from '../fs/io';
import type { ConsoleLoggerOptions } from './consoleLogger';
import { formatBindings, type Logger } from './types';

/**
 * Appends events to a JSONL trace file and writes messages to the console.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly options: ConsoleLoggerOptions;

  constructor(
    filePath: string,
    bindings: Record<string, unknown> = {},
    options: ConsoleLoggerOptions = {},
  ) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.options = options;
  }

  async log(event: BisectEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await appendText(this.filePath, line);
    } catch (error) {
      // A trace file that cannot be written must not stop a bisection.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: BisectEvent, message: string): Promise<void> {
    await this.log(event);
    this.info(message);
  }

  debug(message: string): void {
    if (this.options.verbose && !this.options.quiet) {
      console.debug(formatBindings(this.bindings, message));
    }
  }

  info(message: string): void {
    if (!this.options.quiet) {
      console.info(formatBindings(this.bindings, message));
    }
  }

  warn(message: string): void {
    console.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.options);
  }
}
