import { AppError, type ErrorCode } from '@rebisect/shared';

export interface ErrorRenderOptions {
  json?: boolean;
  verbose?: boolean;
}

export interface ErrorSummary {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown> | string;
}

export function describeError(error: unknown): ErrorSummary {
  if (error instanceof AppError) {
    return { code: error.code, message: error.message, details: error.details };
  }
  return {
    code: 'UnknownError',
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Prints an error that escaped a command: a JSON object on stdout with `--json`,
 * otherwise a human-readable report on stderr.
 */
export function renderError(error: unknown, options: ErrorRenderOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify({ error: describeError(error) }));
    return;
  }

  console.error(`❌ Error: ${(error instanceof Error && error.message) || String(error)}`);
  if (error instanceof AppError && error.details) {
    console.error(
      `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
    );
  }
  if (options.verbose && error instanceof Error && error.stack) {
    console.error(`\nStack Trace:\n${error.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}
