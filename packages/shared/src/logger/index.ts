import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';

export type { Logger, MaybePromise } from './types';
export { formatBindings } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export { ConsoleLogger, JsonlLogger };
