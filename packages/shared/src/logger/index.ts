export type { Logger, MaybePromise } from './types';
export { ConsoleLogger, type ConsoleLoggerOptions } from './consoleLogger';
