import type { StarsiftEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout starsift.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'CacheResolved', ... });
 *
 * // Standard logging
 * logger.debug('Cache file is empty, fetching stars');
 * logger.error(new Error('Failed'), 'Search failed');
 *
 * // Create a child logger with additional context
 * const userLogger = logger.child({ user: 'octocat' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   */
  log(event: StarsiftEvent): MaybePromise<void>;

  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(error: Error, message?: string): void;

  /**
   * Create a child logger whose messages carry the given bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
