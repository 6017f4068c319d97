import type { StarsiftEvent } from '../types/events';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Emit events, debug and info lines. Warnings and errors are always written. */
  verbose?: boolean;
}

/**
 * Logger writing to stderr only, so stdout carries nothing but results
 * (a table or a JSON document).
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  log(event: StarsiftEvent): void {
    if (this.verbose) {
      console.error(JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (this.verbose) {
      console.error(`DEBUG: ${message}`);
    }
  }

  info(message: string): void {
    if (this.verbose) {
      console.error(`INFO: ${message}`);
    }
  }

  warn(message: string): void {
    console.error(`WARN: ${message}`);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(`ERROR: ${message}`, error);
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

  log(event: StarsiftEvent) {
    return this.base.log(event);
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
