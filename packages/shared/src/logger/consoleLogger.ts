import type { RunEvent } from '../types/events';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print debug messages and structured events */
  verbose?: boolean;
}

/**
 * Writes diagnostics to stderr. Structured events are only echoed in verbose mode.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  log(event: RunEvent): void {
    if (this.verbose) {
      console.debug(JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (this.verbose) {
      console.debug(message);
    }
  }

  info(message: string): void {
    console.warn(message);
  }

  warn(message: string): void {
    console.warn(`WARNING: ${message}`);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(`ERROR: ${message}`, this.verbose ? error : error.message);
    } else {
      console.error(`ERROR: ${error.message}`);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: RunEvent) {
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
