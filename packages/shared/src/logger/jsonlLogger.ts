import * as fs from 'fs/promises';
import type { RunEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Appends structured events to a JSONL file and forwards everything else
 * to the wrapped logger.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly inner: Logger;

  constructor(filePath: string, inner: Logger) {
    this.filePath = filePath;
    this.inner = inner;
  }

  async log(event: RunEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Audit log failures are reported, never thrown.
      const cause = error instanceof Error ? error : new Error(String(error));
      await this.inner.error(cause, `Failed to write to log file at ${this.filePath}`);
    }
    await this.inner.log(event);
  }

  debug(message: string) {
    return this.inner.debug(message);
  }

  info(message: string) {
    return this.inner.info(message);
  }

  warn(message: string) {
    return this.inner.warn(message);
  }

  error(error: Error, message?: string) {
    return this.inner.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.inner.child(bindings));
  }
}
