import nodeFs from 'node:fs/promises';
import {
  atomicWrite,
  createEvent,
  ConfigError,
  FileIOError,
  type Logger,
  type RunEventBody,
} from '@gitremap/shared';
import type { UriPattern } from './pattern/uri-pattern';
import { rewrite } from './rewrite/engine';
import { containsUri, listProjects } from './rewrite/list';
import type { ProjectListing, RewriteResult, SubstitutionTable, UriTarget } from './rewrite/types';

/** File access used by the runner; swapped out in tests. */
export interface RunnerIO {
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
}

export const defaultRunnerIO: RunnerIO = {
  readFile: (path) => nodeFs.readFile(path, 'utf8'),
  writeFile: (path, content) => atomicWrite(path, content),
};

export interface RewriteRunnerOptions {
  pattern: UriPattern;
  substitutions: SubstitutionTable;
  /** Required by `rewrite`; listing modes run without it */
  target?: UriTarget;
  logger: Logger;
  runId: string;
  io?: RunnerIO;
}

export type FileFailure = { ok: false; file: string; error: FileIOError };
export type FileOutcome<T> = ({ ok: true; file: string } & T) | FileFailure;

export type InspectOutcome = FileOutcome<{ matched: boolean }>;
export type ListOutcome = FileOutcome<{ listing: ProjectListing }>;
export type RewriteOutcome = FileOutcome<{ result: RewriteResult; written: boolean }>;

export interface RewriteFileOptions {
  /** Compute the new text without writing it */
  dryRun?: boolean;
}

/**
 * Applies the pattern and substitution table to one file at a time.
 * Read and write failures are logged and returned, never thrown, so the
 * caller can carry on with the next file.
 */
export class RewriteRunner {
  private readonly io: RunnerIO;

  constructor(private readonly options: RewriteRunnerOptions) {
    this.io = options.io ?? defaultRunnerIO;
  }

  async inspect(file: string): Promise<InspectOutcome> {
    const text = await this.read(file);
    if (typeof text !== 'string') return text;

    return { ok: true, file, matched: containsUri(text, this.options.pattern) };
  }

  async listProjects(file: string): Promise<ListOutcome> {
    const text = await this.read(file);
    if (typeof text !== 'string') return text;

    const listing = listProjects(text, this.options.pattern, this.options.substitutions);
    await this.reportUnmapped(file, listing.warnings, 'does not have a defined new path');
    await this.emit({
      type: 'FileProcessed',
      payload: { file, matches: listing.entries.length, replaced: 0, written: false },
    });

    return { ok: true, file, listing };
  }

  async rewrite(file: string, options: RewriteFileOptions = {}): Promise<RewriteOutcome> {
    const target = this.options.target;
    if (!target) {
      throw new ConfigError('A URI target (hostname and protocol) is required to rewrite files');
    }

    const text = await this.read(file);
    if (typeof text !== 'string') return text;

    const result = rewrite(text, this.options.pattern, {
      substitutions: this.options.substitutions,
      target,
    });
    await this.reportUnmapped(
      file,
      result.warnings,
      'does not have a defined new path and will not be replaced',
    );

    let written = false;
    if (!options.dryRun && result.outputText !== text) {
      try {
        await this.io.writeFile(file, result.outputText);
        written = true;
      } catch (error) {
        return this.fail(new FileIOError(file, 'Failed to replace', { cause: error }));
      }
    }

    await this.emit({
      type: 'FileProcessed',
      payload: { file, matches: result.matches, replaced: result.replaced, written },
    });
    return { ok: true, file, result, written };
  }

  private async read(file: string): Promise<string | FileFailure> {
    try {
      return await this.io.readFile(file);
    } catch (error) {
      return this.fail(new FileIOError(file, 'Failed to read', { cause: error }));
    }
  }

  private async fail(error: FileIOError): Promise<FileFailure> {
    await this.options.logger.error(error);
    await this.emit({ type: 'FileFailed', payload: { file: error.file, message: error.message } });
    return { ok: false, file: error.file, error };
  }

  private async reportUnmapped(file: string, projects: string[], reason: string): Promise<void> {
    const logger = this.options.logger.child({ file });
    for (const project of projects) {
      await logger.warn(`The project "${project}" ${reason}`);
      await this.emit({ type: 'ProjectUnmapped', payload: { file, project } });
    }
  }

  private async emit(body: RunEventBody): Promise<void> {
    await this.options.logger.log(createEvent(this.options.runId, body));
  }
}
