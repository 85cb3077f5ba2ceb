import pc from 'picocolors';
import type { ProjectEntry, RewriteResult } from '@gitremap/core';
import type { Candidate, CandidateKind } from '@gitremap/repo';
import type { RunMode } from '@gitremap/shared';

export interface RendererOptions {
  json?: boolean;
  color?: boolean;
  /** Print each project under its config file */
  categorised?: boolean;
  /** Print `project{delimiter}newPath` instead of the bare project name */
  delimiter?: string;
}

type ReportBase = { file: string; kind: CandidateKind };

export type FileReport = ReportBase &
  (
    | { matched: boolean }
    | { projects: ProjectEntry[] }
    | { contents: string; warnings: string[] }
    | { replaced: number; written: boolean; warnings: string[] }
  );

export interface RunSummary {
  mode: RunMode;
  runId: string;
  files: number;
  failed: number;
  unmapped: number;
}

function report(source: Candidate): ReportBase {
  return { file: source.path, kind: source.kind };
}

/**
 * Writes listings and previews to stdout. In JSON mode per-file reports are
 * collected and printed as one document by `finish`.
 */
export class OutputRenderer {
  private readonly reports: FileReport[] = [];
  private readonly colors: ReturnType<typeof pc.createColors>;

  constructor(private readonly options: RendererOptions = {}) {
    this.colors = pc.createColors((options.color ?? true) && pc.isColorSupported);
  }

  configFile(source: Candidate, matched: boolean): void {
    if (this.options.json) {
      this.reports.push({ ...report(source), matched });
    } else if (matched) {
      console.log(source.path);
    }
  }

  projects(source: Candidate, entries: ProjectEntry[]): void {
    if (this.options.json) {
      this.reports.push({ ...report(source), projects: entries });
      return;
    }

    const { categorised, delimiter } = this.options;
    if (categorised) {
      console.log(this.colors.bold(`${source.path}:`));
    }
    for (const entry of entries) {
      if (entry.newPath === undefined) continue;
      const line =
        delimiter === undefined
          ? entry.projectName
          : `${entry.projectName}${delimiter}${entry.newPath}`;
      console.log(categorised ? `\t${line}` : line);
    }
  }

  preview(source: Candidate, result: RewriteResult): void {
    if (this.options.json) {
      this.reports.push({
        ...report(source),
        contents: result.outputText,
        warnings: result.warnings,
      });
      return;
    }
    console.log(
      this.colors.bold(`In ${source.path} the following would be the new contents:`),
    );
    console.log(result.outputText);
  }

  rewritten(source: Candidate, result: RewriteResult, written: boolean): void {
    if (this.options.json) {
      this.reports.push({
        ...report(source),
        replaced: result.replaced,
        written,
        warnings: result.warnings,
      });
    }
  }

  finish(summary: RunSummary): void {
    if (this.options.json) {
      console.log(JSON.stringify({ ...summary, reports: this.reports }, null, 2));
    }
  }
}
