import type { Protocol } from '@gitremap/shared';

/** Old project name → new path. Lookups only see entries that were configured. */
export type SubstitutionTable = ReadonlyMap<string, string>;

/** Components of the URIs written by a rewrite */
export interface UriTarget {
  protocol: Protocol;
  hostname: string;
  /** Ignored by the `relative` protocol */
  username?: string;
}

/** One match of the composite pattern */
export interface UriMatch {
  /** The `url = ` prefix, verbatim */
  keyText: string;
  projectName: string;
  /** The whole matched span */
  text: string;
  /** Offset of the span in the searched text */
  index: number;
}

export interface RewriteResult {
  outputText: string;
  /** Unmapped project names, one per occurrence, in order of appearance */
  warnings: string[];
  /** Number of matched spans */
  matches: number;
  /** Number of spans replaced with a new URI */
  replaced: number;
}

export interface ProjectEntry {
  projectName: string;
  /** Absent when the project has no substitution */
  newPath?: string;
}

export interface ProjectListing {
  entries: ProjectEntry[];
  warnings: string[];
}

export function toSubstitutionTable(substitutions: Record<string, string>): SubstitutionTable {
  return new Map(Object.entries(substitutions));
}
