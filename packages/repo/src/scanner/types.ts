export interface DiscoverOptions {
  /** Also collect `.gitmodules` files */
  modules?: boolean;
  /** Collect `.gitmodules` files only */
  modulesOnly?: boolean;
  /** gitignore-style patterns, relative to the target directory */
  excludes?: string[];
  /** Order by path length, longest first, so nested submodules come before their parents */
  insideOut?: boolean;
}

/** What kind of file a discovered path is */
export type CandidateKind = 'git-config' | 'module-config' | 'gitmodules' | 'explicit';

export interface Candidate {
  path: string;
  kind: CandidateKind;
}

export interface DiscoverySnapshot {
  target: string;
  files: Candidate[];
  warnings: string[];
}
