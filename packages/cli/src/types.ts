import type { Protocol } from '@gitremap/shared';

/** Options parsed from the command line */
export type CliOptions = {
  listConfigs?: boolean;
  listProjects?: boolean;
  /** Delimiter between a project and its new path; unset hides new paths */
  showNewPath?: string;
  listCategorised?: boolean;
  dryRun?: boolean;
  protocol?: Protocol;
  username?: string;
  hostname?: string;
  modules?: boolean;
  modulesOnly?: boolean;
  /** Handle the most deeply nested files first */
  insideOut?: boolean;
  exclude?: string[];
  json?: boolean;
  verbose?: boolean;
  logFile?: string;
  /** Cleared by `--no-color` */
  color?: boolean;
};
