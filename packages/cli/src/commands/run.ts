import { randomUUID } from 'crypto';
import {
  buildUriPattern,
  ConfigLoader,
  RewriteRunner,
  toSubstitutionTable,
  type RunnerIO,
} from '@gitremap/core';
import { GitConfigScanner, type DiscoverySnapshot } from '@gitremap/repo';
import {
  ConsoleLogger,
  createEvent,
  FileIOError,
  JsonlLogger,
  UsageError,
  type Logger,
  type RunMode,
} from '@gitremap/shared';
import { OutputRenderer, type RunSummary } from '../output/renderer';
import type { CliOptions } from '../types';

export interface RunDependencies {
  logger?: Logger;
  scanner?: GitConfigScanner;
  io?: RunnerIO;
  runId?: string;
}

export function resolveMode(options: CliOptions): RunMode {
  if (options.listConfigs) return 'list-configs';
  if (options.listProjects) return 'list-projects';
  if (options.dryRun) return 'preview';
  return 'rewrite';
}

/** Rejects option combinations that have no meaning together. */
export function validateOptions(options: CliOptions): void {
  if (options.modules && options.modulesOnly) {
    throw new UsageError('--modules and --modules-only cannot be used together');
  }
  if ((options.showNewPath !== undefined || options.listCategorised) && !options.listProjects) {
    throw new UsageError('--show-new-path and --list-categorised require --list-projects');
  }
}

export function createLogger(options: CliOptions): Logger {
  const logger = new ConsoleLogger({ verbose: options.verbose });
  return options.logFile ? new JsonlLogger(options.logFile, logger) : logger;
}

/**
 * Checks the options and loads the configuration, then handles every file found under the targets
 * in the mode the options select. Configuration and pattern errors are
 * thrown before any file is opened; per-file failures are counted.
 */
export async function runRemap(
  configPath: string,
  targets: string[],
  options: CliOptions,
  deps: RunDependencies = {},
): Promise<RunSummary> {
  validateOptions(options);
  const config = ConfigLoader.load(configPath);
  const pattern = buildUriPattern(config.search);
  const mode = resolveMode(options);
  const target =
    mode === 'preview' || mode === 'rewrite'
      ? ConfigLoader.resolveTarget(config, {
          hostname: options.hostname,
          protocol: options.protocol,
          username: options.username,
        })
      : undefined;

  const logger = deps.logger ?? createLogger(options);
  const runId = deps.runId ?? randomUUID();
  const scanner = deps.scanner ?? new GitConfigScanner();
  const runner = new RewriteRunner({
    pattern,
    substitutions: toSubstitutionTable(config.replace.substitutions),
    target,
    logger,
    runId,
    io: deps.io,
  });
  const renderer = new OutputRenderer({
    json: options.json,
    color: options.color,
    categorised: options.listCategorised,
    delimiter: options.showNewPath,
  });

  await logger.log(
    createEvent(runId, {
      type: 'RunStarted',
      payload: { mode, configPath, targets, protocol: target?.protocol },
    }),
  );
  await logger.debug(`Search pattern: ${pattern.source}`);

  const summary: RunSummary = { mode, runId, files: 0, failed: 0, unmapped: 0 };

  for (const targetPath of targets) {
    let snapshot: DiscoverySnapshot;
    try {
      snapshot = await scanner.discover(targetPath, {
        modules: options.modules,
        modulesOnly: options.modulesOnly,
        excludes: options.exclude,
        insideOut: options.insideOut,
      });
    } catch (error) {
      if (!(error instanceof FileIOError)) throw error;
      await logger.error(error);
      summary.failed++;
      continue;
    }

    for (const warning of snapshot.warnings) {
      await logger.warn(warning);
    }
    await logger.debug(`Found ${snapshot.files.length} file(s) in ${targetPath}`);

    for (const candidate of snapshot.files) {
      const file = candidate.path;
      summary.files++;

      switch (mode) {
        case 'list-configs': {
          const outcome = await runner.inspect(file);
          if (!outcome.ok) {
            summary.failed++;
            break;
          }
          renderer.configFile(candidate, outcome.matched);
          break;
        }
        case 'list-projects': {
          const outcome = await runner.listProjects(file);
          if (!outcome.ok) {
            summary.failed++;
            break;
          }
          summary.unmapped += outcome.listing.warnings.length;
          renderer.projects(candidate, outcome.listing.entries);
          break;
        }
        case 'preview':
        case 'rewrite': {
          const outcome = await runner.rewrite(file, { dryRun: mode === 'preview' });
          if (!outcome.ok) {
            summary.failed++;
            break;
          }
          summary.unmapped += outcome.result.warnings.length;
          if (mode === 'preview') {
            renderer.preview(candidate, outcome.result);
          } else {
            renderer.rewritten(candidate, outcome.result, outcome.written);
          }
          break;
        }
      }
    }
  }

  await logger.log(
    createEvent(runId, {
      type: 'RunFinished',
      payload: { files: summary.files, failed: summary.failed, unmapped: summary.unmapped },
    }),
  );
  renderer.finish(summary);

  return summary;
}
