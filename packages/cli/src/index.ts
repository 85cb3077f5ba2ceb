import { CommanderError } from 'commander';
import { AppError, isUserCorrectable } from '@gitremap/shared';
import { createProgram } from './program';
import { runRemap } from './commands/run';
import type { CliOptions } from './types';

export const name = '@gitremap/cli';

export { createProgram } from './program';
export { runRemap, resolveMode, createLogger } from './commands/run';
export { OutputRenderer } from './output/renderer';
export type { RunSummary, FileReport } from './output/renderer';
export type { CliOptions } from './types';

function reportFatal(e: unknown, opts: CliOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  console.error(`ERROR: ${(e instanceof Error && e.message) || String(e)}`);
  if (opts.verbose) {
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    }
  }
}

/** Runs the CLI and resolves to the process exit code. */
export async function main(argv: string[] = process.argv): Promise<number> {
  let exitCode = 0;
  const program = createProgram(async (config, targets, options) => {
    const summary = await runRemap(config, targets, options);
    exitCode = summary.failed > 0 ? 1 : 0;
  });
  program.exitOverride();

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e) {
    // commander has already printed its own message
    if (e instanceof CommanderError) {
      return e.exitCode === 0 ? 0 : 2;
    }

    reportFatal(e, program.opts<CliOptions>());
    return isUserCorrectable(e) ? 2 : 1;
  }
}
