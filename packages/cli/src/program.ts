import { readFileSync } from 'fs';
import { Command, Option } from 'commander';
import { z } from 'zod';
import { PROTOCOLS } from '@gitremap/shared';
import type { CliOptions } from './types';

export type RunHandler = (config: string, targets: string[], options: CliOptions) => Promise<void>;

const HELP_TEXT = `
The configuration file (JSON, or YAML for .yaml/.yml) looks like:

  {
    "search": {
      "hostname": "oldgit|oldgit\\\\.example\\\\.org",
      "path": "/+(?:var|srv)/+git"
    },
    "replace": {
      "hostname": "newgit.example.com",
      "username": "git",
      "protocol": "ssh-colon",
      "substitutions": { "oldproject": "new/path/project" }
    }
  }

search.hostname and search.path are regular expression fragments without
anchors. Projects missing from replace.substitutions are left as they are.

Examples:
  # Show what would change in every repository below ./src:
  $ gitremap --dry-run config.json src
  # List the projects found, with their new paths, per file:
  $ gitremap --list-projects --list-categorised --show-new-path config.json src
  # List the .gitmodules files that would change, nested ones first:
  $ gitremap --list-configs --modules-only --inside-out config.json src
  # Rewrite .git/config and .gitmodules files in place:
  $ gitremap --modules config.json src
`;

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
  );
  return PackageJsonSchema.parse(raw).version;
}

export function createProgram(onRun: RunHandler): Command {
  const program = new Command();

  program
    .name('gitremap')
    .description('Rewrite git remote URIs in .git/config and .gitmodules files')
    .version(readVersion())
    .argument('<config>', 'JSON or YAML configuration file')
    .argument(
      '<targets...>',
      'Directories containing git projects, or git config files, to be updated',
    )
    .option('--list-configs', 'List all matching config files and do nothing else')
    .option('--list-projects', 'List all projects found in the matching config files')
    .addOption(
      new Option(
        '--show-new-path [delimiter]',
        'When listing projects, also show their new paths',
      ).preset(' → '),
    )
    .option('--list-categorised', 'When listing projects, indent them under their config file')
    .option('-d, --dry-run', 'Print the new file contents instead of writing them')
    .addOption(
      new Option('-p, --protocol <protocol>', 'Protocol of the new URIs (overrides config)').choices(
        PROTOCOLS,
      ),
    )
    .option('-u, --username <username>', 'Username in the new URIs (overrides config)')
    .option('--hostname <hostname>', 'Hostname in the new URIs (overrides config)')
    .option('-m, --modules', 'Inspect .gitmodules files as well')
    .option('--modules-only', 'Inspect .gitmodules files only')
    .option('--inside-out', 'Handle the most deeply nested files first (longest path first)')
    .option('--exclude <patterns...>', 'gitignore-style patterns to skip while searching targets')
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-file <path>', 'Append structured run events to a JSONL file')
    .option('--no-color', 'Disable coloured output')
    .addHelpText('after', HELP_TEXT)
    .action(async (config: string, targets: string[], options: CliOptions) => {
      await onRun(config, targets, options);
    });

  return program;
}
