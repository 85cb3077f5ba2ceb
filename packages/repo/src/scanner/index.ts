import type { Dirent, Stats } from 'node:fs';
import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import { FileIOError } from '@gitremap/shared';
import type { Candidate, DiscoverOptions, DiscoverySnapshot } from './types';
import { DEFAULT_IGNORES, GIT_CONFIG, GIT_DIR, GITMODULES, MODULES_DIR, isHidden } from './utils';

export * from './types';

type Fs = typeof nodeFs;
type EntryType = 'directory' | 'file' | undefined;

/**
 * Finds `.git/config`, `.git/modules/**\/config` and `.gitmodules` files below
 * a target directory. Hidden directories other than `.git` are not entered.
 * Symbolic links are followed; a directory reached twice through links is
 * walked once.
 */
export class GitConfigScanner {
  private fs: Fs;

  constructor(fs: Fs = nodeFs) {
    this.fs = fs;
  }

  async discover(target: string, options: DiscoverOptions = {}): Promise<DiscoverySnapshot> {
    let stats: Stats;
    try {
      stats = await this.fs.stat(target);
    } catch (error) {
      throw new FileIOError(target, 'Cannot access target', { cause: error });
    }

    if (!stats.isDirectory()) {
      return { target, files: [{ path: target, kind: 'explicit' }], warnings: [] };
    }

    const ig = ignore().add(DEFAULT_IGNORES);
    if (options.excludes && options.excludes.length > 0) {
      ig.add(options.excludes);
    }

    const wantConfigs = !options.modulesOnly;
    const wantGitmodules = Boolean(options.modules || options.modulesOnly);
    const files: Candidate[] = [];
    const warnings: string[] = [];

    const visited = new Set<string>();

    const readDir = async (dir: string) => {
      try {
        return await this.fs.readdir(dir, { withFileTypes: true });
      } catch {
        warnings.push(`Skipping unreadable directory: ${dir}`);
        return [];
      }
    };

    // Links are resolved to what they point to.
    const typeOf = async (entry: Dirent, entryPath: string): Promise<EntryType> => {
      if (entry.isDirectory()) return 'directory';
      if (entry.isFile()) return 'file';
      if (!entry.isSymbolicLink()) return undefined;
      try {
        const target = await this.fs.stat(entryPath);
        if (target.isDirectory()) return 'directory';
        return target.isFile() ? 'file' : undefined;
      } catch {
        warnings.push(`Skipping broken link: ${entryPath}`);
        return undefined;
      }
    };

    const firstVisit = async (dir: string) => {
      const real = await this.fs.realpath(dir).catch(() => dir);
      if (visited.has(real)) return false;
      visited.add(real);
      return true;
    };

    // Every file named `config` below .git/modules belongs to a submodule.
    const collectModuleConfigs = async (dir: string) => {
      if (!(await firstVisit(dir))) return;
      for (const entry of await readDir(dir)) {
        const entryPath = path.join(dir, entry.name);
        const type = await typeOf(entry, entryPath);
        if (type === 'directory') {
          await collectModuleConfigs(entryPath);
        } else if (type === 'file' && entry.name === GIT_CONFIG) {
          files.push({ path: entryPath, kind: 'module-config' });
        }
      }
    };

    const collectGitDir = async (gitDir: string) => {
      if (!(await firstVisit(gitDir))) return;
      for (const entry of await readDir(gitDir)) {
        const entryPath = path.join(gitDir, entry.name);
        const type = await typeOf(entry, entryPath);
        if (type === 'file' && entry.name === GIT_CONFIG) {
          files.push({ path: entryPath, kind: 'git-config' });
        } else if (type === 'directory' && entry.name === MODULES_DIR) {
          await collectModuleConfigs(entryPath);
        }
      }
    };

    const walk = async (dir: string, relativeDir: string) => {
      if (!(await firstVisit(dir))) return;
      for (const entry of await readDir(dir)) {
        const entryName = entry.name;
        const entryPath = path.join(dir, entryName);
        const entryRelativePath = relativeDir ? `${relativeDir}/${entryName}` : entryName;
        const type = await typeOf(entry, entryPath);

        if (type === 'directory') {
          if (entryName === GIT_DIR) {
            if (wantConfigs) await collectGitDir(entryPath);
            continue;
          }
          if (isHidden(entryName)) continue;
          // For directories, append slash to match directory patterns in ignore
          if (ig.ignores(entryRelativePath + '/')) continue;

          await walk(entryPath, entryRelativePath);
        } else if (type === 'file' && entryName === GITMODULES && wantGitmodules) {
          if (ig.ignores(entryRelativePath)) continue;
          files.push({ path: entryPath, kind: 'gitmodules' });
        }
      }
    };

    await walk(target, '');

    // Sort files for stability (deterministic order)
    files.sort((a, b) =>
      options.insideOut
        ? b.path.length - a.path.length || a.path.localeCompare(b.path)
        : a.path.localeCompare(b.path),
    );

    return { target, files, warnings };
  }
}
