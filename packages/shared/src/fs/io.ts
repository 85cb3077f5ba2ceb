import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir, remove } from 'fs-extra';

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes `content` to a temporary file next to `path` and renames it into place,
 * keeping the mode of the file being replaced.
 * On failure the temporary file is removed and `path` is left as it was.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const mode = await currentMode(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  try {
    await fs.writeFile(tempPath, content);
    if (mode !== undefined) {
      await fs.chmod(tempPath, mode);
    }
    await fs.rename(tempPath, path);
  } catch (error) {
    await remove(tempPath);
    throw error;
  }
}

async function currentMode(path: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(path);
    return stats.mode & 0o7777;
  } catch {
    return undefined;
  }
}
