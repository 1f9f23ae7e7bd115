import type { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';

import type { Logger } from '../logger';
import { errorCode, errorMessage, isMissingFileError } from './errors';

/** `fs.stat` that returns `undefined` for a missing path. */
export async function statIfExists(filePath: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(filePath);
  } catch (error) {
    if (isMissingFileError(error) || errorCode(error) === 'ENOTDIR') {
      return undefined;
    }
    throw error;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Whether two paths name the same file (same device and inode).
 */
export async function isSameFile(a: string, b: string): Promise<boolean> {
  const [left, right] = await Promise.all([statIfExists(a), statIfExists(b)]);
  if (!left || !right) {
    return false;
  }
  return left.dev === right.dev && left.ino === right.ino;
}

/**
 * Copy a file and carry over its access and modification times.
 */
export async function copyFilePreserving(src: string, dest: string): Promise<void> {
  await fs.mkdir(path.dirname(dest), { recursive: true });
  await fs.copyFile(src, dest);
  const stats = await fs.stat(src);
  await fs.utimes(dest, stats.atime, stats.mtime);
}

/**
 * Move a file, falling back to copy + unlink across filesystems.
 */
export async function moveFile(src: string, dest: string): Promise<void> {
  await fs.mkdir(path.dirname(dest), { recursive: true });
  try {
    await fs.rename(src, dest);
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') {
      throw error;
    }
    await copyFilePreserving(src, dest);
    await fs.unlink(src);
  }
}

/** Delete a file, ignoring a missing path. */
export async function removeFileQuietly(filePath: string, logger: Logger): Promise<void> {
  try {
    await fs.rm(filePath, { force: true });
  } catch (error) {
    logger.warn(
      { file: filePath, err: errorMessage(error) },
      'Unable to remove file.'
    );
  }
}

/**
 * Remove empty directories below `root`, deepest first. The root itself is
 * kept. Returns the number of directories removed.
 */
export async function removeEmptyDirectories(
  root: string,
  logger: Logger
): Promise<number> {
  if (!(await isDirectory(root))) {
    return 0;
  }

  const prune = async (dir: string): Promise<{ removed: number; empty: boolean }> => {
    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.warn({ dir, err: errorMessage(error) }, 'Unable to list directory.');
      return { removed: 0, empty: false };
    }

    let removed = 0;
    let remaining = entries.length;
    for (const entry of entries) {
      if (!entry.isDirectory()) {
        continue;
      }
      const child = path.join(dir, entry.name);
      const result = await prune(child);
      removed += result.removed;
      if (!result.empty) {
        continue;
      }
      try {
        await fs.rmdir(child);
        removed += 1;
        remaining -= 1;
        logger.debug({ dir: child }, 'Removed empty folder.');
      } catch (error) {
        logger.debug({ dir: child, err: errorMessage(error) }, 'Unable to remove folder.');
      }
    }
    return { removed, empty: remaining === 0 };
  };

  const { removed } = await prune(path.resolve(root));
  return removed;
}
