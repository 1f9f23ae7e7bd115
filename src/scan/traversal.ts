import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { minimatch } from 'minimatch';

import type { Logger } from '../logger';
import { errorCode, errorMessage } from '../utils/errors';
import type { MediaClassifier } from '../utils/fileClassifier';

export interface TraversalOptions {
  logger: Logger;
  /** Glob patterns matched against the path relative to the root */
  ignore?: string[];
}

/**
 * Lazy, restartable walk over every regular file below a root directory.
 * Each iteration starts a fresh walk. Symlinks are skipped, and entries are
 * visited in name order so repeated walks agree.
 */
export class FileTraversal implements AsyncIterable<string> {
  private readonly root: string;

  constructor(
    root: string,
    private options: TraversalOptions
  ) {
    this.root = path.resolve(root);
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return this.walk(this.root);
  }

  private async *walk(dirPath: string): AsyncGenerator<string> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      const code = errorCode(error);
      if (code === 'EACCES' || code === 'EPERM') {
        this.options.logger.warn({ dir: dirPath }, 'Permission denied, skipping directory.');
      } else {
        this.options.logger.warn(
          { dir: dirPath, err: errorMessage(error) },
          'Unable to list directory.'
        );
      }
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      if (this.shouldIgnore(fullPath)) {
        continue;
      }
      if (entry.isSymbolicLink()) {
        this.options.logger.debug({ file: fullPath }, 'Skipping symlink.');
        continue;
      }
      if (entry.isDirectory()) {
        yield* this.walk(fullPath);
      } else if (entry.isFile()) {
        yield fullPath;
      }
    }
  }

  private shouldIgnore(filePath: string): boolean {
    const patterns = this.options.ignore ?? [];
    if (patterns.length === 0) {
      return false;
    }
    const relativePath = path.relative(this.root, filePath).split(path.sep).join('/');
    return patterns.some(pattern => minimatch(relativePath, pattern, { dot: true }));
  }
}

/**
 * Every file below `root` with a media extension that is not left in place.
 */
export async function collectMediaFiles(
  traversal: AsyncIterable<string>,
  classifier: MediaClassifier
): Promise<string[]> {
  const collected: string[] = [];
  for await (const filePath of traversal) {
    if (classifier.shouldLeaveInPlace(filePath)) {
      continue;
    }
    if (classifier.kindByPath(filePath) !== undefined) {
      collected.push(filePath);
    }
  }
  return collected;
}

/**
 * Keep one file per (directory, stem), sorted by directory then name, so
 * `IMG_1.JPG` and `IMG_1.MOV` form one unit of work led by the first.
 */
export function dedupeByStem(files: string[]): string[] {
  const sorted = [...files].sort((a, b) => {
    const dirA = path.dirname(a);
    const dirB = path.dirname(b);
    if (dirA !== dirB) {
      return dirA < dirB ? -1 : 1;
    }
    const nameA = path.basename(a);
    const nameB = path.basename(b);
    return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
  });

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const filePath of sorted) {
    const key = `${path.dirname(filePath)}\u0000${path.basename(filePath, path.extname(filePath))}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(filePath);
  }
  return unique;
}
