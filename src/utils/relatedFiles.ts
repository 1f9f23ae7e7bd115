import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';

import type { Logger } from '../logger';
import { errorMessage } from './errors';
import type { MediaClassifier } from './fileClassifier';

const RELATION_DELIMITERS = ['_', ' '];

/**
 * Whether two stems belong together: equal, or one is the other plus a
 * `_` / space delimited suffix (`IMG_0001` and `IMG_0001_edit`).
 */
export function stemsRelated(a: string, b: string): boolean {
  if (a === b) {
    return true;
  }
  return RELATION_DELIMITERS.some(
    delimiter => a.startsWith(b + delimiter) || b.startsWith(a + delimiter)
  );
}

export interface RelationFinderOptions {
  classifier: MediaClassifier;
  logger: Logger;
  enabled: boolean;
}

/**
 * Finds companion files (sidecars, thumbnails, proxies) next to a primary
 * media file. Only the primary's own directory is searched.
 */
export class RelationFinder {
  constructor(private options: RelationFinderOptions) {}

  async relatedFiles(primary: string): Promise<string[]> {
    if (!this.options.enabled) {
      return [];
    }
    const directory = path.dirname(primary);
    const primaryName = path.basename(primary);
    const stem = path.basename(primary, path.extname(primary));

    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      this.options.logger.warn(
        { dir: directory, err: errorMessage(error) },
        'Unable to list directory for related files.'
      );
      return [];
    }

    const related: string[] = [];
    for (const entry of entries) {
      if (!entry.isFile() || entry.name === primaryName) {
        continue;
      }
      const candidate = path.join(directory, entry.name);
      if (this.options.classifier.shouldLeaveInPlace(candidate)) {
        continue;
      }
      const candidateStem = path.basename(entry.name, path.extname(entry.name));
      if (stemsRelated(stem, candidateStem)) {
        related.push(candidate);
      }
    }
    return related.sort();
  }
}
