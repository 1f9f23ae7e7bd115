import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import type { Logger } from '../logger';
import { errorMessage, isMissingFileError } from '../utils/errors';

const processedDocumentSchema = z.object({
  paths: z.array(z.string()).default([]),
});

/**
 * Absolute paths already routed by an earlier run, persisted as
 * `{ "paths": [...] }`.
 *
 * Only one run may own a given file at a time; there is no locking.
 */
export class ProcessedSet {
  private paths = new Set<string>();
  private loaded = false;

  constructor(
    private filePath: string,
    private logger: Logger
  ) {}

  get size(): number {
    return this.paths.size;
  }

  /**
   * Read the side file. A missing file is an empty set; a broken one is
   * logged and treated as empty.
   */
  async load(): Promise<void> {
    this.loaded = true;
    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFileError(error)) {
        this.logger.warn(
          { file: this.filePath, err: errorMessage(error) },
          'Unable to read processed set.'
        );
      }
      return;
    }

    try {
      const document = processedDocumentSchema.parse(JSON.parse(contents));
      this.paths = new Set(document.paths);
    } catch (error) {
      this.logger.warn(
        { file: this.filePath, err: errorMessage(error) },
        'Ignoring invalid processed set.'
      );
    }
  }

  async ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      await this.load();
    }
  }

  isProcessed(filePath: string): boolean {
    return this.paths.has(path.resolve(filePath));
  }

  markProcessed(filePath: string): void {
    this.paths.add(path.resolve(filePath));
  }

  /**
   * Overwrite the side file with the whole set. An empty set is only written
   * when `force` is set.
   */
  async persist(force = false): Promise<void> {
    if (!force && this.paths.size === 0) {
      return;
    }
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(
        this.filePath,
        `${JSON.stringify({ paths: Array.from(this.paths) }, null, 2)}\n`,
        'utf8'
      );
    } catch (error) {
      this.logger.warn(
        { file: this.filePath, err: errorMessage(error) },
        'Unable to save processed set.'
      );
    }
  }
}
