import { execFile } from 'child_process';
import { promisify } from 'util';

import type { Logger } from '../logger';
import { errorCode, errorMessage } from '../utils/errors';
import { PromiseCache } from '../utils/promiseCache';

const execFilePromise = promisify(execFile);

export const EXIFTOOL_TIMEOUT_MS = 10_000;
const CACHE_LIMIT = 64;

/** Tags read in a single exiftool call per file */
export const EXIFTOOL_TAGS = [
  'DateTimeOriginal',
  'CreateDate',
  'MediaCreateDate',
  'Make',
  'Model',
  'ImageWidth',
  'ImageHeight',
  'VideoFrameWidth',
  'VideoFrameHeight',
  'VideoFrameRate',
  'FrameRate',
  'ProjectionType',
  'StitchingSoftware',
] as const;

export type ExifToolTag = (typeof EXIFTOOL_TAGS)[number];
export type ExifToolTags = Partial<Record<ExifToolTag, string>>;

export interface ExifToolReaderOptions {
  logger: Logger;
  binary?: string;
  timeoutMs?: number;
}

/**
 * Reads tags with the external `exiftool` command.
 *
 * Never throws: a missing binary, a timeout, a non-zero exit or unparsable
 * output all come back as an empty tag set. After the binary is found to be
 * missing, later calls return immediately.
 */
export class ExifToolReader {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private available = true;
  private cache = new PromiseCache<ExifToolTags>(CACHE_LIMIT);

  constructor(options: ExifToolReaderOptions) {
    this.logger = options.logger;
    this.binary =
      options.binary ??
      (process.platform === 'win32' ? 'exiftool.exe' : 'exiftool');
    this.timeoutMs = options.timeoutMs ?? EXIFTOOL_TIMEOUT_MS;
  }

  read(filePath: string): Promise<ExifToolTags> {
    return this.cache.get(filePath, () => this.run(filePath));
  }

  /** Drop cached output, e.g. after a file was moved away. */
  forget(filePath: string): void {
    this.cache.delete(filePath);
  }

  private async run(filePath: string): Promise<ExifToolTags> {
    if (!this.available) {
      return {};
    }
    try {
      const { stdout } = await execFilePromise(
        this.binary,
        ['-s', '-json', ...EXIFTOOL_TAGS.map(tag => `-${tag}`), filePath],
        { timeout: this.timeoutMs, windowsHide: true }
      );
      return parseExifToolJson(stdout);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.available = false;
        this.logger.debug(
          { binary: this.binary },
          'exiftool not found, skipping external metadata.'
        );
      } else {
        this.logger.debug(
          { file: filePath, err: errorMessage(error) },
          'exiftool read failed.'
        );
      }
      return {};
    }
  }
}

/**
 * Parse `exiftool -json` output into trimmed, non-empty string values.
 */
export function parseExifToolJson(stdout: string): ExifToolTags {
  if (!stdout.trim()) {
    return {};
  }
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    return {};
  }
  if (!Array.isArray(data) || data.length === 0) {
    return {};
  }
  const first: unknown = data[0];
  if (typeof first !== 'object' || first === null) {
    return {};
  }

  const tags: ExifToolTags = {};
  for (const tag of EXIFTOOL_TAGS) {
    const value: unknown = Reflect.get(first, tag);
    if (value === undefined || value === null) {
      continue;
    }
    const text = String(value).trim();
    if (text) {
      tags[tag] = text;
    }
  }
  return tags;
}
