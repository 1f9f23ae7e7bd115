import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import { ShotsortConfigError } from '../config';
import type { Logger } from '../logger';
import { errorMessage, isMissingFileError } from '../utils/errors';
import {
  getBundledDeviceDatabasePath,
  getDeviceDatabaseOverridePath,
} from '../utils/stateDir';

const devicePatternSchema = z.object({
  extensions: z.array(z.string()).default([]),
  filename_prefixes: z.array(z.string()).default([]),
  filename_contains: z.array(z.string()).default([]),
});

const deviceDatabaseSchema = z.object({
  device_patterns: z.record(devicePatternSchema).default({}),
});

export interface DevicePattern {
  device: string;
  extensions: string[]; // Lower-case, with leading dot; empty = any
  prefixes: string[]; // Upper-case
  contains: string[]; // Upper-case
}

/**
 * Parse a device pattern document. Entry order is preserved.
 */
export function parseDevicePatterns(raw: unknown, source: string): DevicePattern[] {
  const result = deviceDatabaseSchema.safeParse(raw);
  if (!result.success) {
    throw new ShotsortConfigError(
      `Invalid device pattern database ${source}: ${result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
      result.error
    );
  }
  return Object.entries(result.data.device_patterns).map(([device, pattern]) => ({
    device,
    extensions: pattern.extensions.map(ext => ext.trim().toLowerCase()),
    prefixes: pattern.filename_prefixes
      .map(prefix => prefix.toUpperCase())
      .filter(Boolean),
    contains: pattern.filename_contains
      .map(part => part.toUpperCase())
      .filter(Boolean),
  }));
}

/**
 * Find the first device whose filename prefixes or substrings match.
 */
export function matchDevicePattern(
  patterns: DevicePattern[],
  filePath: string
): string | undefined {
  const ext = path.extname(filePath).toLowerCase();
  const stem = path.basename(filePath, path.extname(filePath)).toUpperCase();

  for (const pattern of patterns) {
    if (pattern.extensions.length > 0 && !pattern.extensions.includes(ext)) {
      continue;
    }
    if (pattern.prefixes.some(prefix => stem.startsWith(prefix))) {
      return pattern.device;
    }
    if (pattern.contains.some(part => stem.includes(part))) {
      return pattern.device;
    }
  }
  return undefined;
}

export interface DevicePatternDatabaseOptions {
  logger: Logger;
  /** Directory that may hold a `device_suffixes.json` override */
  stateDir?: string;
  /** Explicit database file; wins over the override and bundled files */
  filePath?: string;
  /** Preloaded patterns (skips file loading) */
  patterns?: DevicePattern[];
}

/**
 * Filename-based device lookup, loaded lazily on first use and read-only
 * afterwards. A missing or broken database means "no patterns".
 */
export class DevicePatternDatabase {
  private loading: Promise<DevicePattern[]> | null = null;

  constructor(private options: DevicePatternDatabaseOptions) {
    if (options.patterns) {
      this.loading = Promise.resolve(options.patterns);
    }
  }

  async match(filePath: string): Promise<string | undefined> {
    const patterns = await this.load();
    return matchDevicePattern(patterns, filePath);
  }

  load(): Promise<DevicePattern[]> {
    if (!this.loading) {
      this.loading = this.readPatterns();
    }
    return this.loading;
  }

  private candidatePaths(): string[] {
    if (this.options.filePath) {
      return [this.options.filePath];
    }
    const candidates: string[] = [];
    if (this.options.stateDir) {
      candidates.push(getDeviceDatabaseOverridePath(this.options.stateDir));
    }
    candidates.push(getBundledDeviceDatabasePath());
    return candidates;
  }

  private async readPatterns(): Promise<DevicePattern[]> {
    for (const candidate of this.candidatePaths()) {
      let contents: string;
      try {
        contents = await fs.readFile(candidate, 'utf8');
      } catch (error) {
        if (!isMissingFileError(error)) {
          this.options.logger.warn(
            { file: candidate, err: errorMessage(error) },
            'Unable to read device pattern database.'
          );
        }
        continue;
      }
      try {
        const patterns = parseDevicePatterns(JSON.parse(contents), candidate);
        this.options.logger.debug(
          { file: candidate, devices: patterns.length },
          'Loaded device pattern database.'
        );
        return patterns;
      } catch (error) {
        this.options.logger.warn(
          { file: candidate, err: errorMessage(error) },
          'Ignoring invalid device pattern database.'
        );
        return [];
      }
    }
    return [];
  }
}
