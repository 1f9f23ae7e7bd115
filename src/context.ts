import type { ShotsortConfig } from './config';
import { DevicePatternDatabase } from './devices/DevicePatternDatabase';
import type { Logger } from './logger';
import { ExifToolReader } from './metadata/ExifToolReader';

/**
 * Everything a pipeline component needs, passed explicitly to constructors
 */
export interface OrganizerContext {
  config: ShotsortConfig;
  logger: Logger;
  devices: DevicePatternDatabase;
  exiftool: ExifToolReader;
}

export interface CreateContextOptions {
  devices?: DevicePatternDatabase;
  exiftool?: ExifToolReader;
}

export function createContext(
  config: ShotsortConfig,
  logger: Logger,
  options: CreateContextOptions = {}
): OrganizerContext {
  return {
    config,
    logger,
    devices:
      options.devices ??
      new DevicePatternDatabase({
        logger: logger.child({ scope: 'devices' }),
        stateDir: config.stateDir,
      }),
    exiftool:
      options.exiftool ??
      new ExifToolReader({ logger: logger.child({ scope: 'exiftool' }) }),
  };
}
