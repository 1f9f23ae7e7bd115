import * as path from 'path';
import * as os from 'os';

/**
 * State directory utilities
 *
 * Configuration, the processed-files record and an optional device pattern
 * override all live side by side in one directory, `~/.shotsort/` unless
 * SHOTSORT_HOME points elsewhere.
 */

export const CONFIG_FILE_NAME = 'config.json';
export const PROCESSED_FILE_NAME = 'processed_files.json';
export const DEVICE_DATABASE_FILE_NAME = 'device_suffixes.json';
export const AUTO_COPY_RECORD_FILE_NAME = 'auto_copy_files.json';

/**
 * Get the shotsort home directory
 * Defaults to ~/.shotsort unless SHOTSORT_HOME is set
 */
export function getShotsortHome(): string {
  return process.env.SHOTSORT_HOME
    ? path.resolve(process.env.SHOTSORT_HOME)
    : path.join(os.homedir(), '.shotsort');
}

export function getDefaultConfigPath(): string {
  return path.join(getShotsortHome(), CONFIG_FILE_NAME);
}

/**
 * Processed-set record kept next to the config file it belongs to
 *
 * @param stateDir - Directory holding the config file
 */
export function getProcessedSetPath(stateDir: string): string {
  return path.join(stateDir, PROCESSED_FILE_NAME);
}

/**
 * Record of files the auto-copy daemon has already copied, kept apart from
 * the organize record so the two never share an owner
 */
export function getAutoCopyRecordPath(stateDir: string): string {
  return path.join(stateDir, AUTO_COPY_RECORD_FILE_NAME);
}

/**
 * User override of the bundled device pattern database
 *
 * @param stateDir - Directory holding the config file
 */
export function getDeviceDatabaseOverridePath(stateDir: string): string {
  return path.join(stateDir, DEVICE_DATABASE_FILE_NAME);
}

/**
 * Device pattern database shipped with the package (`data/` at the package root)
 */
export function getBundledDeviceDatabasePath(): string {
  return path.resolve(__dirname, '..', '..', 'data', DEVICE_DATABASE_FILE_NAME);
}

/**
 * Expand a leading `~` and resolve relative paths against a base directory
 */
export function resolveUserPath(targetPath: string, baseDir: string): string {
  let expandedPath = targetPath;
  if (targetPath.startsWith('~/') || targetPath === '~') {
    expandedPath = targetPath.replace(/^~/, os.homedir());
  }

  const candidate = path.isAbsolute(expandedPath)
    ? expandedPath
    : path.resolve(baseDir, expandedPath);
  return path.normalize(candidate);
}
