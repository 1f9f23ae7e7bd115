import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { resolveConfig, ShotsortConfigInput } from '../src/config';
import { createContext, CreateContextOptions, OrganizerContext } from '../src/context';
import { createSilentLogger } from '../src/logger';

/** Fixed capture day used for every fake media file */
export const CAPTURE_DATE = new Date(2024, 2, 1, 12, 0, 0);
export const CAPTURE_DAY = '2024-03-01';

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `shotsort-${prefix}-`));
}

/**
 * Context rooted in `stateDir`; exiftool stays off unless the override turns
 * it back on.
 */
export function makeContext(
  stateDir: string,
  override: ShotsortConfigInput = {},
  options: CreateContextOptions = {}
): OrganizerContext {
  const config = resolveConfig(
    { use_exiftool: false, ...override },
    path.join(stateDir, 'config.json')
  );
  return createContext(config, createSilentLogger(), options);
}

/**
 * Write a file whose bytes carry no metadata, dated CAPTURE_DATE.
 */
export async function writeMedia(
  filePath: string,
  contents = 'not really media',
  mtime: Date = CAPTURE_DATE
): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents);
  await fs.utimes(filePath, mtime, mtime);
  return filePath;
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Every file below `root`, relative and with forward slashes, sorted. */
export async function listFiles(root: string): Promise<string[]> {
  const found: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else {
        found.push(path.relative(root, full).split(path.sep).join('/'));
      }
    }
  };
  await walk(root);
  return found.sort();
}
