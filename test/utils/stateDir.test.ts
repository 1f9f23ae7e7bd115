import * as os from 'os';
import * as path from 'path';

import {
  getAutoCopyRecordPath,
  getBundledDeviceDatabasePath,
  getDefaultConfigPath,
  getDeviceDatabaseOverridePath,
  getProcessedSetPath,
  getShotsortHome,
  resolveUserPath,
} from '../../src/utils/stateDir';

describe('stateDir utilities', () => {
  const originalEnv = process.env.SHOTSORT_HOME;

  afterEach(() => {
    if (originalEnv) {
      process.env.SHOTSORT_HOME = originalEnv;
    } else {
      delete process.env.SHOTSORT_HOME;
    }
  });

  describe('getShotsortHome', () => {
    it('should return SHOTSORT_HOME env var if set', () => {
      process.env.SHOTSORT_HOME = '/custom/path';
      expect(getShotsortHome()).toBe(path.resolve('/custom/path'));
      expect(getDefaultConfigPath()).toBe(path.resolve('/custom/path', 'config.json'));
    });

    it('should return ~/.shotsort if SHOTSORT_HOME not set', () => {
      delete process.env.SHOTSORT_HOME;
      expect(getShotsortHome()).toBe(path.join(os.homedir(), '.shotsort'));
    });
  });

  it('keeps every record next to the config file', () => {
    expect(getProcessedSetPath('/state')).toBe(path.join('/state', 'processed_files.json'));
    expect(getAutoCopyRecordPath('/state')).toBe(path.join('/state', 'auto_copy_files.json'));
    expect(getDeviceDatabaseOverridePath('/state')).toBe(
      path.join('/state', 'device_suffixes.json')
    );
  });

  it('points the bundled database at the package data directory', () => {
    expect(getBundledDeviceDatabasePath()).toBe(
      path.resolve(__dirname, '..', '..', 'data', 'device_suffixes.json')
    );
  });

  describe('resolveUserPath', () => {
    it('expands a leading tilde', () => {
      expect(resolveUserPath('~/media', '/base')).toBe(path.join(os.homedir(), 'media'));
    });

    it('resolves relative paths against the base directory', () => {
      expect(resolveUserPath('cards/../in', '/base')).toBe(path.join('/base', 'in'));
    });

    it('keeps absolute paths', () => {
      expect(resolveUserPath('/mnt/card', '/base')).toBe('/mnt/card');
    });
  });
});
