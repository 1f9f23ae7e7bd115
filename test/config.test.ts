import * as fs from 'fs/promises';
import * as os from 'os';
import path from 'path';

import {
  DEFAULT_UNKNOWN_DEVICE,
  deepMerge,
  loadConfig,
  resolveConfig,
  saveConfig,
  ShotsortConfigError,
} from '../src/config';
import { makeTempDir } from './helpers';

const fixturePath = path.join(__dirname, 'fixtures', 'basic.config.json');
const fixtureDir = path.dirname(fixturePath);

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('config');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('merges the file over the defaults and resolves paths against its directory', async () => {
    const config = await loadConfig(fixturePath);

    expect(config.configPath).toBe(fixturePath);
    expect(config.stateDir).toBe(fixtureDir);
    expect(config.processedSetPath).toBe(path.join(fixtureDir, 'processed_files.json'));
    expect(config.sourcePath).toBe(path.join(fixtureDir, 'incoming'));
    expect(config.outputPath).toBe(path.join(os.homedir(), 'Pictures', 'sorted'));
    expect(config.superCopySource).toBe('');
    expect(config.imageExtensions).toEqual(['.jpg', '.png']);
    expect(config.videoExtensions).toContain('.mov');
    expect(config.folderStructure).toEqual({
      dateFormat: '%Y%m%d',
      imageSubfolder: 'image',
      videoSubfolder: 'video',
      audioSubfolder: 'audio',
      panoramicSubfolder: 'panoramic_video',
      deviceSubfolder: false,
    });
    expect(config.duplicateStrategy).toBe('overwrite');
    expect(config.moveFiles).toBe(true);
    expect(config.deviceUnknownName).toBe(DEFAULT_UNKNOWN_DEVICE);
  });

  it('clamps the poll interval and resolves auto copy paths', async () => {
    const config = await loadConfig(fixturePath);

    expect(config.autoCopy).toEqual({
      enabled: true,
      watchPaths: [path.join(fixtureDir, 'mounts')],
      targetPath: path.join(fixtureDir, 'archive'),
      pollIntervalSec: 15,
    });
  });

  it('returns the defaults when the file does not exist', async () => {
    const configPath = path.join(tempDir, 'missing.json');
    const config = await loadConfig(configPath);

    expect(config.stateDir).toBe(tempDir);
    expect(config.sourcePath).toBe('');
    expect(config.outputPath).toBe('');
    expect(config.useExiftool).toBe(true);
    expect(config.unifiedNaming).toBe(true);
    expect(config.duplicateStrategy).toBe('rename');
    expect(config.undatedFolder).toBe('undated');
    expect(config.overflowFolder).toBe('other_files');
    expect(config.leaveInPlaceExtensions).toEqual(['.op', '.ed', '.lrprev', '.lock']);
    expect(config.autoCopy.enabled).toBe(false);
  });

  it('rejects files that are not valid JSON', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, '{ not json');

    await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ShotsortConfigError);
  });

  it('rejects non-JSON config extensions', async () => {
    const configPath = path.join(tempDir, 'config.yaml');
    await fs.writeFile(configPath, 'source_path: here\n');

    await expect(loadConfig(configPath)).rejects.toThrow(
      'Unsupported config extension ".yaml". Use JSON for now.'
    );
  });

  it('reports schema violations with the offending key', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ duplicate_strategy: 'merge' }));

    await expect(loadConfig(configPath)).rejects.toThrow(/duplicate_strategy/);
  });

  it('rejects a config root that is not an object', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, '[]');

    await expect(loadConfig(configPath)).rejects.toThrow('Config root must be an object.');
  });
});

describe('saveConfig', () => {
  it('writes a document that loads back to the same settings', async () => {
    const tempDir = await makeTempDir('config-save');
    try {
      const configPath = path.join(tempDir, 'nested', 'config.json');
      const config = resolveConfig(
        { move_files: false, ignore: ['**/.cache/**'] },
        configPath
      );
      await saveConfig(config);

      const reloaded = await loadConfig(configPath);
      expect(reloaded).toEqual(config);

      const written = JSON.parse(await fs.readFile(configPath, 'utf8'));
      expect(written.move_files).toBe(false);
      expect(written.folder_structure.date_format).toBe('%Y-%m-%d');
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces everything else', () => {
    const merged = deepMerge(
      { a: { x: 1, y: 2 }, list: [1, 2], keep: true },
      { a: { y: 3 }, list: [9] }
    );

    expect(merged).toEqual({ a: { x: 1, y: 3 }, list: [9], keep: true });
  });
});
