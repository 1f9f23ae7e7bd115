import * as fs from 'fs/promises';
import * as path from 'path';

import type { ShotsortConfigInput } from '../../src/config';
import { MetadataProbe } from '../../src/metadata/MetadataProbe';
import { PlacementResolver } from '../../src/placement/PlacementResolver';
import { MediaKind } from '../../src/types/MediaKind';
import { CAPTURE_DAY, makeContext, makeTempDir, writeMedia } from '../helpers';

describe('PlacementResolver', () => {
  let tempDir: string;
  let output: string;

  const makeResolver = (override: ShotsortConfigInput = {}) => {
    const ctx = makeContext(tempDir, override);
    return new PlacementResolver(ctx, new MetadataProbe(ctx));
  };

  beforeEach(async () => {
    tempDir = await makeTempDir('placement');
    output = path.join(tempDir, 'out');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('plan', () => {
    it('places media under date, kind and device', async () => {
      const photo = await writeMedia(path.join(tempDir, 'src', 'photo.jpg'));
      const placement = await makeResolver().plan(photo, MediaKind.IMAGE, output);

      expect(placement.record).toMatchObject({
        path: photo,
        kind: MediaKind.IMAGE,
        device: '未知设备',
        dateString: CAPTURE_DAY,
      });
      expect(placement.targetDir).toBe(path.join(output, CAPTURE_DAY, 'image', '未知设备'));
      expect(placement.unifiedBasename).toBe(`未知设备_${CAPTURE_DAY}`);
    });

    it('skips the device folder for audio', async () => {
      const song = await writeMedia(path.join(tempDir, 'src', 'memo.m4a'));
      const placement = await makeResolver().plan(song, MediaKind.AUDIO, output);

      expect(placement.targetDir).toBe(path.join(output, CAPTURE_DAY, 'audio'));
    });

    it('uses the undated folder and keeps names when unified naming is off', async () => {
      const photo = await writeMedia(path.join(tempDir, 'src', 'DJI_0001.jpg'));
      const resolver = makeResolver({
        date_fallback: 'none',
        unified_naming: false,
        folder_structure: { image_subfolder: 'photos' },
      });
      const placement = await resolver.plan(photo, MediaKind.IMAGE, output);

      expect(placement.targetDir).toBe(path.join(output, 'undated', 'photos', '大疆'));
      expect(placement.unifiedBasename).toBeUndefined();
    });

    it('applies the configured date format', async () => {
      const clip = path.join(tempDir, 'src', 'trip_360.jpg');
      await writeMedia(clip);
      const placement = await makeResolver({
        folder_structure: { date_format: '%Y%m%d', device_subfolder: false },
      }).plan(clip, MediaKind.PANORAMIC_VIDEO, output);

      expect(placement.targetDir).toBe(path.join(output, '20240301', 'panoramic_video'));
    });
  });

  describe('resolveDestination', () => {
    let targetDir: string;

    beforeEach(async () => {
      targetDir = path.join(output, 'day');
      await fs.mkdir(targetDir, { recursive: true });
    });

    it('keeps a free name', async () => {
      const resolver = makeResolver();
      await expect(resolver.resolveDestination(targetDir, '/src/X.jpg')).resolves.toBe(
        path.join(targetDir, 'X.jpg')
      );
    });

    it('numbers colliding names in order', async () => {
      const resolver = makeResolver();
      await writeMedia(path.join(targetDir, 'X.jpg'));

      const first = await resolver.resolveDestination(targetDir, '/src/X.jpg');
      expect(first).toBe(path.join(targetDir, 'X_1.jpg'));

      await writeMedia(first);
      await expect(resolver.resolveDestination(targetDir, '/src/X.jpg')).resolves.toBe(
        path.join(targetDir, 'X_2.jpg')
      );
    });

    it('applies the unified basename with the original extension', async () => {
      const resolver = makeResolver();
      await writeMedia(path.join(targetDir, 'cam_2024-03-01.xmp'));

      await expect(
        resolver.resolveDestination(targetDir, '/src/IMG_1.xmp', 'cam_2024-03-01')
      ).resolves.toBe(path.join(targetDir, 'cam_2024-03-01_1.xmp'));
    });

    it('returns the source itself when it already sits at the candidate', async () => {
      const resolver = makeResolver();
      const existing = await writeMedia(path.join(targetDir, 'X.jpg'));

      await expect(resolver.resolveDestination(targetDir, existing)).resolves.toBe(existing);
    });

    it('numbers the name with the skip strategy too', async () => {
      const resolver = makeResolver({ duplicate_strategy: 'skip' });
      await writeMedia(path.join(targetDir, 'X.jpg'));

      await expect(resolver.resolveDestination(targetDir, '/src/X.jpg')).resolves.toBe(
        path.join(targetDir, 'X_1.jpg')
      );
    });

    it('reuses the name with the overwrite strategy', async () => {
      const resolver = makeResolver({ duplicate_strategy: 'overwrite' });
      await writeMedia(path.join(targetDir, 'X.jpg'));

      await expect(resolver.resolveDestination(targetDir, '/src/X.jpg')).resolves.toBe(
        path.join(targetDir, 'X.jpg')
      );
    });

    it('treats claimed names as taken', async () => {
      const resolver = makeResolver();
      const claimed = new Set<string>();

      const first = await resolver.resolveDestination(targetDir, '/a/X.jpg', undefined, claimed);
      const second = await resolver.resolveDestination(targetDir, '/b/X.jpg', undefined, claimed);

      expect([first, second]).toEqual([
        path.join(targetDir, 'X.jpg'),
        path.join(targetDir, 'X_1.jpg'),
      ]);
      expect(claimed.size).toBe(2);
    });
  });
});
