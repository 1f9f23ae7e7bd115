import * as fs from 'fs/promises';
import * as path from 'path';

import { createSilentLogger } from '../../src/logger';
import { ExifToolReader, ExifToolTags } from '../../src/metadata/ExifToolReader';
import {
  droneDeviceFromName,
  formatFrameRate,
  MetadataProbe,
} from '../../src/metadata/MetadataProbe';
import { MediaKind } from '../../src/types/MediaKind';
import { MediaClassifier } from '../../src/utils/fileClassifier';
import { CAPTURE_DATE, makeContext, makeTempDir, writeMedia } from '../helpers';

/** Serves canned tags by file name instead of running exiftool */
class StubExifTool extends ExifToolReader {
  constructor(private tags: Record<string, ExifToolTags>) {
    super({ logger: createSilentLogger() });
  }

  read(filePath: string): Promise<ExifToolTags> {
    return Promise.resolve(this.tags[path.basename(filePath)] ?? {});
  }
}

describe('formatFrameRate', () => {
  it.each([
    ['59.94', '59fps'],
    ['29,97', '29fps'],
    ['30 fps', '30fps'],
    ['25', '25fps'],
    ['', ''],
    ['variable', ''],
    [undefined, ''],
  ])('%s -> %s', (value, expected) => {
    expect(formatFrameRate(value)).toBe(expected);
  });
});

describe('droneDeviceFromName', () => {
  it('recognises drone markers in the name', () => {
    expect(droneDeviceFromName('/card/DJI_0012.MOV', MediaKind.VIDEO)).toBe('大疆');
    expect(droneDeviceFromName('/card/dji_0012.jpg', MediaKind.IMAGE)).toBe('大疆');
  });

  it('treats LRF proxies as drone footage only for video', () => {
    expect(droneDeviceFromName('/card/clip.LRF', MediaKind.VIDEO)).toBe('大疆');
    expect(droneDeviceFromName('/card/clip.lrf', MediaKind.IMAGE)).toBeUndefined();
    expect(droneDeviceFromName('/card/clip.mov', MediaKind.VIDEO)).toBeUndefined();
  });
});

describe('MetadataProbe', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('probe');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('without exiftool', () => {
    it('falls back to the modification time and the unknown device', async () => {
      const photo = await writeMedia(path.join(tempDir, 'photo.jpg'));
      const probe = new MetadataProbe(makeContext(tempDir));

      await expect(probe.captureTime(photo, MediaKind.IMAGE)).resolves.toEqual(CAPTURE_DATE);
      await expect(probe.device(photo, MediaKind.IMAGE)).resolves.toBe('未知设备');
      await expect(probe.resolution(photo, MediaKind.IMAGE)).resolves.toBeUndefined();
      await expect(probe.frameRate(photo, MediaKind.IMAGE)).resolves.toBe('');
    });

    it('leaves the date unset when the fallback is disabled', async () => {
      const photo = await writeMedia(path.join(tempDir, 'photo.jpg'));
      const probe = new MetadataProbe(makeContext(tempDir, { date_fallback: 'none' }));

      await expect(probe.captureTime(photo, MediaKind.IMAGE)).resolves.toBeUndefined();
    });

    it('uses file name patterns and the configured unknown name', async () => {
      const ctx = makeContext(tempDir, { device_unknown_name: 'mystery' });
      const probe = new MetadataProbe(ctx);
      const raw = await writeMedia(path.join(tempDir, 'IMG_0042.CR2'));
      const song = await writeMedia(path.join(tempDir, 'IMG_0042.mp3'));

      await expect(probe.device(raw, MediaKind.IMAGE)).resolves.toBe('Canon');
      await expect(probe.device(song, MediaKind.AUDIO)).resolves.toBe('mystery');
    });
  });

  describe('with exiftool tags', () => {
    const tags: Record<string, ExifToolTags> = {
      'clip.mov': {
        Make: 'Apple',
        Model: 'iPhone 15',
        CreateDate: '2023:07:04 10:20:30',
        VideoFrameWidth: '3840',
        VideoFrameHeight: '2160',
        VideoFrameRate: '59.94',
      },
      'DJI_0012.MOV': { Make: 'Apple', Model: 'iPhone 15' },
      'pano.mp4': { ProjectionType: 'equirectangular' },
      'ricoh.mp4': { Make: 'RICOH THETA', Model: 'Z1' },
    };

    const makeProbe = () =>
      new MetadataProbe(
        makeContext(tempDir, { use_exiftool: true }, { exiftool: new StubExifTool(tags) })
      );

    it('reads date, device, resolution and frame rate', async () => {
      const probe = makeProbe();
      const clip = path.join(tempDir, 'clip.mov');

      await expect(probe.captureTime(clip, MediaKind.VIDEO)).resolves.toEqual(
        new Date(2023, 6, 4, 10, 20, 30)
      );
      await expect(probe.device(clip, MediaKind.VIDEO)).resolves.toBe('Apple iPhone 15');
      await expect(probe.resolution(clip, MediaKind.VIDEO)).resolves.toEqual({
        width: 3840,
        height: 2160,
      });
      await expect(probe.frameRate(clip, MediaKind.VIDEO)).resolves.toBe('59fps');
    });

    it('lets the drone name rule win over embedded make and model', async () => {
      const probe = makeProbe();

      await expect(
        probe.device(path.join(tempDir, 'DJI_0012.MOV'), MediaKind.VIDEO)
      ).resolves.toBe('大疆');
    });

    it('detects panoramic footage from projection and camera make', async () => {
      const probe = makeProbe();

      await expect(probe.isPanoramic(path.join(tempDir, 'pano.mp4'))).resolves.toBe(true);
      await expect(probe.isPanoramic(path.join(tempDir, 'ricoh.mp4'))).resolves.toBe(true);
      await expect(probe.isPanoramic(path.join(tempDir, 'clip.mov'))).resolves.toBe(false);
    });

    it('upgrades video to panoramic during classification', async () => {
      const ctx = makeContext(
        tempDir,
        { use_exiftool: true },
        { exiftool: new StubExifTool(tags) }
      );
      const classifier = new MediaClassifier(ctx.config, new MetadataProbe(ctx));

      await expect(classifier.classify(path.join(tempDir, 'pano.mp4'))).resolves.toBe(
        MediaKind.PANORAMIC_VIDEO
      );
      await expect(classifier.classify(path.join(tempDir, 'clip.mov'))).resolves.toBe(
        MediaKind.VIDEO
      );
    });
  });
});
