import * as fs from 'fs/promises';
import * as path from 'path';

import {
  parseFrameRate,
  toVideoMetadata,
  VideoExtractor,
} from '../../src/metadata/VideoExtractor';
import { makeTempDir } from '../helpers';

describe('parseFrameRate', () => {
  it.each([
    ['25', 25],
    ['30000/1001', 30000 / 1001],
    ['0/0', undefined],
    ['', undefined],
    [undefined, undefined],
  ])('%s -> %s', (value, expected) => {
    expect(parseFrameRate(value)).toBe(expected);
  });
});

describe('toVideoMetadata', () => {
  it('reads the first video stream and container tags', () => {
    const metadata = toVideoMetadata({
      streams: [
        { index: 0, codec_type: 'audio' },
        { index: 1, codec_type: 'video', width: 3840, height: 2160, avg_frame_rate: '60/1' },
      ],
      format: {
        tags: {
          creation_time: '2024-03-01T10:00:00.000Z',
          'com.apple.quicktime.make': 'Apple',
          'com.apple.quicktime.model': 'iPhone 15',
        },
      },
    });

    expect(metadata).toEqual({
      width: 3840,
      height: 2160,
      frameRate: 60,
      creationTime: new Date('2024-03-01T10:00:00.000Z'),
      make: 'Apple',
      model: 'iPhone 15',
    });
  });

  it('drops epoch creation times', () => {
    const metadata = toVideoMetadata({
      streams: [],
      format: { tags: { creation_time: '1970-01-01T00:00:00.000Z' } },
    });

    expect(metadata).toEqual({});
  });
});

describe('VideoExtractor', () => {
  const itPosix = process.platform === 'win32' ? it.skip : it;
  let tempDir: string;

  const writeTool = async (body: string) => {
    const binary = path.join(tempDir, 'fake-ffprobe');
    await fs.writeFile(binary, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return binary;
  };

  beforeEach(async () => {
    tempDir = await makeTempDir('ffprobe');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  itPosix('reads the JSON the tool prints', async () => {
    const binary = await writeTool(
      `echo '{"streams":[{"codec_type":"video","width":1920,"height":1080,"avg_frame_rate":"30/1"}],"format":{"tags":{"make":"DJI"}}}'`
    );

    await expect(VideoExtractor.extract('/card/clip.mp4', undefined, { binary })).resolves.toEqual({
      width: 1920,
      height: 1080,
      frameRate: 30,
      make: 'DJI',
    });
  });

  itPosix('gives up and kills the tool after the timeout', async () => {
    const binary = await writeTool('exec sleep 30');
    const started = Date.now();

    await expect(
      VideoExtractor.extract('/card/clip.mp4', undefined, { binary, timeoutMs: 200 })
    ).resolves.toBeUndefined();
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it('returns undefined when the tool is missing', async () => {
    await expect(
      VideoExtractor.extract('/card/clip.mp4', undefined, {
        binary: path.join(tempDir, 'missing-ffprobe'),
      })
    ).resolves.toBeUndefined();
  });
});
