import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';

import type { Logger } from '../logger';
import { errorMessage } from '../utils/errors';

const execFilePromise = promisify(execFile);

/**
 * Container-level facts about a video file
 */
export interface VideoContainerMetadata {
  width?: number;
  height?: number;
  frameRate?: number; // FPS
  creationTime?: Date;
  make?: string;
  model?: string;
}

export const FFPROBE_TIMEOUT_MS = 10_000;

const tagsSchema = z.record(z.union([z.string(), z.number()]));

const ffprobeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        index: z.number().optional(),
        codec_type: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        avg_frame_rate: z.string().optional(),
        r_frame_rate: z.string().optional(),
        tags: tagsSchema.optional(),
      })
    )
    .default([]),
  format: z.object({ tags: tagsSchema.optional() }).optional(),
});

/** The parts of `ffprobe -print_format json` output that are read */
export type FfprobeOutput = z.infer<typeof ffprobeOutputSchema>;

export interface VideoExtractorOptions {
  /** Defaults to `FFPROBE_PATH`, then `ffprobe` on the PATH */
  binary?: string;
  timeoutMs?: number;
}

/**
 * Video metadata extractor
 * Requires ffprobe to be installed on the system; a run that outlives the
 * timeout is killed.
 */
export class VideoExtractor {
  /**
   * Extract metadata from a video container
   *
   * @param filePath - Absolute path to the video file
   * @returns Video metadata or undefined if extraction fails
   */
  static async extract(
    filePath: string,
    logger?: Logger,
    options: VideoExtractorOptions = {}
  ): Promise<VideoContainerMetadata | undefined> {
    try {
      const { stdout } = await execFilePromise(
        options.binary ?? process.env.FFPROBE_PATH ?? 'ffprobe',
        ['-v', 'quiet', '-print_format', 'json', '-show_streams', '-show_format', filePath],
        {
          timeout: options.timeoutMs ?? FFPROBE_TIMEOUT_MS,
          killSignal: 'SIGKILL',
          maxBuffer: 10 * 1024 * 1024,
          windowsHide: true,
        }
      );
      return toVideoMetadata(ffprobeOutputSchema.parse(JSON.parse(stdout)));
    } catch (error) {
      logger?.debug(
        { file: filePath, err: errorMessage(error) },
        'Video metadata extraction failed.'
      );
      return undefined;
    }
  }
}

export function toVideoMetadata(data: FfprobeOutput): VideoContainerMetadata {
  const videoMetadata: VideoContainerMetadata = {};

  // Find video stream
  const videoStream = data.streams.find(s => s.codec_type === 'video');
  if (videoStream) {
    if (videoStream.width) videoMetadata.width = videoStream.width;
    if (videoStream.height) videoMetadata.height = videoStream.height;
    const rate = parseFrameRate(
      videoStream.avg_frame_rate ?? videoStream.r_frame_rate
    );
    if (rate) videoMetadata.frameRate = rate;
  }

  const formatTags = data.format?.tags ?? {};
  const creation =
    readTag(formatTags, 'creation_time') ??
    readTag(videoStream?.tags ?? {}, 'creation_time');
  if (creation) {
    const parsed = new Date(creation);
    if (!Number.isNaN(parsed.getTime()) && parsed.getFullYear() > 1970) {
      videoMetadata.creationTime = parsed;
    }
  }

  const make =
    readTag(formatTags, 'com.apple.quicktime.make') ?? readTag(formatTags, 'make');
  const model =
    readTag(formatTags, 'com.apple.quicktime.model') ?? readTag(formatTags, 'model');
  if (make) videoMetadata.make = make;
  if (model) videoMetadata.model = model;

  return videoMetadata;
}

/**
 * Parse frame rates such as "30000/1001" or "25"
 */
export function parseFrameRate(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const [num, den] = value.split('/').map(Number);
  const rate = den ? num / den : num;
  return Number.isFinite(rate) && rate > 0 ? rate : undefined;
}

function readTag(
  tags: Record<string, string | number>,
  key: string
): string | undefined {
  const value = tags[key];
  if (value === undefined) {
    return undefined;
  }
  const text = String(value).trim();
  return text || undefined;
}
