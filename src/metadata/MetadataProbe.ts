import fs from 'fs/promises';
import path from 'path';

import type { OrganizerContext } from '../context';
import type { Logger } from '../logger';
import { DEVICE_KINDS, MediaKind, isVideoKind } from '../types/MediaKind';
import type { Resolution } from '../types/MediaRecord';
import { errorMessage } from '../utils/errors';
import { parseExifDate, sanitizeFolderName } from '../utils/naming';
import { PromiseCache } from '../utils/promiseCache';
import { AudioExtractor, type ContainerMetadata } from './AudioExtractor';
import { ExifExtractor, type EmbeddedImageMetadata } from './ExifExtractor';
import type { ExifToolTag, ExifToolTags } from './ExifToolReader';
import { VideoExtractor, type VideoContainerMetadata } from './VideoExtractor';

/** Device label for drone footage, recognised from file names alone */
export const DRONE_DEVICE_NAME = '大疆';
const DRONE_MARKERS = ['DJI', DRONE_DEVICE_NAME];
const DRONE_EXTENSION = '.lrf';

const IMAGE_DATE_TAGS: ExifToolTag[] = ['DateTimeOriginal', 'CreateDate'];
const MEDIA_DATE_TAGS: ExifToolTag[] = [
  'CreateDate',
  'DateTimeOriginal',
  'MediaCreateDate',
];
const RESOLUTION_TAGS: Array<[ExifToolTag, ExifToolTag]> = [
  ['ImageWidth', 'ImageHeight'],
  ['VideoFrameWidth', 'VideoFrameHeight'],
];
const FRAME_RATE_TAGS: ExifToolTag[] = ['VideoFrameRate', 'FrameRate'];

/**
 * Layered metadata lookup: embedded tags, then exiftool, then the container
 * parsers, then file-name patterns and finally the modification time.
 *
 * None of the public methods throw. Missing data comes back as `undefined`
 * (or an empty string for the frame rate).
 */
export class MetadataProbe {
  private readonly logger: Logger;
  private embedded = new PromiseCache<EmbeddedImageMetadata | undefined>();
  private video = new PromiseCache<VideoContainerMetadata | undefined>();
  private container = new PromiseCache<ContainerMetadata | undefined>();

  constructor(private ctx: OrganizerContext) {
    this.logger = ctx.logger.child({ scope: 'probe' });
  }

  async resolution(filePath: string, kind: MediaKind): Promise<Resolution | undefined> {
    try {
      if (kind === MediaKind.IMAGE) {
        const exif = await this.readEmbedded(filePath);
        if (exif?.width && exif.height) {
          return { width: exif.width, height: exif.height };
        }
      }

      const tags = await this.readExifTool(filePath);
      for (const [widthTag, heightTag] of RESOLUTION_TAGS) {
        const width = tags[widthTag] ?? '';
        const height = tags[heightTag] ?? '';
        if (/^\d+$/.test(width) && /^\d+$/.test(height)) {
          return { width: Number(width), height: Number(height) };
        }
      }

      if (isVideoKind(kind)) {
        const video = await this.readVideo(filePath);
        if (video?.width && video.height) {
          return { width: video.width, height: video.height };
        }
      }
    } catch (error) {
      this.logFailure('resolution', filePath, error);
    }
    return undefined;
  }

  /**
   * Frame rate rendered as `NNfps`; empty for non-video kinds or when unknown.
   */
  async frameRate(filePath: string, kind: MediaKind): Promise<string> {
    if (!isVideoKind(kind)) {
      return '';
    }
    try {
      const tags = await this.readExifTool(filePath);
      for (const tag of FRAME_RATE_TAGS) {
        const formatted = formatFrameRate(tags[tag]);
        if (formatted) {
          return formatted;
        }
      }

      const video = await this.readVideo(filePath);
      if (video?.frameRate) {
        return `${Math.trunc(video.frameRate)}fps`;
      }
    } catch (error) {
      this.logFailure('frameRate', filePath, error);
    }
    return '';
  }

  async captureTime(filePath: string, kind: MediaKind): Promise<Date | undefined> {
    try {
      const found = await this.captureTimeFromMetadata(filePath, kind);
      if (found) {
        return found;
      }
    } catch (error) {
      this.logFailure('captureTime', filePath, error);
    }

    if (this.ctx.config.dateFallback === 'mtime') {
      try {
        const stats = await fs.stat(filePath);
        return stats.mtime;
      } catch (error) {
        this.logFailure('mtime', filePath, error);
      }
    }
    return undefined;
  }

  /**
   * Device label, sanitized for use as a folder name. Falls back to the
   * configured unknown-device name.
   */
  async device(filePath: string, kind: MediaKind): Promise<string> {
    const unknown = this.ctx.config.deviceUnknownName;
    if (!DEVICE_KINDS.has(kind)) {
      return unknown;
    }

    const droneDevice = droneDeviceFromName(filePath, kind);
    if (droneDevice) {
      return droneDevice;
    }

    try {
      if (kind === MediaKind.IMAGE) {
        const exif = await this.readEmbedded(filePath);
        const label = joinMakeModel(exif?.make, exif?.model);
        if (label) {
          return sanitizeFolderName(label, unknown);
        }
      }

      const tags = await this.readExifTool(filePath);
      const toolLabel = joinMakeModel(tags.Make, tags.Model);
      if (toolLabel) {
        return sanitizeFolderName(toolLabel, unknown);
      }

      if (isVideoKind(kind)) {
        const video = await this.readVideo(filePath);
        const containerLabel = joinMakeModel(video?.make, video?.model);
        if (containerLabel) {
          return sanitizeFolderName(containerLabel, unknown);
        }
      }

      const patternDevice = await this.ctx.devices.match(filePath);
      if (patternDevice) {
        return sanitizeFolderName(patternDevice, unknown);
      }
    } catch (error) {
      this.logFailure('device', filePath, error);
    }
    return unknown;
  }

  /**
   * Metadata signals for 360° footage: equirectangular projection, or a
   * make/model naming a 360 camera.
   */
  async isPanoramic(filePath: string): Promise<boolean> {
    try {
      const tags = await this.readExifTool(filePath);
      const projection = (tags.ProjectionType ?? '').trim().toLowerCase();
      if (projection === 'equirectangular') {
        return true;
      }
      const make = tags.Make ?? '';
      const model = tags.Model ?? '';
      if (make.includes('360') || model.includes('360')) {
        return true;
      }
      const lowerMake = make.toLowerCase();
      return lowerMake.includes('theta') || lowerMake.includes('insta360');
    } catch (error) {
      this.logFailure('isPanoramic', filePath, error);
      return false;
    }
  }

  /** Drop cached metadata for a path that no longer holds the same file. */
  forget(filePath: string): void {
    this.embedded.delete(filePath);
    this.video.delete(filePath);
    this.container.delete(filePath);
    this.ctx.exiftool.forget(filePath);
  }

  private async captureTimeFromMetadata(
    filePath: string,
    kind: MediaKind
  ): Promise<Date | undefined> {
    if (kind === MediaKind.IMAGE) {
      const exif = await this.readEmbedded(filePath);
      if (exif?.captureTime) {
        return exif.captureTime;
      }
      return firstExifDate(await this.readExifTool(filePath), IMAGE_DATE_TAGS);
    }

    const toolDate = firstExifDate(
      await this.readExifTool(filePath),
      MEDIA_DATE_TAGS
    );
    if (toolDate) {
      return toolDate;
    }

    if (isVideoKind(kind)) {
      const video = await this.readVideo(filePath);
      if (video?.creationTime) {
        return video.creationTime;
      }
    }
    const container = await this.container.get(filePath, () =>
      AudioExtractor.extract(filePath, this.logger)
    );
    return container?.creationTime;
  }

  private readEmbedded(filePath: string): Promise<EmbeddedImageMetadata | undefined> {
    return this.embedded.get(filePath, () =>
      ExifExtractor.extract(filePath, this.logger)
    );
  }

  private readVideo(filePath: string): Promise<VideoContainerMetadata | undefined> {
    return this.video.get(filePath, () =>
      VideoExtractor.extract(filePath, this.logger)
    );
  }

  private async readExifTool(filePath: string): Promise<ExifToolTags> {
    if (!this.ctx.config.useExiftool) {
      return {};
    }
    return this.ctx.exiftool.read(filePath);
  }

  private logFailure(step: string, filePath: string, error: unknown): void {
    this.logger.debug(
      { step, file: filePath, err: errorMessage(error) },
      'Metadata probe step failed.'
    );
  }
}

/**
 * Drone footage is recognised from the file name alone: a `DJI` marker in the
 * stem, or a low-resolution proxy (`.LRF`) video.
 */
export function droneDeviceFromName(
  filePath: string,
  kind: MediaKind
): string | undefined {
  const ext = path.extname(filePath);
  const stem = path.basename(filePath, ext);
  const upper = stem.toUpperCase();
  if (DRONE_MARKERS.some(marker => upper.includes(marker))) {
    return DRONE_DEVICE_NAME;
  }
  if (isVideoKind(kind) && ext.toLowerCase() === DRONE_EXTENSION) {
    return DRONE_DEVICE_NAME;
  }
  return undefined;
}

/**
 * Normalise exiftool frame-rate values (`59.94`, `29,97`, `30 fps`) to `NNfps`.
 */
export function formatFrameRate(value: string | undefined): string {
  const text = (value ?? '').trim().replace(/,/g, '.');
  if (!text) {
    return '';
  }
  if (/^\d+(\.\d+)?$/.test(text)) {
    return `${Math.trunc(Number(text))}fps`;
  }
  const match = text.match(/(\d+(?:\.\d+)?)\s*fps?/i);
  return match ? `${Math.trunc(Number(match[1]))}fps` : '';
}

function firstExifDate(tags: ExifToolTags, order: ExifToolTag[]): Date | undefined {
  for (const tag of order) {
    const value = tags[tag];
    if (!value) {
      continue;
    }
    const parsed = parseExifDate(value);
    if (parsed) {
      return parsed;
    }
  }
  return undefined;
}

function joinMakeModel(make?: string, model?: string): string {
  return `${(make ?? '').trim()} ${(model ?? '').trim()}`.trim();
}
