import type { Logger } from '../logger';
import { errorMessage } from '../utils/errors';
import { parseExifDate } from '../utils/naming';

/**
 * Fields read from the tags embedded in an image file
 */
export interface EmbeddedImageMetadata {
  make?: string;
  model?: string;
  captureTime?: Date;
  width?: number;
  height?: number;
}

const EXIF_TAGS = [
  'Make',
  'Model',
  'DateTimeOriginal',
  'CreateDate',
  'ModifyDate',
  'ImageWidth',
  'ImageHeight',
  'ExifImageWidth',
  'ExifImageHeight',
];

/**
 * EXIF metadata extractor for images
 * Uses the exifr library
 */
export class ExifExtractor {
  /**
   * Extract embedded metadata from an image file
   *
   * @param filePath - Absolute path to the image file
   * @returns Embedded metadata or undefined if extraction fails
   */
  static async extract(
    filePath: string,
    logger?: Logger
  ): Promise<EmbeddedImageMetadata | undefined> {
    try {
      // Dynamic import to avoid loading exifr if not needed
      const exifr = await import('exifr');
      const data: unknown = await exifr.parse(filePath, {
        pick: EXIF_TAGS,
        ihdr: true,
      });
      if (typeof data !== 'object' || data === null) {
        return undefined;
      }

      const captureTime =
        readDate(Reflect.get(data, 'DateTimeOriginal')) ??
        readDate(Reflect.get(data, 'CreateDate')) ??
        readDate(Reflect.get(data, 'ModifyDate'));

      return {
        make: readString(Reflect.get(data, 'Make')),
        model: readString(Reflect.get(data, 'Model')),
        captureTime,
        width:
          readDimension(Reflect.get(data, 'ExifImageWidth')) ??
          readDimension(Reflect.get(data, 'ImageWidth')),
        height:
          readDimension(Reflect.get(data, 'ExifImageHeight')) ??
          readDimension(Reflect.get(data, 'ImageHeight')),
      };
    } catch (error) {
      logger?.debug(
        { file: filePath, err: errorMessage(error) },
        'EXIF extraction failed.'
      );
      return undefined;
    }
  }
}

function readString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed || undefined;
}

function readDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value === 'string') {
    return parseExifDate(value);
  }
  return undefined;
}

function readDimension(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value > 0
    ? value
    : undefined;
}
