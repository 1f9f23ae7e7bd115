import type { Logger } from '../logger';
import { errorMessage } from '../utils/errors';
import { parseExifDate } from '../utils/naming';

/**
 * Container metadata read by music-metadata (audio files and MP4/QuickTime
 * video containers)
 */
export interface ContainerMetadata {
  creationTime?: Date;
}

/**
 * Container metadata extractor
 * Uses the music-metadata library
 */
export class AudioExtractor {
  /**
   * Extract the recording date from a media container
   *
   * @param filePath - Absolute path to the audio or video file
   * @returns Container metadata or undefined if extraction fails
   */
  static async extract(
    filePath: string,
    logger?: Logger
  ): Promise<ContainerMetadata | undefined> {
    try {
      const mm = await import('music-metadata');

      const metadata = await mm.parseFile(filePath, {
        duration: false,
        skipCovers: true,
      });

      const containerMetadata: ContainerMetadata = {};
      const creation = metadata.format.creationTime;
      if (creation instanceof Date && !Number.isNaN(creation.getTime())) {
        containerMetadata.creationTime = creation;
      } else if (metadata.common.date) {
        containerMetadata.creationTime = parseExifDate(metadata.common.date);
      }

      return containerMetadata;
    } catch (error) {
      logger?.debug(
        { file: filePath, err: errorMessage(error) },
        'Container metadata extraction failed.'
      );
      return undefined;
    }
  }
}
