import * as path from 'path';

import type { ShotsortConfig } from '../config';
import { DEFAULT_VIDEO_EXTENSIONS } from '../config';
import type { MetadataProbe } from '../metadata/MetadataProbe';
import { MediaKind } from '../types/MediaKind';

/** Extensions only ever written by 360° cameras */
export const PANORAMIC_EXTENSIONS = ['.360', '.insv', '.osv'];

const PANORAMIC_NAME_MARKERS = ['360', 'panoram', 'theta', 'insta360'];

// Proxy and edit sidecars some editors write next to the footage
const SIDECAR_SUFFIXES = ['.fg.op', '.fg.ed'];

/**
 * Panoramic detection from the path alone: a dedicated extension, or a
 * 360 / panorama / camera marker in the file name.
 */
export function isPanoramicByPath(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  if (PANORAMIC_EXTENSIONS.includes(ext)) {
    return true;
  }
  const stem = path.basename(filePath, path.extname(filePath)).toLowerCase();
  return PANORAMIC_NAME_MARKERS.some(marker => stem.includes(marker));
}

/**
 * Maps files to a media kind using the configured extension tables.
 */
export class MediaClassifier {
  private readonly imageExtensions: Set<string>;
  private readonly videoExtensions: Set<string>;
  private readonly audioExtensions: Set<string>;
  private readonly leaveInPlaceExtensions: Set<string>;

  constructor(
    private config: ShotsortConfig,
    private probe?: MetadataProbe
  ) {
    this.imageExtensions = new Set(config.imageExtensions);
    // The built-in video set always applies on top of the configured one
    this.videoExtensions = new Set([
      ...config.videoExtensions,
      ...DEFAULT_VIDEO_EXTENSIONS,
    ]);
    this.audioExtensions = new Set(config.audioExtensions);
    this.leaveInPlaceExtensions = new Set(config.leaveInPlaceExtensions);
  }

  /**
   * Kind from the extension and file name only. Videos that only metadata
   * would reveal as panoramic come back as plain video.
   */
  kindByPath(filePath: string): MediaKind | undefined {
    const ext = path.extname(filePath).toLowerCase();
    if (this.imageExtensions.has(ext)) {
      return MediaKind.IMAGE;
    }
    if (this.audioExtensions.has(ext)) {
      return MediaKind.AUDIO;
    }
    if (!this.videoExtensions.has(ext)) {
      return undefined;
    }
    return isPanoramicByPath(filePath)
      ? MediaKind.PANORAMIC_VIDEO
      : MediaKind.VIDEO;
  }

  /**
   * Full classification. `undefined` means the file is not media and takes no
   * part in organizing.
   */
  async classify(filePath: string): Promise<MediaKind | undefined> {
    const kind = this.kindByPath(filePath);
    if (kind !== MediaKind.VIDEO) {
      return kind;
    }
    if (this.config.useExiftool && this.probe) {
      if (await this.probe.isPanoramic(filePath)) {
        return MediaKind.PANORAMIC_VIDEO;
      }
    }
    return kind;
  }

  /**
   * Files that are never classified, moved or treated as companions.
   */
  shouldLeaveInPlace(filePath: string): boolean {
    const name = path.basename(filePath).toLowerCase();
    if (this.leaveInPlaceExtensions.has(path.extname(name))) {
      return true;
    }
    return SIDECAR_SUFFIXES.some(suffix => name.endsWith(suffix));
  }
}
