/**
 * Media kinds recognised by the classifier
 */
export enum MediaKind {
  IMAGE = 'image',
  VIDEO = 'video',
  PANORAMIC_VIDEO = 'panoramic_video',
  AUDIO = 'audio',
}

/** Kinds that get a device subfolder and device attribution */
export const DEVICE_KINDS: ReadonlySet<MediaKind> = new Set([
  MediaKind.IMAGE,
  MediaKind.VIDEO,
  MediaKind.PANORAMIC_VIDEO,
]);

export function isVideoKind(kind: MediaKind): boolean {
  return kind === MediaKind.VIDEO || kind === MediaKind.PANORAMIC_VIDEO;
}
