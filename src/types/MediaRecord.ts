import { MediaKind } from './MediaKind';

/**
 * Per-file classification result, rebuilt for every file and never persisted
 */
export interface MediaRecord {
  path: string; // Absolute path
  kind: MediaKind;
  captureTime?: Date; // Absent when no metadata and fallback disabled
  device: string; // Unknown-device sentinel when nothing matched
  dateString: string; // Used verbatim as a directory name
}

export interface Resolution {
  width: number;
  height: number;
}
