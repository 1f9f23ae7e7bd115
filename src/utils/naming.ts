import { DEFAULT_UNKNOWN_DEVICE } from '../config';

const FOLDER_UNSAFE_CHARS = /[<>:"/\\|?*]/g;
const NAME_UNSAFE_RUNS = /[<>:"/\\|?*\s]+/g;
const MAX_FOLDER_NAME_LENGTH = 80;
const MAX_UNIFIED_NAME_LENGTH = 120;

/**
 * Make a device label usable as a directory name.
 * Empty labels fall back to the unknown-device sentinel.
 */
export function sanitizeFolderName(
  name: string,
  fallback: string = DEFAULT_UNKNOWN_DEVICE
): string {
  const trimmed = name.trim();
  if (!trimmed) {
    return fallback;
  }
  return trimmed
    .replace(FOLDER_UNSAFE_CHARS, '_')
    .slice(0, MAX_FOLDER_NAME_LENGTH);
}

function sanitizeNamePart(value: string): string {
  return value.trim().replace(NAME_UNSAFE_RUNS, '_');
}

export interface UnifiedNameParts {
  device: string;
  date: string;
  resolution?: string; // e.g. 4000x3000
  frameRate?: string; // e.g. 60fps
}

/**
 * Build a `device_date[_WxH][_NNfps]` basename (no extension).
 */
export function buildUnifiedBasename(
  parts: UnifiedNameParts,
  fallbacks: { device: string; date: string }
): string {
  const segments = [
    sanitizeNamePart(parts.device) || fallbacks.device,
    sanitizeNamePart(parts.date) || fallbacks.date,
  ];
  const resolution = parts.resolution ? sanitizeNamePart(parts.resolution) : '';
  if (resolution) {
    segments.push(resolution);
  }
  const frameRate = parts.frameRate ? sanitizeNamePart(parts.frameRate) : '';
  if (frameRate) {
    segments.push(frameRate);
  }
  return segments
    .join('_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_UNIFIED_NAME_LENGTH);
}

/**
 * Format a date with a strftime-style pattern.
 * Supports %Y %y %m %d %H %M %S %j and %%; other directives are kept as-is.
 */
export function formatDate(date: Date, pattern: string): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  return pattern.replace(/%([%YymdHMSj])/g, (_match, directive: string) => {
    switch (directive) {
      case 'Y':
        return pad(date.getFullYear(), 4);
      case 'y':
        return pad(date.getFullYear() % 100);
      case 'm':
        return pad(date.getMonth() + 1);
      case 'd':
        return pad(date.getDate());
      case 'H':
        return pad(date.getHours());
      case 'M':
        return pad(date.getMinutes());
      case 'S':
        return pad(date.getSeconds());
      case 'j':
        return pad(dayOfYear(date), 3);
      default:
        return '%';
    }
  });
}

function dayOfYear(date: Date): number {
  const startOfYear = new Date(date.getFullYear(), 0, 1);
  const startOfDay = new Date(
    date.getFullYear(),
    date.getMonth(),
    date.getDate()
  );
  return Math.round((startOfDay.getTime() - startOfYear.getTime()) / 86_400_000) + 1;
}

/**
 * Whether a directory name looks like a date bucket (20250816, 2025-08-16).
 */
export function isDateLikeFolder(name: string): boolean {
  const value = name.trim();
  if (!value || value.length > 20) {
    return false;
  }
  return /^\d{8}$/.test(value) || /^\d{4}-\d{2}-\d{2}$/.test(value);
}

/**
 * Parse EXIF-style timestamps (`2024:03:01 10:20:30`, `2024-03-01 10:20:30`)
 * as local time. Trailing timezone or sub-second parts are ignored.
 */
export function parseExifDate(value: string): Date | undefined {
  const match = value
    .trim()
    .match(/^(\d{4})[:-](\d{2})[:-](\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?/);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour = '0', minute = '0', second = '0'] = match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  if (y === 0 || mo < 1 || mo > 12 || d < 1 || d > 31) {
    return undefined;
  }
  const date = new Date(y, mo - 1, d, Number(hour), Number(minute), Number(second));
  return Number.isNaN(date.getTime()) ? undefined : date;
}
