import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import { errorMessage, isMissingFileError } from './utils/errors';
import {
  getDefaultConfigPath,
  getProcessedSetPath,
  resolveUserPath,
} from './utils/stateDir';

export const DEFAULT_IMAGE_EXTENSIONS = [
  '.jpg',
  '.jpeg',
  '.png',
  '.heic',
  '.heif',
  '.gif',
  '.bmp',
  '.webp',
  '.raw',
  '.cr2',
  '.nef',
  '.arw',
  '.dng',
];

export const DEFAULT_VIDEO_EXTENSIONS = [
  '.mp4',
  '.mov',
  '.mkv',
  '.avi',
  '.wmv',
  '.webm',
  '.m4v',
  '.3gp',
  '.mpg',
  '.mpeg',
  '.mts',
  '.360',
  '.insv',
  '.lrf',
  '.osv',
];

export const DEFAULT_AUDIO_EXTENSIONS = [
  '.mp3',
  '.m4a',
  '.wav',
  '.aac',
  '.flac',
  '.ogg',
  '.wma',
];

export const DEFAULT_LEAVE_IN_PLACE_EXTENSIONS = [
  '.op',
  '.ed',
  '.lrprev',
  '.lock',
];

export const DEFAULT_UNKNOWN_DEVICE = '未知设备';

const MIN_POLL_INTERVAL_SEC = 15;

const folderStructureSchema = z.object({
  date_format: z.string().min(1),
  image_subfolder: z.string().min(1),
  video_subfolder: z.string().min(1),
  audio_subfolder: z.string().min(1),
  panoramic_subfolder: z.string().min(1),
  device_subfolder: z.boolean(),
});

const autoCopySchema = z.object({
  enabled: z.boolean(),
  watch_paths: z.array(z.string().min(1)),
  target_path: z.string(),
  poll_interval_sec: z.number().int().positive(),
});

const configDocumentSchema = z.object({
  source_path: z.string(),
  output_path: z.string(),
  super_copy_source: z.string(),
  super_copy_target: z.string(),
  image_extensions: z.array(z.string().min(1)),
  video_extensions: z.array(z.string().min(1)),
  audio_extensions: z.array(z.string().min(1)),
  leave_in_place_extensions: z.array(z.string().min(1)),
  related_same_stem: z.boolean(),
  date_fallback: z.enum(['mtime', 'none']),
  device_unknown_name: z.string(),
  folder_structure: folderStructureSchema,
  move_files: z.boolean(),
  duplicate_strategy: z.enum(['skip', 'rename', 'overwrite']),
  delete_empty_folders: z.boolean(),
  use_exiftool: z.boolean(),
  unified_naming: z.boolean(),
  auto_copy: autoCopySchema,
  ignore: z.array(z.string().min(1)),
  undated_folder: z.string().min(1),
  overflow_folder: z.string().min(1),
});

/** On-disk configuration document (snake_case, as users write it) */
export type ConfigDocument = z.infer<typeof configDocumentSchema>;

export type DuplicateStrategy = ConfigDocument['duplicate_strategy'];
export type DateFallback = ConfigDocument['date_fallback'];

export const DEFAULT_CONFIG_DOCUMENT: ConfigDocument = {
  source_path: '',
  output_path: '',
  super_copy_source: '',
  super_copy_target: '',
  image_extensions: DEFAULT_IMAGE_EXTENSIONS,
  video_extensions: DEFAULT_VIDEO_EXTENSIONS,
  audio_extensions: DEFAULT_AUDIO_EXTENSIONS,
  leave_in_place_extensions: DEFAULT_LEAVE_IN_PLACE_EXTENSIONS,
  related_same_stem: true,
  date_fallback: 'mtime',
  device_unknown_name: DEFAULT_UNKNOWN_DEVICE,
  folder_structure: {
    date_format: '%Y-%m-%d',
    image_subfolder: 'image',
    video_subfolder: 'video',
    audio_subfolder: 'audio',
    panoramic_subfolder: 'panoramic_video',
    device_subfolder: true,
  },
  move_files: true,
  duplicate_strategy: 'rename',
  delete_empty_folders: false,
  use_exiftool: true,
  unified_naming: true,
  auto_copy: {
    enabled: false,
    watch_paths: ['/media'],
    target_path: '',
    poll_interval_sec: 60,
  },
  ignore: [],
  undated_folder: 'undated',
  overflow_folder: 'other_files',
};

/** Partial override accepted by `resolveConfig` and found in config files */
export type ShotsortConfigInput = Record<string, unknown>;

export interface FolderStructure {
  dateFormat: string;
  imageSubfolder: string;
  videoSubfolder: string;
  audioSubfolder: string;
  panoramicSubfolder: string;
  deviceSubfolder: boolean;
}

export interface AutoCopyConfig {
  enabled: boolean;
  watchPaths: string[];
  targetPath: string;
  pollIntervalSec: number;
}

export interface ShotsortConfig {
  /** Config file this configuration was read from (or would be saved to) */
  configPath: string;
  /** Directory holding the config, processed set and device overrides */
  stateDir: string;
  processedSetPath: string;
  sourcePath: string;
  outputPath: string;
  superCopySource: string;
  superCopyTarget: string;
  imageExtensions: string[];
  videoExtensions: string[];
  audioExtensions: string[];
  leaveInPlaceExtensions: string[];
  relatedSameStem: boolean;
  dateFallback: DateFallback;
  deviceUnknownName: string;
  folderStructure: FolderStructure;
  moveFiles: boolean;
  duplicateStrategy: DuplicateStrategy;
  deleteEmptyFolders: boolean;
  useExiftool: boolean;
  unifiedNaming: boolean;
  autoCopy: AutoCopyConfig;
  ignore: string[];
  undatedFolder: string;
  overflowFolder: string;
}

export class ShotsortConfigError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'ShotsortConfigError';
  }
}

/**
 * Load a config file, deep-merging it over the defaults.
 * A missing file yields the defaults; an unreadable or invalid one throws.
 */
export async function loadConfig(
  providedPath: string = getDefaultConfigPath()
): Promise<ShotsortConfig> {
  const absolutePath = path.resolve(providedPath);
  let fileContents: string | undefined;
  try {
    fileContents = await fs.readFile(absolutePath, 'utf8');
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw new ShotsortConfigError(
        `Unable to read config at ${absolutePath}: ${errorMessage(error)}`,
        error
      );
    }
  }

  const parsed =
    fileContents === undefined || !fileContents.trim()
      ? {}
      : parseConfigFile(fileContents, absolutePath);

  return normalizeConfig(parsed, absolutePath);
}

/**
 * Build a config from an inline override, as if it had been read from
 * `configPath`.
 */
export function resolveConfig(
  override: ShotsortConfigInput = {},
  configPath: string = getDefaultConfigPath()
): ShotsortConfig {
  return normalizeConfig(override, path.resolve(configPath));
}

/**
 * Write the full configuration document back to its config file.
 */
export async function saveConfig(
  config: ShotsortConfig,
  targetPath: string = config.configPath
): Promise<void> {
  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  await fs.writeFile(
    targetPath,
    `${JSON.stringify(toConfigDocument(config), null, 2)}\n`,
    'utf8'
  );
}

export function toConfigDocument(config: ShotsortConfig): ConfigDocument {
  return {
    source_path: config.sourcePath,
    output_path: config.outputPath,
    super_copy_source: config.superCopySource,
    super_copy_target: config.superCopyTarget,
    image_extensions: config.imageExtensions,
    video_extensions: config.videoExtensions,
    audio_extensions: config.audioExtensions,
    leave_in_place_extensions: config.leaveInPlaceExtensions,
    related_same_stem: config.relatedSameStem,
    date_fallback: config.dateFallback,
    device_unknown_name: config.deviceUnknownName,
    folder_structure: {
      date_format: config.folderStructure.dateFormat,
      image_subfolder: config.folderStructure.imageSubfolder,
      video_subfolder: config.folderStructure.videoSubfolder,
      audio_subfolder: config.folderStructure.audioSubfolder,
      panoramic_subfolder: config.folderStructure.panoramicSubfolder,
      device_subfolder: config.folderStructure.deviceSubfolder,
    },
    move_files: config.moveFiles,
    duplicate_strategy: config.duplicateStrategy,
    delete_empty_folders: config.deleteEmptyFolders,
    use_exiftool: config.useExiftool,
    unified_naming: config.unifiedNaming,
    auto_copy: {
      enabled: config.autoCopy.enabled,
      watch_paths: config.autoCopy.watchPaths,
      target_path: config.autoCopy.targetPath,
      poll_interval_sec: config.autoCopy.pollIntervalSec,
    },
    ignore: config.ignore,
    undated_folder: config.undatedFolder,
    overflow_folder: config.overflowFolder,
  };
}

function parseConfigFile(contents: string, filename: string): unknown {
  const ext = path.extname(filename).toLowerCase();
  if (ext && ext !== '.json') {
    throw new ShotsortConfigError(
      `Unsupported config extension "${ext}". Use JSON for now.`
    );
  }

  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new ShotsortConfigError(
      `Unable to parse config file ${filename} as JSON.`,
      error
    );
  }
}

function normalizeConfig(rawConfig: unknown, configPath: string): ShotsortConfig {
  if (!isPlainObject(rawConfig)) {
    throw new ShotsortConfigError('Config root must be an object.');
  }

  const merged = deepMerge(DEFAULT_CONFIG_DOCUMENT, rawConfig);
  const result = configDocumentSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ShotsortConfigError(
      `Invalid config ${configPath}: ${details}`,
      result.error
    );
  }

  const doc = result.data;
  const stateDir = path.dirname(configPath);
  const resolveOptional = (value: string) =>
    value.trim() ? resolveUserPath(value.trim(), stateDir) : '';

  return {
    configPath,
    stateDir,
    processedSetPath: getProcessedSetPath(stateDir),
    sourcePath: resolveOptional(doc.source_path),
    outputPath: resolveOptional(doc.output_path),
    superCopySource: resolveOptional(doc.super_copy_source),
    superCopyTarget: resolveOptional(doc.super_copy_target),
    imageExtensions: normalizeExtensions(doc.image_extensions),
    videoExtensions: normalizeExtensions(doc.video_extensions),
    audioExtensions: normalizeExtensions(doc.audio_extensions),
    leaveInPlaceExtensions: normalizeExtensions(doc.leave_in_place_extensions),
    relatedSameStem: doc.related_same_stem,
    dateFallback: doc.date_fallback,
    deviceUnknownName: doc.device_unknown_name.trim() || DEFAULT_UNKNOWN_DEVICE,
    folderStructure: {
      dateFormat: doc.folder_structure.date_format,
      imageSubfolder: doc.folder_structure.image_subfolder,
      videoSubfolder: doc.folder_structure.video_subfolder,
      audioSubfolder: doc.folder_structure.audio_subfolder,
      panoramicSubfolder: doc.folder_structure.panoramic_subfolder,
      deviceSubfolder: doc.folder_structure.device_subfolder,
    },
    moveFiles: doc.move_files,
    duplicateStrategy: doc.duplicate_strategy,
    deleteEmptyFolders: doc.delete_empty_folders,
    useExiftool: doc.use_exiftool,
    unifiedNaming: doc.unified_naming,
    autoCopy: {
      enabled: doc.auto_copy.enabled,
      watchPaths: doc.auto_copy.watch_paths.map(p => resolveUserPath(p, stateDir)),
      targetPath: resolveOptional(doc.auto_copy.target_path),
      pollIntervalSec: Math.max(
        MIN_POLL_INTERVAL_SEC,
        doc.auto_copy.poll_interval_sec
      ),
    },
    ignore: dedupeStrings(doc.ignore),
    undatedFolder: doc.undated_folder,
    overflowFolder: doc.overflow_folder,
  };
}

/**
 * Recursively merge `override` over `base`. Only plain objects present on both
 * sides merge; anything else in the override replaces the base value.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(current) && isPlainObject(value)) {
      result[key] = deepMerge(current, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function normalizeExtensions(extensions: string[]): string[] {
  return dedupeStrings(
    extensions.map(ext => {
      const lower = ext.trim().toLowerCase();
      return lower.startsWith('.') ? lower : `.${lower}`;
    })
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function dedupeStrings(items: string[]): string[] {
  return Array.from(new Set(items));
}
