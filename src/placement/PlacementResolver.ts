import path from 'path';

import type { OrganizerContext } from '../context';
import type { MetadataProbe } from '../metadata/MetadataProbe';
import { DEVICE_KINDS, MediaKind } from '../types/MediaKind';
import type { MediaRecord } from '../types/MediaRecord';
import { isSameFile, statIfExists } from '../utils/fsOps';
import {
  buildUnifiedBasename,
  formatDate,
  sanitizeFolderName,
} from '../utils/naming';

const MAX_COLLISION_SUFFIX = 9998;

/** Where a primary file and its companions should go */
export interface Placement {
  record: MediaRecord;
  targetDir: string;
  /** Shared basename (no extension) when unified naming is on */
  unifiedBasename?: string;
}

/**
 * Computes destination directories and collision-free file names.
 *
 * Collision state is never stored: it is read from the destination directory
 * each time, plus an optional set of paths already claimed during a run that
 * writes nothing (scan-only and dry-run plans).
 */
export class PlacementResolver {
  constructor(
    private ctx: OrganizerContext,
    private probe: MetadataProbe
  ) {}

  async buildRecord(filePath: string, kind: MediaKind): Promise<MediaRecord> {
    const captureTime = await this.probe.captureTime(filePath, kind);
    const dateString = captureTime
      ? formatDate(captureTime, this.ctx.config.folderStructure.dateFormat)
      : this.ctx.config.undatedFolder;
    const device = await this.probe.device(filePath, kind);
    return { path: filePath, kind, captureTime, device, dateString };
  }

  async plan(filePath: string, kind: MediaKind, outputRoot: string): Promise<Placement> {
    const record = await this.buildRecord(filePath, kind);
    const targetDir = this.targetDirectory(record, outputRoot);
    const unifiedBasename = this.ctx.config.unifiedNaming
      ? await this.unifiedBasename(record)
      : undefined;
    return { record, targetDir, unifiedBasename };
  }

  /**
   * `outputRoot/date/kind[/device]`
   */
  targetDirectory(record: MediaRecord, outputRoot: string): string {
    const structure = this.ctx.config.folderStructure;
    const segments = [outputRoot, record.dateString, this.kindSubfolder(record.kind)];
    if (structure.deviceSubfolder && DEVICE_KINDS.has(record.kind)) {
      segments.push(
        sanitizeFolderName(record.device, this.ctx.config.deviceUnknownName)
      );
    }
    return path.join(...segments);
  }

  kindSubfolder(kind: MediaKind): string {
    const structure = this.ctx.config.folderStructure;
    switch (kind) {
      case MediaKind.IMAGE:
        return structure.imageSubfolder;
      case MediaKind.VIDEO:
        return structure.videoSubfolder;
      case MediaKind.PANORAMIC_VIDEO:
        return structure.panoramicSubfolder;
      case MediaKind.AUDIO:
        return structure.audioSubfolder;
    }
  }

  async unifiedBasename(record: MediaRecord): Promise<string> {
    const resolution = await this.probe.resolution(record.path, record.kind);
    const frameRate = await this.probe.frameRate(record.path, record.kind);
    return buildUnifiedBasename(
      {
        device: record.device,
        date: record.dateString,
        resolution: resolution ? `${resolution.width}x${resolution.height}` : '',
        frameRate,
      },
      {
        device: this.ctx.config.deviceUnknownName,
        date: this.ctx.config.undatedFolder,
      }
    );
  }

  /**
   * Pick the destination for `filePath` inside `targetDir`.
   *
   * A free name is used as is; so is an existing entry that is the source
   * file itself. With the `overwrite` strategy an existing name is reused.
   * Otherwise (`skip` and `rename`) `_1`, `_2`, ... are tried in order.
   */
  async resolveDestination(
    targetDir: string,
    filePath: string,
    unifiedBasename?: string,
    claimed?: Set<string>
  ): Promise<string> {
    const ext = path.extname(filePath);
    const stem = unifiedBasename ?? path.basename(filePath, ext);
    const candidate = path.join(targetDir, `${stem}${ext}`);

    if (!(await this.isTaken(candidate, claimed))) {
      return this.claim(candidate, claimed);
    }
    if (await isSameFile(candidate, filePath)) {
      return this.claim(candidate, claimed);
    }
    if (this.ctx.config.duplicateStrategy === 'overwrite') {
      return this.claim(candidate, claimed);
    }

    let next = candidate;
    for (let index = 1; index <= MAX_COLLISION_SUFFIX; index++) {
      next = path.join(targetDir, `${stem}_${index}${ext}`);
      if (!(await this.isTaken(next, claimed))) {
        return this.claim(next, claimed);
      }
    }
    return this.claim(next, claimed);
  }

  private async isTaken(candidate: string, claimed?: Set<string>): Promise<boolean> {
    if (claimed?.has(candidate)) {
      return true;
    }
    return (await statIfExists(candidate)) !== undefined;
  }

  private claim(candidate: string, claimed?: Set<string>): string {
    claimed?.add(candidate);
    return candidate;
  }
}
