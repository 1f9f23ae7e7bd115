import chokidar, { FSWatcher } from 'chokidar';
import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';

import { ShotsortConfigError } from './config';
import type { OrganizerContext } from './context';
import type { Logger } from './logger';
import { ProcessedSet } from './state/ProcessedSet';
import type { CopyStats } from './types/Report';
import { errorMessage } from './utils/errors';
import { getAutoCopyRecordPath } from './utils/stateDir';
import { SuperCopyPipeline } from './workflow/superCopy';

export interface AutoCopyDaemonOptions {
  pipeline?: SuperCopyPipeline;
  /** Overrides `auto_copy.poll_interval_sec` (tests) */
  intervalMs?: number;
  /** Watch the mount roots for new devices between polls (default true) */
  watch?: boolean;
}

export interface AutoCopyResult {
  source: string;
  stats: CopyStats;
}

/**
 * List first-level, non-hidden directories of a watch path. Each one is
 * treated as a mounted device.
 */
export async function listMountCandidates(
  watchPath: string,
  logger: Logger
): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(watchPath, { withFileTypes: true });
  } catch (error) {
    logger.debug(
      { dir: watchPath, err: errorMessage(error) },
      'Unable to list watch path.'
    );
    return [];
  }
  return entries
    .filter(entry => entry.isDirectory() && !entry.name.startsWith('.'))
    .map(entry => path.join(watchPath, entry.name))
    .sort();
}

/**
 * Periodically super-copies every mounted device under the watch paths to the
 * auto-copy target. Runs never overlap: a trigger during a run queues one
 * more pass.
 */
export class AutoCopyDaemon {
  private readonly logger: Logger;
  private readonly pipeline: SuperCopyPipeline;
  private readonly intervalMs: number;
  private watchers: FSWatcher[] = [];
  private timer: NodeJS.Timeout | undefined;
  private current: Promise<void> | undefined;
  private rerunRequested = false;
  private abort = new AbortController();
  private started = false;

  constructor(
    private ctx: OrganizerContext,
    private options: AutoCopyDaemonOptions = {}
  ) {
    this.logger = ctx.logger.child({ scope: 'daemon' });
    this.pipeline =
      options.pipeline ??
      new SuperCopyPipeline(ctx, {
        processed: new ProcessedSet(
          getAutoCopyRecordPath(ctx.config.stateDir),
          this.logger
        ),
      });
    this.intervalMs =
      options.intervalMs ?? ctx.config.autoCopy.pollIntervalSec * 1000;
  }

  /**
   * One pass over every watch path. A failing device is logged and the pass
   * moves on to the next one.
   */
  async runOnce(): Promise<AutoCopyResult[]> {
    const { watchPaths, targetPath } = this.ctx.config.autoCopy;
    const results: AutoCopyResult[] = [];

    for (const watchPath of watchPaths) {
      for (const mount of await listMountCandidates(watchPath, this.logger)) {
        if (this.abort.signal.aborted) {
          return results;
        }
        this.logger.info({ source: mount }, 'Device detected, starting super copy.');
        try {
          const stats = await this.pipeline.run({
            source: mount,
            target: targetPath,
            signal: this.abort.signal,
          });
          this.logger.info(
            { source: mount, ok: stats.ok, fail: stats.fail, skip: stats.skip },
            'Auto copy finished.'
          );
          results.push({ source: mount, stats });
        } catch (error) {
          this.logger.error(
            { source: mount, err: errorMessage(error) },
            'Auto copy failed.'
          );
        }
      }
    }
    return results;
  }

  /**
   * Validate the auto-copy settings, create the target and start polling.
   */
  async start(): Promise<void> {
    const { enabled, watchPaths, targetPath } = this.ctx.config.autoCopy;
    if (!enabled) {
      throw new ShotsortConfigError(
        'Auto copy is disabled; set auto_copy.enabled to true.'
      );
    }
    if (!targetPath) {
      throw new ShotsortConfigError('auto_copy.target_path is not configured.');
    }
    if (this.started) {
      return;
    }
    this.started = true;

    try {
      await fs.mkdir(targetPath, { recursive: true });
    } catch (error) {
      throw new ShotsortConfigError(
        `Unable to create auto copy target ${targetPath}: ${errorMessage(error)}`,
        error
      );
    }

    this.logger.info(
      { watchPaths, target: targetPath, intervalMs: this.intervalMs },
      'Auto copy daemon started.'
    );

    if (this.options.watch !== false) {
      this.watchers = watchPaths.map(watchPath => this.watchMounts(watchPath));
    }
    this.trigger();
  }

  /**
   * Request a pass now; queued when one is already running.
   */
  trigger(): void {
    if (this.abort.signal.aborted) {
      return;
    }
    if (this.current) {
      this.rerunRequested = true;
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.current = this.pass().finally(() => {
      this.current = undefined;
      if (this.rerunRequested) {
        this.rerunRequested = false;
        this.trigger();
      } else {
        this.schedule();
      }
    });
  }

  /** Resolves once any pass in flight has finished. */
  async idle(): Promise<void> {
    while (this.current) {
      await this.current;
    }
  }

  /**
   * Stop polling and watching. A device being copied finishes its current
   * file first.
   */
  async stop(): Promise<void> {
    this.abort.abort();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await Promise.all(this.watchers.map(watcher => watcher.close()));
    this.watchers = [];
    await this.idle();
    this.logger.info('Auto copy daemon stopped.');
  }

  private async pass(): Promise<void> {
    try {
      await this.runOnce();
    } catch (error) {
      this.logger.error({ err: errorMessage(error) }, 'Auto copy pass failed.');
    }
  }

  private schedule(): void {
    if (this.abort.signal.aborted) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.trigger();
    }, this.intervalMs);
  }

  private watchMounts(watchPath: string): FSWatcher {
    const watcher = chokidar.watch(watchPath, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
    });

    watcher.on('addDir', dirPath => {
      if (path.dirname(dirPath) !== path.resolve(watchPath)) {
        return;
      }
      this.logger.info({ dir: dirPath }, 'New mount detected.');
      this.trigger();
    });

    watcher.on('error', error => {
      this.logger.error(
        { dir: watchPath, err: errorMessage(error) },
        'Watcher error'
      );
    });

    return watcher;
  }
}
