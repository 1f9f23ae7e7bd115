/**
 * Outcome report types handed back to the CLI and daemon
 */

export type OrganizeAction =
  | 'move'
  | 'related'
  | 'skip'
  | 'already_processed'
  | 'fail'
  | 'fail_related';

export interface OrganizeEntry {
  action: OrganizeAction;
  source: string;
  /** Destination path for moves, reason or error text otherwise */
  target: string;
}

export interface OrganizeReport {
  mode: 'scan_only' | 'organize';
  source: string;
  output: string;
  totalMedia: number;
  toProcess: number;
  entries: OrganizeEntry[];
}

export interface CopyReport {
  mediaOk: Array<[source: string, destination: string]>;
  mediaSkip: Array<[source: string, reason: string]>;
  mediaFail: Array<[source: string, error: string]>;
  otherOk: string[]; // Paths relative to the source root
  otherFail: Array<[relativePath: string, error: string]>;
}

export interface CopyStats {
  ok: number;
  fail: number;
  skip: number;
  report: CopyReport;
}

/** Copy stats as printed for other tools, with snake_case report keys */
export interface CopyStatsDocument {
  ok: number;
  fail: number;
  skip: number;
  report: {
    media_ok: CopyReport['mediaOk'];
    media_skip: CopyReport['mediaSkip'];
    media_fail: CopyReport['mediaFail'];
    other_ok: CopyReport['otherOk'];
    other_fail: CopyReport['otherFail'];
  };
}

export function createCopyReport(): CopyReport {
  return {
    mediaOk: [],
    mediaSkip: [],
    mediaFail: [],
    otherOk: [],
    otherFail: [],
  };
}

/**
 * Phases reported while a super copy runs
 */
export enum ProgressPhase {
  PROGRESS = 'progress',
  HASH_SOURCE = 'hash_src',
  COPY = 'copy',
  HASH_DESTINATION = 'hash_dest',
  VERIFY_OK = 'verify_ok',
  VERIFY_FAIL = 'verify_fail',
}

export interface ProgressEvent {
  phase: ProgressPhase;
  message: string;
  current: number;
  total: number;
}

export interface ProgressListener {
  onProgress(event: ProgressEvent): void;
}
