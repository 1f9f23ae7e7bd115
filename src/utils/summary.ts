import type {
  CopyStats,
  CopyStatsDocument,
  OrganizeAction,
  OrganizeReport,
} from '../types/Report';

const ACTION_ORDER: OrganizeAction[] = [
  'move',
  'related',
  'skip',
  'already_processed',
  'fail',
  'fail_related',
];

export function countActions(report: OrganizeReport): Record<OrganizeAction, number> {
  const counts: Record<OrganizeAction, number> = {
    move: 0,
    related: 0,
    skip: 0,
    already_processed: 0,
    fail: 0,
    fail_related: 0,
  };
  for (const entry of report.entries) {
    counts[entry.action] += 1;
  }
  return counts;
}

/**
 * Human-readable lines for an organize or scan report
 */
export function formatOrganizeSummary(report: OrganizeReport): string[] {
  const lines = [
    `${report.mode === 'scan_only' ? 'Scan' : 'Organize'}: ${report.source} -> ${report.output}`,
    `Media files: ${report.totalMedia}, to process: ${report.toProcess}`,
  ];
  const counts = countActions(report);
  const tally = ACTION_ORDER.filter(action => counts[action] > 0)
    .map(action => `${action}=${counts[action]}`)
    .join(' ');
  lines.push(`Actions: ${tally || 'none'}`);
  for (const entry of report.entries) {
    const arrow = entry.action === 'move' || entry.action === 'related' ? '->' : ':';
    lines.push(`  ${entry.action.padEnd(17)} ${entry.source} ${arrow} ${entry.target}`);
  }
  return lines;
}

/**
 * Human-readable lines for a super copy result
 */
export function formatCopySummary(stats: CopyStats): string[] {
  const { report } = stats;
  const lines = [`Super copy: ok=${stats.ok} fail=${stats.fail} skip=${stats.skip}`];
  for (const [source, destination] of report.mediaOk) {
    lines.push(`  copied  ${source} -> ${destination}`);
  }
  for (const [source, reason] of report.mediaSkip) {
    lines.push(`  skipped ${source}: ${reason}`);
  }
  for (const [source, error] of report.mediaFail) {
    lines.push(`  failed  ${source}: ${error}`);
  }
  if (report.otherOk.length > 0) {
    lines.push(`  other files copied: ${report.otherOk.length}`);
  }
  for (const [relative, error] of report.otherFail) {
    lines.push(`  other failed ${relative}: ${error}`);
  }
  return lines;
}

export function toCopyStatsDocument(stats: CopyStats): CopyStatsDocument {
  const { report } = stats;
  return {
    ok: stats.ok,
    fail: stats.fail,
    skip: stats.skip,
    report: {
      media_ok: report.mediaOk,
      media_skip: report.mediaSkip,
      media_fail: report.mediaFail,
      other_ok: report.otherOk,
      other_fail: report.otherFail,
    },
  };
}
