import { createCopyReport, CopyStats, OrganizeReport } from '../../src/types/Report';
import {
  countActions,
  formatCopySummary,
  formatOrganizeSummary,
  toCopyStatsDocument,
} from '../../src/utils/summary';

const report: OrganizeReport = {
  mode: 'organize',
  source: '/in',
  output: '/out',
  totalMedia: 3,
  toProcess: 2,
  entries: [
    { action: 'move', source: '/in/a.jpg', target: '/out/d/a.jpg' },
    { action: 'related', source: '/in/a.xmp', target: '/out/d/a.xmp' },
    { action: 'fail', source: '/in/b.jpg', target: 'EACCES' },
  ],
};

describe('countActions', () => {
  it('counts every action kind', () => {
    expect(countActions(report)).toEqual({
      move: 1,
      related: 1,
      skip: 0,
      already_processed: 0,
      fail: 1,
      fail_related: 0,
    });
  });
});

describe('formatOrganizeSummary', () => {
  it('lists a header, the tally and one line per entry', () => {
    expect(formatOrganizeSummary(report)).toEqual([
      'Organize: /in -> /out',
      'Media files: 3, to process: 2',
      'Actions: move=1 related=1 fail=1',
      '  move              /in/a.jpg -> /out/d/a.jpg',
      '  related           /in/a.xmp -> /out/d/a.xmp',
      '  fail              /in/b.jpg : EACCES',
    ]);
  });

  it('says so when nothing happened', () => {
    expect(
      formatOrganizeSummary({ ...report, mode: 'scan_only', entries: [] }).slice(0, 3)
    ).toEqual(['Scan: /in -> /out', 'Media files: 3, to process: 2', 'Actions: none']);
  });
});

describe('formatCopySummary', () => {
  it('lists copied, skipped and failed files', () => {
    const stats: CopyStats = {
      ok: 2,
      fail: 1,
      skip: 1,
      report: {
        ...createCopyReport(),
        mediaOk: [['/card/a.mp4', '/archive/a.mp4']],
        mediaSkip: [['/card/b.mp4', 'already copied']],
        mediaFail: [['/card/c.mp4', 'Hash mismatch']],
        otherOk: ['notes.txt'],
        otherFail: [['x.bin', 'EIO']],
      },
    };

    expect(formatCopySummary(stats)).toEqual([
      'Super copy: ok=2 fail=1 skip=1',
      '  copied  /card/a.mp4 -> /archive/a.mp4',
      '  skipped /card/b.mp4: already copied',
      '  failed  /card/c.mp4: Hash mismatch',
      '  other files copied: 1',
      '  other failed x.bin: EIO',
    ]);
  });
});

describe('toCopyStatsDocument', () => {
  it('uses snake_case report keys', () => {
    const stats: CopyStats = {
      ok: 2,
      fail: 1,
      skip: 0,
      report: {
        ...createCopyReport(),
        mediaOk: [['/card/a.mp4', '/archive/a.mp4']],
        mediaFail: [['/card/c.mp4', 'Hash mismatch']],
        otherOk: ['notes.txt'],
      },
    };

    expect(toCopyStatsDocument(stats)).toEqual({
      ok: 2,
      fail: 1,
      skip: 0,
      report: {
        media_ok: [['/card/a.mp4', '/archive/a.mp4']],
        media_skip: [],
        media_fail: [['/card/c.mp4', 'Hash mismatch']],
        other_ok: ['notes.txt'],
        other_fail: [],
      },
    });
  });
});
