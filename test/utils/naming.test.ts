import {
  buildUnifiedBasename,
  formatDate,
  isDateLikeFolder,
  parseExifDate,
  sanitizeFolderName,
} from '../../src/utils/naming';

describe('sanitizeFolderName', () => {
  it('replaces characters that are unsafe in folder names', () => {
    expect(sanitizeFolderName('Canon EOS R5: "mk2"')).toBe('Canon EOS R5_ _mk2_');
    expect(sanitizeFolderName('a/b\\c|d')).toBe('a_b_c_d');
  });

  it('falls back for blank labels', () => {
    expect(sanitizeFolderName('   ')).toBe('未知设备');
    expect(sanitizeFolderName('', 'unknown')).toBe('unknown');
  });

  it('caps the length', () => {
    expect(sanitizeFolderName('x'.repeat(100))).toHaveLength(80);
  });
});

describe('buildUnifiedBasename', () => {
  const fallbacks = { device: 'unknown', date: 'undated' };

  it('joins device, date, resolution and frame rate', () => {
    expect(
      buildUnifiedBasename(
        { device: 'Sony ILCE-7M3', date: '2024-03-01', resolution: '3840x2160', frameRate: '25fps' },
        fallbacks
      )
    ).toBe('Sony_ILCE-7M3_2024-03-01_3840x2160_25fps');
  });

  it('omits missing optional parts', () => {
    expect(buildUnifiedBasename({ device: '大疆', date: '2024-03-01' }, fallbacks)).toBe(
      '大疆_2024-03-01'
    );
  });

  it('uses the fallbacks for blank device and date', () => {
    expect(buildUnifiedBasename({ device: ' ', date: '' }, fallbacks)).toBe('unknown_undated');
  });
});

describe('formatDate', () => {
  const date = new Date(2024, 2, 1, 9, 5, 7);

  it('formats the supported directives', () => {
    expect(formatDate(date, '%Y-%m-%d')).toBe('2024-03-01');
    expect(formatDate(date, '%Y%m%d-%H%M%S')).toBe('20240301-090507');
    expect(formatDate(date, '%y/%j')).toBe('24/061');
  });

  it('treats %% as a literal percent sign', () => {
    expect(formatDate(date, '%%Y')).toBe('%Y');
  });

  it('keeps unknown directives', () => {
    expect(formatDate(date, '%Y %B')).toBe('2024 %B');
  });
});

describe('isDateLikeFolder', () => {
  it.each([
    ['2024-03-01', true],
    ['20240301', true],
    ['2024-3-1', false],
    ['image', false],
    ['', false],
  ])('%s -> %s', (name, expected) => {
    expect(isDateLikeFolder(name)).toBe(expected);
  });
});

describe('parseExifDate', () => {
  it('parses EXIF timestamps as local time', () => {
    expect(parseExifDate('2023:07:04 10:20:30')).toEqual(new Date(2023, 6, 4, 10, 20, 30));
    expect(parseExifDate('2023-07-04 10:20')).toEqual(new Date(2023, 6, 4, 10, 20, 0));
  });

  it('ignores trailing offsets and sub-seconds', () => {
    expect(parseExifDate('2023:07:04 10:20:30.45+02:00')).toEqual(
      new Date(2023, 6, 4, 10, 20, 30)
    );
  });

  it('rejects zeroed and malformed values', () => {
    expect(parseExifDate('0000:00:00 00:00:00')).toBeUndefined();
    expect(parseExifDate('yesterday')).toBeUndefined();
  });
});
