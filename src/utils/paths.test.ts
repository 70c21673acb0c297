import { describe, expect, test } from 'vitest';
import { getFileType, normalizeTrackedPath } from './paths';

describe('normalizeTrackedPath', () => {
  test('resolves relative paths against cwd', () => {
    expect(
      normalizeTrackedPath('docs/../notes.txt', {
        cwd: '/work',
        platform: 'linux',
      }),
    ).toBe('/work/notes.txt');
  });

  test('keeps case on case-sensitive platforms', () => {
    expect(
      normalizeTrackedPath('/Work/Notes.TXT', { cwd: '/', platform: 'linux' }),
    ).toBe('/Work/Notes.TXT');
  });

  test('lowercases and uses forward slashes on windows', () => {
    expect(
      normalizeTrackedPath('C:\\Users\\Me\\Notes.TXT', {
        cwd: 'C:/',
        platform: 'win32',
      }),
    ).toBe('c:/users/me/notes.txt');
  });
});

describe('getFileType', () => {
  test('returns the lowercased extension', () => {
    expect(getFileType('/work/Report.PDF')).toBe('.pdf');
    expect(getFileType('/work/archive.tar.gz')).toBe('.gz');
  });

  test('returns empty string without an extension', () => {
    expect(getFileType('/work/Makefile')).toBe('');
  });
});
