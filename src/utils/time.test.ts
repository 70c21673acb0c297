import { describe, expect, test } from 'vitest';
import {
  formatLocalTimestamp,
  formatUtcTimestamp,
  getCurrentUsername,
  parseUtcTimestamp,
} from './time';

describe('formatUtcTimestamp', () => {
  test('formats with second precision in UTC', () => {
    const date = new Date(Date.UTC(2024, 0, 5, 3, 4, 5, 999));
    expect(formatUtcTimestamp(date)).toBe('2024-01-05 03:04:05');
  });
});

describe('formatLocalTimestamp', () => {
  test('appends a time zone name', () => {
    const value = formatLocalTimestamp(new Date(Date.UTC(2024, 5, 1)));
    expect(value).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}( \S+)?$/);
  });
});

describe('parseUtcTimestamp', () => {
  test('parses the index timestamp format', () => {
    expect(parseUtcTimestamp('2024-01-05 03:04:05')?.getTime()).toBe(
      Date.UTC(2024, 0, 5, 3, 4, 5),
    );
  });

  test('rejects other formats', () => {
    expect(parseUtcTimestamp('2024-01-05T03:04:05')).toBeNull();
    expect(parseUtcTimestamp('2024-01-05')).toBeNull();
    expect(parseUtcTimestamp('')).toBeNull();
  });

  test('rejects impossible calendar values', () => {
    expect(parseUtcTimestamp('2024-02-31 00:00:00')).toBeNull();
    expect(parseUtcTimestamp('2024-01-01 24:00:00')).toBeNull();
  });

  test('rejects non-strings', () => {
    expect(parseUtcTimestamp(undefined)).toBeNull();
    expect(parseUtcTimestamp(1714557600)).toBeNull();
  });
});

test('getCurrentUsername returns a non-empty name', () => {
  expect(getCurrentUsername().length).toBeGreaterThan(0);
});
