import os from 'os';

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a date as `YYYY-MM-DD HH:MM:SS` in UTC.
 */
export function formatUtcTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

function getTimeZoneName(date: Date): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZoneName: 'short',
  }).formatToParts(date);
  return parts.find((part) => part.type === 'timeZoneName')?.value ?? '';
}

/**
 * Formats a date as `YYYY-MM-DD HH:MM:SS <zone>` in the local time zone.
 */
export function formatLocalTimestamp(date: Date): string {
  const local =
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  const zone = getTimeZoneName(date);
  return zone ? `${local} ${zone}` : local;
}

/**
 * Parses a `YYYY-MM-DD HH:MM:SS` UTC timestamp. Returns null for anything
 * that is not a real calendar time in that exact format.
 */
export function parseUtcTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string') {
    return null;
  }
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  const date = new Date(
    Date.UTC(year, month - 1, day, hours, minutes, seconds),
  );
  // Date.UTC rolls 2024-02-31 over into March
  return formatUtcTimestamp(date) === value ? date : null;
}

export function getCurrentUsername(): string {
  try {
    return os.userInfo().username;
  } catch {
    return process.env.USER || process.env.USERNAME || 'unknown';
  }
}
