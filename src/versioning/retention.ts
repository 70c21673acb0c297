import { DEFAULT_MAX_BACKUPS } from '../constants';
import { parseUtcTimestamp } from '../utils/time';
import type { ActiveVersion, VersionEntry } from './types';

const INTEGER_LITERAL = /^\s*[+-]?\d+\s*$/;

/**
 * Turns a configured cap into a positive integer. Numbers are truncated,
 * strings must be integer literals; anything else, or a result below 1,
 * warns and falls back to DEFAULT_MAX_BACKUPS.
 */
export function resolveMaxBackups(
  raw: unknown,
  warn: (message: string) => void,
): number {
  let value: number | null = null;
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    value = Math.trunc(raw);
  } else if (typeof raw === 'string' && INTEGER_LITERAL.test(raw)) {
    value = Number.parseInt(raw, 10);
  }

  if (value === null) {
    warn(
      `Invalid max_backups setting ('${String(raw)}'). Using default of ${DEFAULT_MAX_BACKUPS}.`,
    );
    return DEFAULT_MAX_BACKUPS;
  }
  if (value <= 0) {
    warn(
      `max_backups setting is ${value}. Using default of ${DEFAULT_MAX_BACKUPS}.`,
    );
    return DEFAULT_MAX_BACKUPS;
  }
  return value;
}

/**
 * Only a literal `true` marks a version deleted.
 */
export function isDeleted(entry: VersionEntry): boolean {
  return entry.deleted === true;
}

/**
 * Newest first. Equal timestamps (same second) fall back to the hash in
 * ascending lexical order, so the smaller hash counts as newer.
 */
export function compareNewestFirst(a: ActiveVersion, b: ActiveVersion): number {
  const diff = b.timestamp.getTime() - a.timestamp.getTime();
  if (diff !== 0) {
    return diff;
  }
  return a.hash < b.hash ? -1 : a.hash > b.hash ? 1 : 0;
}

/**
 * Versions with a parseable timestamp, newest first. Entries with a missing
 * or malformed timestamp are reported through `onInvalid` and left out.
 */
export function collectVersions(
  versions: Record<string, VersionEntry>,
  opts: {
    includeDeleted?: boolean;
    onInvalid?: (hash: string, timestamp: unknown) => void;
  } = {},
): ActiveVersion[] {
  const collected: ActiveVersion[] = [];
  for (const [hash, entry] of Object.entries(versions)) {
    if (isDeleted(entry) && !opts.includeDeleted) {
      continue;
    }
    const timestamp = parseUtcTimestamp(entry.timestamp);
    if (!timestamp) {
      opts.onInvalid?.(hash, entry.timestamp);
      continue;
    }
    collected.push({ hash, entry, timestamp });
  }
  return collected.sort(compareNewestFirst);
}

export function collectActiveVersions(
  versions: Record<string, VersionEntry>,
  onInvalid?: (hash: string, timestamp: unknown) => void,
): ActiveVersion[] {
  return collectVersions(versions, { onInvalid });
}

/**
 * The active versions beyond the first `cap`, oldest excess last.
 */
export function selectExcess(
  active: ActiveVersion[],
  cap: number,
): ActiveVersion[] {
  if (active.length <= cap) {
    return [];
  }
  return active.slice(cap);
}
