import createDebug from 'debug';
import { diffLines } from 'diff';
import fs, { type Stats } from 'fs';
import path from 'pathe';
import { DEFAULT_MAX_BACKUPS } from '../constants';
import {
  getErrorMessage,
  isNotFound,
  IOFailureError,
  KeepsakeError,
  NotFoundError,
} from '../errors';
import type { ErrorLog } from '../errorLog';
import { getFileType, normalizeTrackedPath } from '../utils/paths';
import {
  formatLocalTimestamp,
  formatUtcTimestamp,
  getCurrentUsername,
  parseUtcTimestamp,
} from '../utils/time';
import type { BackupStore } from './BackupStore';
import { hashFile } from './hash';
import type { MetadataStore } from './MetadataStore';
import {
  collectActiveVersions,
  collectVersions,
  isDeleted,
  resolveMaxBackups,
  selectExcess,
} from './retention';
import type {
  ActiveVersion,
  ChangeStatus,
  CommitResult,
  FileMetadata,
  RestorePreview,
  TrackedFileSummary,
  VersionEntry,
  VersionRecord,
  VersionStatus,
} from './types';

const debug = createDebug('keepsake:versions');

export interface VersionManagerOpts {
  store: MetadataStore;
  errorLog: ErrorLog;
  /** Needed by commitFile, restoreVersion and backup statuses */
  backupStore?: BackupStore;
  /** Retention cap; validated on every enforcement */
  maxBackups?: unknown;
  now?: () => Date;
  username?: string;
  cwd?: string;
  platform?: NodeJS.Platform;
}

/**
 * Coordinates hashing, the metadata index, retention and backups for the
 * files under version control.
 *
 * Every operation that touches the index does a fresh load/mutate/save and
 * keeps nothing cached. Callers must not run overlapping commits for the
 * same path.
 */
export class VersionManager {
  private store: MetadataStore;
  private errorLog: ErrorLog;
  private backupStore?: BackupStore;
  private maxBackups: unknown;
  private now: () => Date;
  private username: string;
  private cwd?: string;
  private platform?: NodeJS.Platform;

  constructor(opts: VersionManagerOpts) {
    this.store = opts.store;
    this.errorLog = opts.errorLog;
    this.backupStore = opts.backupStore;
    this.maxBackups = opts.maxBackups ?? DEFAULT_MAX_BACKUPS;
    this.now = opts.now ?? (() => new Date());
    this.username = opts.username ?? getCurrentUsername();
    this.cwd = opts.cwd;
    this.platform = opts.platform;
  }

  normalizePath(filePath: string): string {
    return normalizeTrackedPath(filePath, {
      cwd: this.cwd,
      platform: this.platform,
    });
  }

  /**
   * Compares the file's current hash with its newest active version. A file
   * without any active version always counts as changed.
   */
  hasChanged(filePath: string): ChangeStatus {
    const absolutePath = this.resolvePath(filePath);
    const currentHash = hashFile(absolutePath);
    const key = this.normalizePath(absolutePath);
    const versions = this.store.load()[key]?.versions;

    const active = versions
      ? collectActiveVersions(versions, this.reportInvalid(key))
      : [];
    if (active.length === 0) {
      return { changed: true, currentHash, lastActiveHash: '' };
    }

    const lastActiveHash = active[0].hash;
    return {
      changed: currentHash !== lastActiveHash,
      currentHash,
      lastActiveHash,
    };
  }

  /**
   * Records `hash` as the newest version of `filePath`, then enforces the
   * retention cap.
   *
   * Re-adding a known hash refreshes its timestamp, username, metadata and
   * (when non-empty) message, and reactivates it if it was deleted.
   *
   * The index is saved before retention runs, and backups are only erased
   * after retention has saved its marks, so a crash in between leaves an
   * orphan backup rather than an unmarked version without one.
   *
   * @returns hashes retention marked deleted during this call
   */
  addVersion(
    filePath: string,
    hash: string,
    metadata: FileMetadata,
    commitMessage = '',
  ): string[] {
    const timestamp = formatUtcTimestamp(this.now());
    const key = this.normalizePath(filePath);
    const index = this.store.load();

    if (!index[key]) {
      index[key] = { versions: {}, last_updated: timestamp };
    }
    const trackedFile = index[key];
    if (!trackedFile.versions) {
      trackedFile.versions = {};
    }

    const existing = trackedFile.versions[hash];
    if (existing) {
      existing.timestamp = timestamp;
      existing.username = this.username;
      if (commitMessage) {
        existing.commit_message = commitMessage;
      }
      existing.metadata = metadata;
      existing.deleted = false;
      debug(`updated existing version ${hash} for ${key}`);
    } else {
      trackedFile.versions[hash] = {
        timestamp,
        metadata,
        username: this.username,
        commit_message: commitMessage,
        deleted: false,
      };
      debug(`added new version ${hash} for ${key}`);
    }
    trackedFile.last_updated = timestamp;

    this.store.save(index);

    let deletedHashes: string[];
    try {
      deletedHashes = this.enforceRetention(filePath);
    } catch (err) {
      this.errorLog.error(
        `Failed to enforce backup limit for ${key}: ${getErrorMessage(err)}`,
      );
      return [];
    }

    if (deletedHashes.length > 0 && this.backupStore) {
      this.backupStore.delete(this.resolvePath(filePath), deletedHashes);
    }
    return deletedHashes;
  }

  /**
   * Marks the oldest active versions beyond the cap as deleted. Reloads the
   * index rather than trusting any in-memory copy, and saves only when
   * something changed. Running it again at or below the cap is a no-op.
   *
   * @returns hashes newly marked deleted
   */
  enforceRetention(filePath: string, maxBackups?: unknown): string[] {
    const cap = resolveMaxBackups(maxBackups ?? this.maxBackups, (message) =>
      this.errorLog.warn(message),
    );
    const key = this.normalizePath(filePath);
    debug(`enforcing backup limit (max_backups=${cap}) for ${key}`);

    const index = this.store.load();
    const trackedFile = index[key];
    const versions = trackedFile?.versions;
    if (!trackedFile || !versions) {
      debug(`no versions found for ${key}`);
      return [];
    }

    const active = collectActiveVersions(versions, this.reportInvalid(key));
    const excess = selectExcess(active, cap);
    if (excess.length === 0) {
      debug(`${active.length} active version(s) within limit ${cap}`);
      return [];
    }

    const marked: string[] = [];
    for (const { hash } of excess) {
      const entry = versions[hash];
      if (!isDeleted(entry)) {
        entry.deleted = true;
        marked.push(hash);
      }
    }

    if (marked.length > 0) {
      trackedFile.last_updated = formatUtcTimestamp(this.now());
      this.store.save(index);
      debug(`marked ${marked.length} version(s) deleted for ${key}`);
    }
    return marked;
  }

  /**
   * Non-deleted versions, newest first. Entries with a missing or malformed
   * timestamp are logged and skipped.
   */
  getActiveVersions(filePath: string): ActiveVersion[] {
    const key = this.normalizePath(filePath);
    const versions = this.store.load()[key]?.versions;
    if (!versions) {
      return [];
    }
    return collectActiveVersions(versions, this.reportInvalid(key));
  }

  /**
   * Every version with a valid timestamp, deleted ones included, newest
   * first. Each record carries its backup status when a backup store is
   * configured.
   */
  getVersionHistory(filePath: string): VersionRecord[] {
    const absolutePath = this.resolvePath(filePath);
    const key = this.normalizePath(absolutePath);
    const versions = this.store.load()[key]?.versions;
    if (!versions) {
      return [];
    }
    return collectVersions(versions, {
      includeDeleted: true,
      onInvalid: this.reportInvalid(key),
    }).map((version) => {
      const deleted = isDeleted(version.entry);
      const record: VersionRecord = { ...version, deleted };
      if (this.backupStore) {
        record.status = this.getStatus(absolutePath, version.hash, deleted);
      }
      return record;
    });
  }

  /**
   * All tracked files, most recently updated first.
   */
  getTrackedFiles(): TrackedFileSummary[] {
    const index = this.store.load();
    const summaries = Object.entries(index).map(([key, trackedFile]) => {
      const versions = Object.values(trackedFile.versions ?? {});
      const { last_updated } = trackedFile;
      const lastUpdated =
        typeof last_updated === 'string' && parseUtcTimestamp(last_updated)
          ? last_updated
          : null;
      return {
        path: key,
        lastUpdated,
        activeVersions: versions.filter((entry) => !isDeleted(entry)).length,
        totalVersions: versions.length,
      };
    });
    return summaries.sort((a, b) => {
      if (a.lastUpdated !== b.lastUpdated) {
        if (a.lastUpdated === null) return 1;
        if (b.lastUpdated === null) return -1;
        return a.lastUpdated < b.lastUpdated ? 1 : -1;
      }
      return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
    });
  }

  /**
   * Stats the live file. Returns null when it does not exist, which callers
   * treat as "file currently missing".
   */
  getFileMetadata(filePath: string): FileMetadata | null {
    const absolutePath = this.resolvePath(filePath);
    let stat: Stats;
    try {
      stat = fs.statSync(absolutePath);
    } catch (err) {
      if (isNotFound(err)) {
        return null;
      }
      const message = `Failed to get file metadata for ${absolutePath}: ${getErrorMessage(err)}`;
      this.errorLog.error(message);
      throw new IOFailureError(message, absolutePath, { cause: err });
    }

    return {
      size: stat.size,
      modification_time: {
        local: formatLocalTimestamp(stat.mtime),
        utc: formatUtcTimestamp(stat.mtime),
      },
      file_type: getFileType(absolutePath),
    };
  }

  /**
   * The whole commit flow: change check, backup, metadata, retention and
   * cleanup of the backups retention released.
   *
   * Unchanged content is only committed again with `force`, which refreshes
   * the existing version instead of adding one.
   *
   * The backup is checked against the hash before anything is recorded; a
   * file edited mid-commit fails the commit and leaves no backup behind.
   */
  commitFile(
    filePath: string,
    commitMessage: string,
    opts: { force?: boolean } = {},
  ): CommitResult {
    const backupStore = this.requireBackupStore();
    const absolutePath = this.resolvePath(filePath);
    const { changed, currentHash } = this.hasChanged(absolutePath);
    if (!changed && !opts.force) {
      debug(`no changes for ${absolutePath}, skipping commit`);
      return { status: 'unchanged', hash: currentHash, deletedHashes: [] };
    }

    const backupPath = backupStore.create(absolutePath, currentHash);
    if (!backupStore.verify(absolutePath, currentHash)) {
      backupStore.delete(absolutePath, [currentHash]);
      const message = `${absolutePath} changed while it was being committed`;
      this.errorLog.error(message);
      throw new KeepsakeError(message, 'CHANGED_DURING_COMMIT', {
        path: absolutePath,
      });
    }

    const metadata = this.getFileMetadata(absolutePath);
    if (!metadata) {
      throw new NotFoundError(
        `File disappeared while committing: ${absolutePath}`,
        absolutePath,
      );
    }

    const deletedHashes = this.addVersion(
      absolutePath,
      currentHash,
      metadata,
      commitMessage,
    );
    return { status: 'committed', hash: currentHash, backupPath, deletedHashes };
  }

  /**
   * Overwrites (or re-creates) the tracked file with the content of a
   * stored version. Versions marked deleted can still be restored while
   * their backup is present.
   *
   * @returns the backup path the content came from
   */
  restoreVersion(filePath: string, hash: string): string {
    const backupStore = this.requireBackupStore();
    const absolutePath = this.resolvePath(filePath);
    this.requireVersion(absolutePath, hash);
    backupStore.restore(absolutePath, hash);
    debug(`restored ${absolutePath} to version ${hash}`);
    return backupStore.getBackupPath(absolutePath, hash);
  }

  /**
   * Line changes that restoring `hash` would apply to the current file.
   */
  previewRestore(filePath: string, hash: string): RestorePreview {
    const backupStore = this.requireBackupStore();
    const absolutePath = this.resolvePath(filePath);
    this.requireVersion(absolutePath, hash);

    const backupContent = backupStore.read(absolutePath, hash).toString('utf-8');
    const currentContent = fs.existsSync(absolutePath)
      ? fs.readFileSync(absolutePath, 'utf-8')
      : '';

    let insertions = 0;
    let deletions = 0;
    for (const change of diffLines(currentContent, backupContent)) {
      const lineCount = change.count ?? 0;
      if (change.added) {
        insertions += lineCount;
      } else if (change.removed) {
        deletions += lineCount;
      }
    }
    return { hash, insertions, deletions };
  }

  /**
   * Filesystem path of `filePath`, resolved against the manager's working
   * directory rather than the process's.
   */
  private resolvePath(filePath: string): string {
    return path.resolve(this.cwd ?? process.cwd(), filePath);
  }

  private getStatus(
    filePath: string,
    hash: string,
    deleted: boolean,
  ): VersionStatus {
    const present = this.backupStore?.exists(filePath, hash) ?? false;
    if (deleted) {
      return present ? 'grace' : 'erased';
    }
    return present ? 'available' : 'missing';
  }

  private requireBackupStore(): BackupStore {
    if (!this.backupStore) {
      throw new KeepsakeError(
        'VersionManager was created without a backup store',
        'NO_BACKUP_STORE',
      );
    }
    return this.backupStore;
  }

  private requireVersion(filePath: string, hash: string): VersionEntry {
    const key = this.normalizePath(filePath);
    const entry = this.store.load()[key]?.versions?.[hash];
    if (!entry) {
      throw new NotFoundError(`Version ${hash} is not tracked for ${key}`, key);
    }
    return entry;
  }

  private reportInvalid(key: string) {
    return (hash: string, timestamp: unknown) => {
      const reason =
        timestamp === undefined
          ? 'missing timestamp'
          : `invalid timestamp '${String(timestamp)}'`;
      this.errorLog.error(
        `Skipping version ${hash} for ${key} due to ${reason}.`,
      );
    };
  }
}
