import type { z } from 'zod';
import type {
  trackedFileSchema,
  trackedFilesIndexSchema,
  versionEntrySchema,
} from './schema';

/**
 * Metadata recorded with each version, as produced by
 * VersionManager.getFileMetadata.
 */
export type FileMetadata = {
  /** File size in bytes */
  size: number;
  modification_time: {
    /** `YYYY-MM-DD HH:MM:SS <zone>` */
    local: string;
    /** `YYYY-MM-DD HH:MM:SS` */
    utc: string;
  };
  /** Lowercased extension with the dot, '' when the file has none */
  file_type: string;
};

/**
 * One committed snapshot of a tracked file, keyed by content hash. Fields
 * are unchecked on load and narrowed where they are read.
 */
export type VersionEntry = z.infer<typeof versionEntrySchema>;

/**
 * Index entry for one tracked file, keyed by normalized path.
 */
export type TrackedFile = z.infer<typeof trackedFileSchema>;

export type TrackedFilesIndex = z.infer<typeof trackedFilesIndexSchema>;

/**
 * Result of comparing a file against its newest active version.
 */
export type ChangeStatus = {
  changed: boolean;
  currentHash: string;
  /** '' when the file has no active version */
  lastActiveHash: string;
};

/**
 * A version with a parseable timestamp, as returned by the sorted readers.
 */
export type ActiveVersion = {
  hash: string;
  entry: VersionEntry;
  timestamp: Date;
};

/**
 * Backup availability of a version:
 * - available: active, backup present
 * - grace: marked deleted, backup not yet erased (orphan)
 * - missing: active, backup gone (data loss)
 * - erased: marked deleted, backup erased
 */
export type VersionStatus = 'available' | 'grace' | 'missing' | 'erased';

export type VersionRecord = ActiveVersion & {
  deleted: boolean;
  /** Present when the manager has a backup store to ask */
  status?: VersionStatus;
};

export type TrackedFileSummary = {
  path: string;
  lastUpdated: string | null;
  activeVersions: number;
  totalVersions: number;
};

export type CommitResult =
  | {
      status: 'unchanged';
      hash: string;
      deletedHashes: string[];
    }
  | {
      status: 'committed';
      hash: string;
      backupPath: string;
      /** Versions retention marked deleted during this commit */
      deletedHashes: string[];
    };

export type RestorePreview = {
  hash: string;
  insertions: number;
  deletions: number;
};
