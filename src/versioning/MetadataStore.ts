import createDebug from 'debug';
import fs from 'fs';
import path from 'pathe';
import { getErrorMessage, IOFailureError, isNotFound } from '../errors';
import type { ErrorLog } from '../errorLog';
import { formatUtcTimestamp } from '../utils/time';
import { trackedFilesIndexSchema } from './schema';
import type { TrackedFilesIndex } from './types';

const debug = createDebug('keepsake:metadata');

export interface MetadataStoreOpts {
  indexPath: string;
  errorLog: ErrorLog;
  now?: () => Date;
}

/**
 * Owns the tracked-files index on disk.
 *
 * There is no locking: every caller does its own load/mutate/save, and two
 * overlapping sequences can drop one writer's changes. The rename in save()
 * only guarantees that readers never see a half-written file.
 */
export class MetadataStore {
  private indexPath: string;
  private errorLog: ErrorLog;
  private now: () => Date;

  constructor(opts: MetadataStoreOpts) {
    this.indexPath = opts.indexPath;
    this.errorLog = opts.errorLog;
    this.now = opts.now ?? (() => new Date());
  }

  getIndexPath(): string {
    return this.indexPath;
  }

  /**
   * Reads the index. A missing file is the first-run state and yields `{}`.
   * A corrupt file is renamed aside and also yields `{}`.
   */
  load(): TrackedFilesIndex {
    let raw: string;
    try {
      raw = fs.readFileSync(this.indexPath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        debug(`index not found at ${this.indexPath}, starting fresh`);
        return {};
      }
      const message = `Unexpected error loading ${this.indexPath}: ${getErrorMessage(err)}`;
      this.errorLog.error(message);
      throw new IOFailureError(message, this.indexPath, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      return this.quarantine(`invalid JSON (${getErrorMessage(err)})`);
    }

    const result = trackedFilesIndexSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue?.path.join('.') || '<root>';
      return this.quarantine(`unexpected structure at ${where}`);
    }
    return result.data;
  }

  /**
   * Writes the index to a sibling temp file and renames it over the real
   * one. On failure the temp file is removed and the error is rethrown as
   * IOFailureError.
   */
  save(index: TrackedFilesIndex): void {
    const tempPath = `${this.indexPath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.indexPath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(index, null, 4), 'utf-8');
      fs.renameSync(tempPath, this.indexPath);
      debug(`saved index with ${Object.keys(index).length} tracked file(s)`);
    } catch (err) {
      const message = `Failed to save tracked files to ${this.indexPath}: ${getErrorMessage(err)}`;
      this.errorLog.error(message);
      this.removeTempFile(tempPath);
      throw new IOFailureError(message, this.indexPath, { cause: err });
    }
  }

  private removeTempFile(tempPath: string): void {
    if (!fs.existsSync(tempPath)) {
      return;
    }
    try {
      fs.unlinkSync(tempPath);
    } catch (err) {
      this.errorLog.error(
        `Failed to remove temporary save file ${tempPath}: ${getErrorMessage(err)}`,
      );
    }
  }

  private quarantine(reason: string): TrackedFilesIndex {
    this.errorLog.error(
      `Index ${this.indexPath} is corrupted (${reason}). Backing up and starting fresh.`,
    );
    const stamp = formatUtcTimestamp(this.now()).replace(/:/g, '-');
    const quarantinePath = `${this.indexPath}.corrupted_${stamp}`;
    try {
      fs.renameSync(this.indexPath, quarantinePath);
      debug(`moved corrupted index to ${quarantinePath}`);
    } catch (err) {
      this.errorLog.error(
        `Failed to back up corrupted index ${this.indexPath}: ${getErrorMessage(err)}`,
      );
    }
    return {};
  }
}
