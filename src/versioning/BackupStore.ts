import createDebug from 'debug';
import fs from 'fs';
import path from 'pathe';
import zlib from 'zlib';
import { BACKUP_EXTENSION, BACKUP_VERSIONS_DIR } from '../constants';
import { getErrorMessage, NotFoundError, toFileError } from '../errors';
import type { ErrorLog } from '../errorLog';
import { hashBuffer } from './hash';

const debug = createDebug('keepsake:backup');

export interface BackupStoreOpts {
  backupRoot: string;
  errorLog: ErrorLog;
}

/**
 * Owns the backup directory tree. Each version of a tracked file is one
 * gzip-compressed full copy at `<root>/versions/<basename>/<hash>.gz`.
 */
export class BackupStore {
  private backupRoot: string;
  private errorLog: ErrorLog;

  constructor(opts: BackupStoreOpts) {
    this.backupRoot = opts.backupRoot;
    this.errorLog = opts.errorLog;
  }

  getBackupRoot(): string {
    return this.backupRoot;
  }

  getBackupPath(filePath: string, hash: string): string {
    return path.join(
      this.backupRoot,
      BACKUP_VERSIONS_DIR,
      path.basename(filePath),
      `${hash}${BACKUP_EXTENSION}`,
    );
  }

  exists(filePath: string, hash: string): boolean {
    return fs.existsSync(this.getBackupPath(filePath, hash));
  }

  /**
   * Copies the current content of `filePath` into the backup for `hash`.
   * An existing backup for the same hash is left as it is.
   */
  create(filePath: string, hash: string): string {
    const backupPath = this.getBackupPath(filePath, hash);
    if (fs.existsSync(backupPath)) {
      debug(`backup already present: ${backupPath}`);
      return backupPath;
    }

    let content: Buffer;
    try {
      content = fs.readFileSync(filePath);
    } catch (err) {
      const error = toFileError(err, 'read', filePath);
      this.errorLog.error(`Backup creation failed: ${error.message}`);
      throw error;
    }

    const tempPath = `${backupPath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(backupPath), { recursive: true });
      fs.writeFileSync(tempPath, zlib.gzipSync(content));
      fs.renameSync(tempPath, backupPath);
    } catch (err) {
      fs.rmSync(tempPath, { force: true });
      const error = toFileError(err, 'write backup', backupPath);
      this.errorLog.error(`Backup creation failed: ${error.message}`);
      throw error;
    }

    debug(`created backup ${backupPath} (${content.length} bytes)`);
    return backupPath;
  }

  /**
   * Removes the backups of the given hashes. Best effort: failures are
   * logged, never thrown, because the index already records them as
   * deleted. Returns the hashes whose files were actually removed.
   */
  delete(filePath: string, hashes: string[]): string[] {
    const removed: string[] = [];
    for (const hash of hashes) {
      const backupPath = this.getBackupPath(filePath, hash);
      try {
        if (!fs.existsSync(backupPath)) {
          debug(`backup already gone: ${backupPath}`);
          continue;
        }
        fs.unlinkSync(backupPath);
        removed.push(hash);
        debug(`deleted backup ${backupPath}`);
      } catch (err) {
        this.errorLog.error(
          `Failed to delete backup ${backupPath}: ${getErrorMessage(err)}`,
        );
      }
    }
    return removed;
  }

  /**
   * Decompressed content of a backup.
   */
  read(filePath: string, hash: string): Buffer {
    const backupPath = this.getBackupPath(filePath, hash);
    if (!fs.existsSync(backupPath)) {
      throw new NotFoundError(`Backup file not found: ${backupPath}`, backupPath);
    }
    try {
      return zlib.gunzipSync(fs.readFileSync(backupPath));
    } catch (err) {
      throw toFileError(err, 'read backup', backupPath);
    }
  }

  /**
   * True when the backup exists and its content still hashes to `hash`.
   */
  verify(filePath: string, hash: string): boolean {
    try {
      return hashBuffer(this.read(filePath, hash)) === hash;
    } catch (err) {
      debug(`verify failed for ${hash}: ${getErrorMessage(err)}`);
      return false;
    }
  }

  /**
   * Writes the backup content to `targetPath` (the tracked file itself by
   * default), creating missing parent directories.
   */
  restore(filePath: string, hash: string, targetPath: string = filePath): void {
    const content = this.read(filePath, hash);
    try {
      fs.mkdirSync(path.dirname(targetPath), { recursive: true });
      fs.writeFileSync(targetPath, content);
    } catch (err) {
      throw toFileError(err, 'restore', targetPath);
    }
    debug(`restored ${hash} to ${targetPath}`);
  }
}
