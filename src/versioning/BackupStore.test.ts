import fs from 'fs';
import os from 'os';
import path from 'pathe';
import zlib from 'zlib';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { ErrorLog } from '../errorLog';
import { NotFoundError } from '../errors';
import { BackupStore } from './BackupStore';
import { hashBuffer } from './hash';

describe('BackupStore', () => {
  let tempDir: string;
  let workDir: string;
  let backupRoot: string;
  let errorLog: ErrorLog;
  let store: BackupStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'backup-test-'));
    workDir = path.join(tempDir, 'work');
    backupRoot = path.join(tempDir, 'backups');
    fs.mkdirSync(workDir, { recursive: true });
    errorLog = new ErrorLog({
      logDir: path.join(tempDir, 'logs'),
      now: () => new Date(Date.UTC(2024, 4, 1, 10, 0, 0)),
      username: 'tester',
    });
    store = new BackupStore({ backupRoot, errorLog });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeWorkFile(name: string, content: string): string {
    const filePath = path.join(workDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  test('derives the backup path from basename and hash', () => {
    expect(store.getBackupPath(path.join(workDir, 'notes.txt'), 'abc123')).toBe(
      path.join(backupRoot, 'versions', 'notes.txt', 'abc123.gz'),
    );
  });

  describe('create', () => {
    test('stores a gzip copy of the current content', () => {
      const filePath = writeWorkFile('notes.txt', 'first draft');
      const hash = hashBuffer('first draft');

      const backupPath = store.create(filePath, hash);

      expect(backupPath).toBe(store.getBackupPath(filePath, hash));
      expect(store.exists(filePath, hash)).toBe(true);
      expect(zlib.gunzipSync(fs.readFileSync(backupPath)).toString()).toBe(
        'first draft',
      );
    });

    test('leaves an existing backup for the same hash untouched', () => {
      const filePath = writeWorkFile('notes.txt', 'first draft');
      const hash = hashBuffer('first draft');
      store.create(filePath, hash);

      fs.writeFileSync(filePath, 'something else');
      store.create(filePath, hash);

      expect(store.read(filePath, hash).toString()).toBe('first draft');
    });

    test('throws NotFoundError when the source file is missing', () => {
      expect(() => store.create(path.join(workDir, 'gone.txt'), 'abc')).toThrow(
        NotFoundError,
      );
      expect(fs.existsSync(path.join(backupRoot, 'versions', 'gone.txt'))).toBe(
        false,
      );
    });
  });

  describe('delete', () => {
    test('removes backups and reports which ones were removed', () => {
      const filePath = writeWorkFile('notes.txt', 'one');
      store.create(filePath, 'h1');
      store.create(filePath, 'h2');

      expect(store.delete(filePath, ['h1', 'missing'])).toEqual(['h1']);
      expect(store.exists(filePath, 'h1')).toBe(false);
      expect(store.exists(filePath, 'h2')).toBe(true);
    });

    test('logs instead of throwing when a backup cannot be removed', () => {
      const filePath = writeWorkFile('notes.txt', 'one');
      fs.mkdirSync(store.getBackupPath(filePath, 'stuck'), { recursive: true });

      expect(store.delete(filePath, ['stuck'])).toEqual([]);
      expect(fs.readFileSync(errorLog.getFilePath(), 'utf-8')).toContain(
        `Failed to delete backup ${store.getBackupPath(filePath, 'stuck')}`,
      );
    });
  });

  describe('read and verify', () => {
    test('read throws NotFoundError for a missing backup', () => {
      expect(() => store.read(path.join(workDir, 'notes.txt'), 'nope')).toThrow(
        NotFoundError,
      );
    });

    test('verify accepts an intact backup', () => {
      const filePath = writeWorkFile('notes.txt', 'intact');
      const hash = hashBuffer('intact');
      store.create(filePath, hash);

      expect(store.verify(filePath, hash)).toBe(true);
    });

    test('verify rejects a tampered or missing backup', () => {
      const filePath = writeWorkFile('notes.txt', 'intact');
      const hash = hashBuffer('intact');
      store.create(filePath, hash);
      fs.writeFileSync(
        store.getBackupPath(filePath, hash),
        zlib.gzipSync('tampered'),
      );

      expect(store.verify(filePath, hash)).toBe(false);
      expect(store.verify(filePath, 'missing')).toBe(false);
    });
  });

  describe('restore', () => {
    test('overwrites the tracked file by default', () => {
      const filePath = writeWorkFile('notes.txt', 'version one');
      const hash = hashBuffer('version one');
      store.create(filePath, hash);
      fs.writeFileSync(filePath, 'version two');

      store.restore(filePath, hash);

      expect(fs.readFileSync(filePath, 'utf-8')).toBe('version one');
    });

    test('writes to another target and creates its directories', () => {
      const filePath = writeWorkFile('notes.txt', 'version one');
      const hash = hashBuffer('version one');
      store.create(filePath, hash);
      const target = path.join(tempDir, 'restored', 'deep', 'notes.txt');

      store.restore(filePath, hash, target);

      expect(fs.readFileSync(target, 'utf-8')).toBe('version one');
    });
  });
});
