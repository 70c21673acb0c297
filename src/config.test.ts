import fs from 'fs';
import os from 'os';
import path from 'pathe';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { loadConfig, resolveConfig } from './config';
import { createContext } from './context';

describe('config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(content: string) {
    fs.writeFileSync(path.join(tempDir, 'keepsake.config.json'), content);
  }

  describe('resolveConfig', () => {
    test('fills defaults relative to the working directory', () => {
      expect(resolveConfig('/work')).toEqual({
        backupFolder: '/work/backups',
        maxBackups: 3,
        indexPath: '/work/tracked_files.json',
        logDir: '/work/logs',
      });
    });

    test('keeps absolute paths and passes maxBackups through untouched', () => {
      expect(
        resolveConfig('/work', {
          backupFolder: '/data/backups',
          indexPath: 'state/index.json',
          maxBackups: 'five',
        }),
      ).toEqual({
        backupFolder: '/data/backups',
        maxBackups: 'five',
        indexPath: '/work/state/index.json',
        logDir: '/work/logs',
      });
    });
  });

  describe('loadConfig', () => {
    test('uses defaults when there is no config file', () => {
      expect(loadConfig(tempDir)).toEqual({ config: resolveConfig(tempDir) });
    });

    test('reads the config file', () => {
      writeConfig(JSON.stringify({ backupFolder: 'store', maxBackups: 5 }));

      const { config, problem } = loadConfig(tempDir);

      expect(problem).toBeUndefined();
      expect(config.backupFolder).toBe(path.join(tempDir, 'store'));
      expect(config.maxBackups).toBe(5);
    });

    test('reports invalid JSON and falls back to defaults', () => {
      writeConfig('{ not json');

      const { config, problem } = loadConfig(tempDir);

      expect(config).toEqual(resolveConfig(tempDir));
      expect(problem).toMatch(
        new RegExp(`^Invalid JSON in ${tempDir}/keepsake\\.config\\.json: `),
      );
    });

    test('reports fields of the wrong type', () => {
      writeConfig(JSON.stringify({ backupFolder: 5 }));

      const { config, problem } = loadConfig(tempDir);

      expect(config).toEqual(resolveConfig(tempDir));
      expect(problem?.startsWith(
        `Invalid config in ${tempDir}/keepsake.config.json: backupFolder: `,
      )).toBe(true);
    });

    test('reports an unreadable config file', () => {
      fs.mkdirSync(path.join(tempDir, 'keepsake.config.json'));

      const { problem } = loadConfig(tempDir);

      expect(problem?.startsWith(
        `Failed to read ${tempDir}/keepsake.config.json: `,
      )).toBe(true);
    });
  });

  describe('createContext', () => {
    const now = () => new Date(Date.UTC(2024, 4, 1, 10, 0, 0));

    test('wires the components from the config file', () => {
      writeConfig(JSON.stringify({ maxBackups: 1, logDir: 'var/log' }));

      const context = createContext({ cwd: tempDir, now, username: 'tester' });

      expect(context.config.maxBackups).toBe(1);
      expect(context.errorLog.getFilePath()).toBe(
        path.join(tempDir, 'var/log/version_manager_error.log'),
      );
      expect(context.metadataStore.getIndexPath()).toBe(
        path.join(tempDir, 'tracked_files.json'),
      );
      expect(context.backupStore.getBackupRoot()).toBe(
        path.join(tempDir, 'backups'),
      );
    });

    test('prefers an explicit config over the file', () => {
      writeConfig(JSON.stringify({ backupFolder: 'from-file' }));

      const context = createContext({
        cwd: tempDir,
        config: { backupFolder: 'explicit' },
        now,
        username: 'tester',
      });

      expect(context.backupStore.getBackupRoot()).toBe(
        path.join(tempDir, 'explicit'),
      );
    });

    test('logs a broken config file as a warning', () => {
      writeConfig('[');

      const context = createContext({ cwd: tempDir, now, username: 'tester' });

      const log = fs.readFileSync(context.errorLog.getFilePath(), 'utf-8');
      expect(log.startsWith(
        `[2024-05-01 10:00:00] [tester] Warning: Invalid JSON in ${tempDir}/keepsake.config.json: `,
      )).toBe(true);
      expect(log.endsWith('. Using defaults.\n')).toBe(true);
      expect(context.config).toEqual(resolveConfig(tempDir));
    });
  });
});
