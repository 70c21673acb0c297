import fs from 'fs';
import path from 'pathe';
import { z } from 'zod';
import {
  CONFIG_FILE_NAME,
  DEFAULT_BACKUP_FOLDER,
  DEFAULT_INDEX_FILE,
  DEFAULT_LOG_DIR,
  DEFAULT_MAX_BACKUPS,
} from './constants';
import { getErrorMessage, isNotFound } from './errors';

const configFileSchema = z.object({
  backupFolder: z.string().min(1).optional(),
  // Validated by the retention policy, which falls back with a warning
  maxBackups: z.unknown().optional(),
  indexPath: z.string().min(1).optional(),
  logDir: z.string().min(1).optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface KeepsakeConfig {
  backupFolder: string;
  maxBackups: unknown;
  indexPath: string;
  logDir: string;
}

export interface LoadedConfig {
  config: KeepsakeConfig;
  /** Set when the config file existed but could not be used */
  problem?: string;
}

/**
 * Fills defaults and resolves every path against `cwd`.
 */
export function resolveConfig(cwd: string, input: ConfigFile = {}): KeepsakeConfig {
  return {
    backupFolder: path.resolve(cwd, input.backupFolder ?? DEFAULT_BACKUP_FOLDER),
    maxBackups: input.maxBackups ?? DEFAULT_MAX_BACKUPS,
    indexPath: path.resolve(cwd, input.indexPath ?? DEFAULT_INDEX_FILE),
    logDir: path.resolve(cwd, input.logDir ?? DEFAULT_LOG_DIR),
  };
}

/**
 * Reads `keepsake.config.json` from `cwd`. A missing file means defaults; an
 * unreadable or invalid one also means defaults, reported via `problem`.
 */
export function loadConfig(cwd: string): LoadedConfig {
  const configPath = path.join(cwd, CONFIG_FILE_NAME);
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) {
      return { config: resolveConfig(cwd) };
    }
    return {
      config: resolveConfig(cwd),
      problem: `Failed to read ${configPath}: ${getErrorMessage(err)}`,
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return {
      config: resolveConfig(cwd),
      problem: `Invalid JSON in ${configPath}: ${getErrorMessage(err)}`,
    };
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return {
      config: resolveConfig(cwd),
      problem: `Invalid config in ${configPath}: ${details}`,
    };
  }
  return { config: resolveConfig(cwd, result.data) };
}
