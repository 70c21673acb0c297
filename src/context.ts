import { type ConfigFile, type KeepsakeConfig, loadConfig, resolveConfig } from './config';
import { ErrorLog } from './errorLog';
import { getCurrentUsername } from './utils/time';
import { BackupStore } from './versioning/BackupStore';
import { MetadataStore } from './versioning/MetadataStore';
import { VersionManager } from './versioning/VersionManager';

export interface ContextOpts {
  cwd: string;
  /** Used instead of keepsake.config.json when given */
  config?: ConfigFile;
  now?: () => Date;
  username?: string;
}

export interface Context {
  cwd: string;
  config: KeepsakeConfig;
  errorLog: ErrorLog;
  metadataStore: MetadataStore;
  backupStore: BackupStore;
  versionManager: VersionManager;
}

export function createContext(opts: ContextOpts): Context {
  const { cwd } = opts;
  const now = opts.now ?? (() => new Date());
  const username = opts.username ?? getCurrentUsername();

  let config: KeepsakeConfig;
  let problem: string | undefined;
  if (opts.config) {
    config = resolveConfig(cwd, opts.config);
  } else {
    ({ config, problem } = loadConfig(cwd));
  }

  const errorLog = new ErrorLog({ logDir: config.logDir, now, username });
  if (problem) {
    errorLog.warn(`${problem}. Using defaults.`);
  }

  const metadataStore = new MetadataStore({
    indexPath: config.indexPath,
    errorLog,
    now,
  });
  const backupStore = new BackupStore({
    backupRoot: config.backupFolder,
    errorLog,
  });
  const versionManager = new VersionManager({
    store: metadataStore,
    errorLog,
    backupStore,
    maxBackups: config.maxBackups,
    now,
    username,
    cwd,
  });

  return {
    cwd,
    config,
    errorLog,
    metadataStore,
    backupStore,
    versionManager,
  };
}
