export { loadConfig, resolveConfig } from './config';
export type { ConfigFile, KeepsakeConfig, LoadedConfig } from './config';
export { createContext } from './context';
export type { Context, ContextOpts } from './context';
export { ErrorLog } from './errorLog';
export {
  IOFailureError,
  KeepsakeError,
  NotFoundError,
} from './errors';
export { createProgram } from './program';
export { BackupStore } from './versioning/BackupStore';
export { hashBuffer, hashFile } from './versioning/hash';
export { MetadataStore } from './versioning/MetadataStore';
export {
  collectActiveVersions,
  resolveMaxBackups,
  selectExcess,
} from './versioning/retention';
export type * from './versioning/types';
export { VersionManager } from './versioning/VersionManager';
