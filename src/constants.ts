export const PRODUCT_NAME = 'keepsake';
export const VERSION = '0.1.0';

export const CONFIG_FILE_NAME = 'keepsake.config.json';

export const DEFAULT_BACKUP_FOLDER = 'backups';
export const DEFAULT_INDEX_FILE = 'tracked_files.json';
export const DEFAULT_LOG_DIR = 'logs';
export const ERROR_LOG_FILE = 'version_manager_error.log';

/** Active versions kept per file when the configured cap is unusable. */
export const DEFAULT_MAX_BACKUPS = 3;

export const HASH_CHUNK_SIZE = 8 * 1024;

export const BACKUP_VERSIONS_DIR = 'versions';
export const BACKUP_EXTENSION = '.gz';
