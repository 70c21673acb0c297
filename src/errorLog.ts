import createDebug from 'debug';
import fs from 'fs';
import path from 'pathe';
import { ERROR_LOG_FILE } from './constants';
import { formatUtcTimestamp, getCurrentUsername } from './utils/time';

const debug = createDebug('keepsake:errors');

export interface ErrorLogOptions {
  logDir: string;
  fileName?: string;
  now?: () => Date;
  username?: string;
}

/**
 * Append-only error log shared by the stores and the version manager.
 * Each entry is one line: `[<UTC timestamp>] [<username>] <message>`.
 */
export class ErrorLog {
  private logDir: string;
  private filePath: string;
  private now: () => Date;
  private username: string;

  constructor(opts: ErrorLogOptions) {
    this.logDir = opts.logDir;
    this.filePath = path.join(opts.logDir, opts.fileName ?? ERROR_LOG_FILE);
    this.now = opts.now ?? (() => new Date());
    this.username = opts.username ?? getCurrentUsername();
  }

  getFilePath(): string {
    return this.filePath;
  }

  error(message: string): void {
    this.append(message);
  }

  warn(message: string): void {
    this.append(`Warning: ${message}`);
  }

  private append(message: string): void {
    const line = `[${formatUtcTimestamp(this.now())}] [${this.username}] ${message}\n`;
    debug(message);
    try {
      fs.mkdirSync(this.logDir, { recursive: true });
      fs.appendFileSync(this.filePath, line, 'utf-8');
    } catch (err) {
      // Last resort, the log itself is unwritable
      console.error(`Failed to write to error log ${this.filePath}:`, err);
      console.error(`Original error was: ${message}`);
    }
  }
}
