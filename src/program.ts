import { Command } from 'commander';
import createDebug from 'debug';
import { PRODUCT_NAME, VERSION } from './constants';
import { type Context, createContext } from './context';
import { getErrorMessage, KeepsakeError } from './errors';
import { formatUtcTimestamp } from './utils/time';
import type { VersionRecord } from './versioning/types';

const debug = createDebug('keepsake:cli');

const SHORT_HASH_LENGTH = 12;

export interface ProgramIO {
  log: (line: string) => void;
  error: (line: string) => void;
  setExitCode: (code: number) => void;
}

export interface ProgramOpts {
  cwd?: string;
  io?: Partial<ProgramIO>;
  /** Overrides context creation, mainly for tests */
  createContext?: (cwd: string) => Context;
}

function shortHash(hash: string): string {
  return hash.slice(0, SHORT_HASH_LENGTH);
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function describeVersion(version: VersionRecord, withStatus: boolean): string {
  const { entry } = version;
  const columns = [
    shortHash(version.hash),
    formatUtcTimestamp(version.timestamp),
    text(entry.username),
  ];
  if (withStatus) {
    columns.push(`[${version.status ?? (version.deleted ? 'deleted' : 'active')}]`);
  }
  columns.push(text(entry.commit_message) || '(no message)');
  return columns.join('  ');
}

/**
 * Resolves a full hash or a unique prefix of one against the file's history.
 */
function resolveHash(context: Context, file: string, prefix: string): string {
  const matches = context.versionManager
    .getVersionHistory(file)
    .filter((version) => version.hash.startsWith(prefix));
  if (matches.length === 0) {
    throw new KeepsakeError(`No version matching '${prefix}' for ${file}`, 'NOT_FOUND');
  }
  if (matches.length > 1) {
    throw new KeepsakeError(
      `Version prefix '${prefix}' is ambiguous (${matches.length} matches)`,
      'AMBIGUOUS_HASH',
    );
  }
  return matches[0].hash;
}

export function createProgram(opts: ProgramOpts = {}): Command {
  const io: ProgramIO = {
    log: opts.io?.log ?? ((line) => console.log(line)),
    error: opts.io?.error ?? ((line) => console.error(line)),
    setExitCode:
      opts.io?.setExitCode ??
      ((code) => {
        process.exitCode = code;
      }),
  };
  const makeContext = opts.createContext ?? ((cwd: string) => createContext({ cwd }));

  const program = new Command();
  program
    .name(PRODUCT_NAME)
    .description('Keep hash-addressed backups of individual files')
    .version(VERSION)
    .option('-C, --cwd <dir>', 'directory holding the index, backups and logs')
    .configureOutput({
      writeOut: (str) => io.log(str.trimEnd()),
      writeErr: (str) => io.error(str.trimEnd()),
    });

  const run = (action: (context: Context) => void) => {
    try {
      const cwd = program.opts<{ cwd?: string }>().cwd ?? opts.cwd ?? process.cwd();
      action(makeContext(cwd));
    } catch (err) {
      debug('command failed: %O', err);
      io.error(`Error: ${getErrorMessage(err)}`);
      io.setExitCode(1);
    }
  };

  program
    .command('commit')
    .description('record the current content of a file as a new version')
    .argument('<file>', 'file to commit')
    .requiredOption('-m, --message <message>', 'commit message')
    .option('-f, --force', 'commit even when the content is unchanged')
    .action((file: string, options: { message: string; force?: boolean }) =>
      run((context) => {
        const message = options.message.trim();
        if (!message) {
          throw new KeepsakeError('Please enter a commit message', 'EMPTY_MESSAGE');
        }
        const result = context.versionManager.commitFile(file, message, {
          force: options.force,
        });
        if (result.status === 'unchanged') {
          io.log(
            `No changes detected since version ${shortHash(result.hash)}. Use --force to commit anyway.`,
          );
          return;
        }
        io.log(`Committed ${file} as ${shortHash(result.hash)}`);
        if (result.deletedHashes.length > 0) {
          io.log(
            `Released ${result.deletedHashes.length} old version(s): ${result.deletedHashes.map(shortHash).join(', ')}`,
          );
        }
      }),
    );

  program
    .command('status')
    .description('show whether a file changed since its last active version')
    .argument('<file>', 'tracked file')
    .action((file: string) =>
      run((context) => {
        const status = context.versionManager.hasChanged(file);
        if (!status.changed) {
          io.log(`${file}: unchanged (${shortHash(status.currentHash)})`);
          return;
        }
        const last = status.lastActiveHash
          ? shortHash(status.lastActiveHash)
          : 'none';
        io.log(
          `${file}: changed (current ${shortHash(status.currentHash)}, last ${last})`,
        );
      }),
    );

  program
    .command('log')
    .description('list the versions of a file, newest first')
    .argument('<file>', 'tracked file')
    .option('-a, --all', 'include deleted versions and backup status')
    .action((file: string, options: { all?: boolean }) =>
      run((context) => {
        const versions: VersionRecord[] = options.all
          ? context.versionManager.getVersionHistory(file)
          : context.versionManager
              .getActiveVersions(file)
              .map((version) => ({ ...version, deleted: false }));
        if (versions.length === 0) {
          io.log(`No versions recorded for ${file}`);
          return;
        }
        for (const version of versions) {
          io.log(describeVersion(version, options.all === true));
        }
      }),
    );

  program
    .command('restore')
    .description('replace a file with one of its stored versions')
    .argument('<file>', 'tracked file')
    .argument('<hash>', 'version hash or unique prefix')
    .option('-n, --dry-run', 'only report the line changes')
    .action((file: string, prefix: string, options: { dryRun?: boolean }) =>
      run((context) => {
        const hash = resolveHash(context, file, prefix);
        if (options.dryRun) {
          const preview = context.versionManager.previewRestore(file, hash);
          io.log(
            `Restoring ${shortHash(hash)} would add ${preview.insertions} line(s) and remove ${preview.deletions} line(s)`,
          );
          return;
        }
        context.versionManager.restoreVersion(file, hash);
        io.log(`Restored ${file} to ${shortHash(hash)}`);
      }),
    );

  program
    .command('files')
    .description('list tracked files, most recently updated first')
    .action(() =>
      run((context) => {
        const files = context.versionManager.getTrackedFiles();
        if (files.length === 0) {
          io.log('No tracked files');
          return;
        }
        for (const file of files) {
          io.log(
            `${file.lastUpdated ?? 'unknown'}  ${file.activeVersions}/${file.totalVersions}  ${file.path}`,
          );
        }
      }),
    );

  return program;
}
