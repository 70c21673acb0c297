import path from 'pathe';

/**
 * Normalizes a tracked file path into the key used by the index: absolute,
 * forward slashes, and lowercased on case-insensitive Windows filesystems.
 */
export function normalizeTrackedPath(
  filePath: string,
  opts: { cwd?: string; platform?: NodeJS.Platform } = {},
): string {
  const cwd = opts.cwd ?? process.cwd();
  const platform = opts.platform ?? process.platform;
  const resolved = path.resolve(cwd, filePath);
  return platform === 'win32' ? resolved.toLowerCase() : resolved;
}

/**
 * Lowercased extension including the leading dot, or '' when there is none.
 */
export function getFileType(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}
