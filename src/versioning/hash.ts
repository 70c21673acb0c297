import crypto from 'crypto';
import fs from 'fs';
import { HASH_CHUNK_SIZE } from '../constants';
import { toFileError } from '../errors';

/**
 * SHA-256 of a file's content as lowercase hex. The file is read in fixed
 * 8 KiB chunks so memory stays flat regardless of file size.
 *
 * Throws NotFoundError when the file is gone, IOFailureError otherwise.
 */
export function hashFile(filePath: string): string {
  const hasher = crypto.createHash('sha256');
  const chunk = Buffer.alloc(HASH_CHUNK_SIZE);
  let fd: number | undefined;
  try {
    fd = fs.openSync(filePath, 'r');
    let bytesRead = fs.readSync(fd, chunk, 0, HASH_CHUNK_SIZE, null);
    while (bytesRead > 0) {
      hasher.update(chunk.subarray(0, bytesRead));
      bytesRead = fs.readSync(fd, chunk, 0, HASH_CHUNK_SIZE, null);
    }
  } catch (err) {
    throw toFileError(err, 'hash', filePath);
  } finally {
    if (fd !== undefined) {
      fs.closeSync(fd);
    }
  }
  return hasher.digest('hex');
}

export function hashBuffer(content: Buffer | string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}
