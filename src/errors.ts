/**
 * Error types raised by keepsake.
 *
 * Corrupt indexes and invalid retention settings are recovered where they
 * are found and never surface as errors.
 */

export class KeepsakeError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'KeepsakeError';
    Object.setPrototypeOf(this, KeepsakeError.prototype);
  }
}

export class NotFoundError extends KeepsakeError {
  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, 'NOT_FOUND', { path: filePath }, options);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class IOFailureError extends KeepsakeError {
  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, 'IO_FAILURE', { path: filePath }, options);
    this.name = 'IOFailureError';
    Object.setPrototypeOf(this, IOFailureError.prototype);
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

/**
 * Maps a raw fs error onto NotFoundError / IOFailureError.
 */
export function toFileError(
  error: unknown,
  action: string,
  filePath: string,
): KeepsakeError {
  if (error instanceof KeepsakeError) {
    return error;
  }
  const message = `Failed to ${action} ${filePath}: ${getErrorMessage(error)}`;
  if (isNotFound(error)) {
    return new NotFoundError(message, filePath, { cause: error });
  }
  return new IOFailureError(message, filePath, { cause: error });
}
