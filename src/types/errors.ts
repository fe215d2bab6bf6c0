/**
 * Domain-specific error types for deltavault
 *
 * All errors extend BaseError for consistent structure
 * and type discrimination.
 */

/**
 * Base error class with consistent structure
 */
export abstract class BaseError extends Error {
  abstract readonly code: string;
  abstract readonly type: ErrorType;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export type ErrorType =
  | 'parse'
  | 'validation'
  | 'filesystem'
  | 'patch'
  | 'archive';

/**
 * Config file parsing errors
 */
export class ParseError extends BaseError {
  readonly type = 'parse' as const;

  constructor(
    message: string,
    public readonly code: ParseErrorCode,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

export type ParseErrorCode = 'INVALID_CONTENT';

/**
 * Validation errors (bad dates, bad config values)
 */
export class ValidationError extends BaseError {
  readonly type = 'validation' as const;

  constructor(
    message: string,
    public readonly code: ValidationErrorCode,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

export type ValidationErrorCode =
  | 'INVALID_DATE'
  | 'INVALID_CONFIG';

/**
 * Filesystem operation errors
 */
export class FileSystemError extends BaseError {
  readonly type = 'filesystem' as const;

  constructor(
    message: string,
    public readonly code: FileSystemErrorCode,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }

  /**
   * Create from Node.js fs error
   */
  static fromNodeError(error: unknown, filePath?: string): FileSystemError {
    const errno = toErrnoException(error);
    return new FileSystemError(
      errno.message,
      toFileSystemErrorCode(errno.code),
      { filePath, originalCode: errno.code }
    );
  }
}

export type FileSystemErrorCode =
  | 'ENOENT'    // File not found
  | 'EACCES'    // Permission denied
  | 'EEXIST'    // File exists
  | 'EISDIR'    // Is a directory
  | 'ENOTDIR'   // Not a directory
  | 'ENOSPC'    // No space left
  | 'UNKNOWN';

const KNOWN_FS_CODES: readonly FileSystemErrorCode[] = [
  'ENOENT',
  'EACCES',
  'EEXIST',
  'EISDIR',
  'ENOTDIR',
  'ENOSPC',
];

function toFileSystemErrorCode(code: string | undefined): FileSystemErrorCode {
  return KNOWN_FS_CODES.find((known) => known === code) ?? 'UNKNOWN';
}

function toErrnoException(error: unknown): NodeJS.ErrnoException {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}

/**
 * Patch parsing and application errors
 *
 * Both codes are fatal for the restore that hit them.
 */
export class PatchError extends BaseError {
  readonly type = 'patch' as const;

  constructor(
    message: string,
    public readonly code: PatchErrorCode,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

export type PatchErrorCode =
  | 'MALFORMED_HUNK_HEADER'
  | 'PATCH_CONFLICT';

/**
 * Archive directory errors
 */
export class ArchiveError extends BaseError {
  readonly type = 'archive' as const;

  constructor(
    message: string,
    public readonly code: ArchiveErrorCode,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

export type ArchiveErrorCode =
  | 'ARCHIVE_UNAVAILABLE'
  | 'CORRUPTED'
  | 'WRITE_FAILED';

/**
 * Union of all error types for exhaustive matching
 */
export type DeltaVaultError =
  | ParseError
  | ValidationError
  | FileSystemError
  | PatchError
  | ArchiveError;

/**
 * Type guard to check if error is a DeltaVaultError
 */
export function isDeltaVaultError(error: unknown): error is DeltaVaultError {
  return error instanceof BaseError;
}
