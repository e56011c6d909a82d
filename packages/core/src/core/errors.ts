// src/core/errors.ts

export type ErrorCode =
  | 'INVALID_PATH'
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'UNSUPPORTED_FORMAT'
  | 'TRANSFER_FAILED'
  | 'CODEC_ERROR'
  | 'CONFIG_ERROR';

/**
 * Base class for every error raised by pathbridge.
 * `path` names the offending location when there is one.
 */
export class PathbridgeError extends Error {
  readonly code: ErrorCode;
  readonly path?: string;

  constructor(code: ErrorCode, message: string, path?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.path = path;
  }
}

/**
 * The path has the wrong scheme for the operation, or cannot be parsed.
 */
export class InvalidPathError extends PathbridgeError {
  constructor(path: string, reason = 'is not a valid s3 path') {
    super('INVALID_PATH', `'${path}' ${reason}`, path);
  }
}

export class NotFoundError extends PathbridgeError {
  constructor(path: string, options?: { cause?: unknown }) {
    super('NOT_FOUND', `'${path}' does not exist`, path, options);
  }
}

export class AlreadyExistsError extends PathbridgeError {
  constructor(path: string) {
    super('ALREADY_EXISTS', `Overwrite set to false and '${path}' already exists`, path);
  }
}

export class UnsupportedFormatError extends PathbridgeError {
  readonly format?: string;

  constructor(path: string, format?: string) {
    const message = format
      ? `File type '${format}' is not supported (path '${path}')`
      : `The file type could not be inferred for '${path}'. ` +
        'Include a supported extension or pass the format explicitly.';
    super('UNSUPPORTED_FORMAT', message, path);
    this.format = format;
  }
}

export class CodecError extends PathbridgeError {
  constructor(format: string, message: string, path?: string) {
    super('CODEC_ERROR', `[${format}] ${message}`, path);
  }
}

export class ConfigError extends PathbridgeError {
  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, path, options);
  }
}

/**
 * One file of a fan-out batch that did not make it.
 */
export interface TransferFailure {
  source: string;
  destination: string;
  error: Error;
}

/**
 * Raised after a fan-out batch settles when at least one file failed.
 * Files that completed are left in place.
 */
export class TransferError extends PathbridgeError {
  readonly failures: TransferFailure[];
  readonly completed: number;

  constructor(root: string, failures: TransferFailure[], completed: number) {
    const first = failures[0];
    const detail = first ? ` First failure: '${first.source}' -> '${first.destination}': ${first.error.message}` : '';
    super(
      'TRANSFER_FAILED',
      `${failures.length} of ${failures.length + completed} file(s) failed to transfer to '${root}'.${detail}`,
      root
    );
    this.failures = failures;
    this.completed = completed;
  }
}

/**
 * Coerce a thrown value into an Error.
 */
export function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}
