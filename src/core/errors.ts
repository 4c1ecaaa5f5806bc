/**
 * Error codes used by the update server.
 * Configuration problems exit with code 2, runtime failures with code 1.
 */
export type ErrorCode =
  // Operator-correctable (exit code 2)
  | 'ConfigError'
  | 'NoUpdatesError'
  // Runtime
  | 'ScanError'
  | 'MetadataError';

export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error for everything the server raises on purpose.
 *
 * @example
 * ```typescript
 * throw new MetadataError('Missing BuildID', {
 *   details: { file: 'application_20130101000000.ini' }
 * });
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown> | string;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super('ConfigError', message, options);
  }
}

/** The watched directory holds no update package for the channel. */
export class NoUpdatesError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super('NoUpdatesError', message, options);
  }
}

export class ScanError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super('ScanError', message, options);
  }
}

/** Companion application ini is missing or lacks a required field. */
export class MetadataError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super('MetadataError', message, options);
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof AppError && (error.code === 'ConfigError' || error.code === 'NoUpdatesError')) {
    return 2;
  }
  return 1;
}
