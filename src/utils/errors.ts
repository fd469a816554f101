import { LockvendorError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure kinds of a manifest generation run.
 * Every one of them is fatal: the run aborts before any output is written.
 */

export class ParseError extends LockvendorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid lockfile: ${message}`, ErrorCodes.PARSE_ERROR, details);
    this.name = 'ParseError';
  }
}

export class UnsupportedSourceKindError extends LockvendorError {
  constructor(packageName: string, version: string, source: string) {
    super(
      `Unsupported source for '${packageName}@${version}': ${source}`,
      ErrorCodes.UNSUPPORTED_SOURCE_KIND,
      { packageName, version, source }
    );
    this.name = 'UnsupportedSourceKindError';
  }
}

export class MissingChecksumError extends LockvendorError {
  constructor(packageName: string, version: string, source: string) {
    super(
      `Registry package '${packageName}@${version}' has no checksum in the lockfile (source: ${source})`,
      ErrorCodes.MISSING_CHECKSUM,
      { packageName, version, source }
    );
    this.name = 'MissingChecksumError';
  }
}

export class SourceResolutionError extends LockvendorError {
  constructor(
    repositoryUrl: string,
    commit: string,
    reason: string,
    details?: Record<string, unknown>
  ) {
    super(
      `Failed to resolve ${repositoryUrl}#${commit}: ${reason}`,
      ErrorCodes.SOURCE_RESOLUTION_ERROR,
      { repositoryUrl, commit, ...details }
    );
    this.name = 'SourceResolutionError';
  }
}

export class VendorPathConflictError extends LockvendorError {
  constructor(dest: string, first: string, second: string) {
    super(
      `Vendor path '${dest}' is claimed by both ${first} and ${second}`,
      ErrorCodes.VENDOR_PATH_CONFLICT,
      { dest, first, second }
    );
    this.name = 'VendorPathConflictError';
  }
}

export class CancelledError extends LockvendorError {
  constructor(message: string = 'Operation cancelled') {
    super(message, ErrorCodes.CANCELLED);
    this.name = 'CancelledError';
  }
}

export class FileSystemError extends LockvendorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends LockvendorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Retryable network failure. Never leaves the resolver: once retries are
 * exhausted it is wrapped in a SourceResolutionError.
 */
export class TransientNetworkError extends Error {
  public readonly url: string;
  public readonly status?: number;
  public readonly retryAfterMs?: number;

  constructor(url: string, message: string, options: { status?: number; retryAfterMs?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientNetworkError';
    this.url = url;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Definitive HTTP failure (not found, forbidden, bad request). Not retried.
 */
export class HttpStatusError extends Error {
  public readonly url: string;
  public readonly status: number;

  constructor(url: string, status: number, statusText: string) {
    super(`${url} responded ${status}${statusText ? ` ${statusText}` : ''}`);
    this.name = 'HttpStatusError';
    this.url = url;
    this.status = status;
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof LockvendorError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(error instanceof CancelledError ? 130 : 1);
    }
  };
}
