/**
 * Common types and interfaces for the lockvendor CLI application
 */

// Re-export domain types
export * from './lockfile.js';
export * from './sources.js';
export * from './manifest.js';

// Core application types
export type OutputFormat = 'manifest' | 'flatpak';

export interface GeneratorConfig {
  vendorDir: string;
  gitCheckoutDir: string;
  concurrency: number;
  retries: number;
  timeoutMs: number;
  backoffMs: number;
  gitTarballs: boolean;
  format: OutputFormat;
  /** Registry index URL -> crate download base URL */
  registries: Record<string, string>;
}

export interface GenerateOptions {
  lockfilePath: string;
  outputPath?: string;
  vendorConfigPath?: string;
  configPath?: string;
  vendorDir?: string;
  gitCheckoutDir?: string;
  format?: OutputFormat;
  gitTarballs?: boolean;
  concurrency?: number;
  retries?: number;
  timeoutMs?: number;
  debug?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Error types
export class LockvendorError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LockvendorError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PARSE_ERROR = 'PARSE_ERROR',
  UNSUPPORTED_SOURCE_KIND = 'UNSUPPORTED_SOURCE_KIND',
  MISSING_CHECKSUM = 'MISSING_CHECKSUM',
  SOURCE_RESOLUTION_ERROR = 'SOURCE_RESOLUTION_ERROR',
  VENDOR_PATH_CONFLICT = 'VENDOR_PATH_CONFLICT',
  CANCELLED = 'CANCELLED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
