/**
 * Common types and interfaces for the xcgraph resolver
 */

export * from './manifest.js';
export * from './graph.js';

// Configuration types
export type OutputFormat = 'json' | 'yaml';

export interface XcgraphConfig {
  /** Swift language version the synthesized manifest targets compile with */
  swiftVersion: string;

  /**
   * Directory holding the manifest description library. When set, manifest
   * targets get framework, library and include search paths pointing at it.
   */
  descriptionLibraryPath?: string;

  /** Default rendering for CLI output */
  format: OutputFormat;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types

/**
 * How a failure should be surfaced. Every error the resolver raises aborts
 * the current load call.
 */
export type ErrorType = 'abort' | 'bug';

export class XcgraphError extends Error {
  public code: string;
  public details?: Record<string, unknown>;
  public type: ErrorType = 'abort';

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'XcgraphError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  FEATURE_NOT_YET_SUPPORTED = 'FEATURE_NOT_YET_SUPPORTED',
  MISSING_FILE = 'MISSING_FILE',
  MANIFEST_NOT_FOUND = 'MANIFEST_NOT_FOUND',
  INVALID_MANIFEST = 'INVALID_MANIFEST',
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
