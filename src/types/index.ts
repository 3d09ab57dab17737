/**
 * Common types and interfaces for the chain build environment
 */

// Re-export configuration and resolution types
export * from './config.js';
export * from './resolution.js';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class ChainError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ChainError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  // Location errors
  CONFIG_PATH_ERROR = 'CONFIG_PATH_ERROR',
  CONFIG_FILE_NOT_FOUND = 'CONFIG_FILE_NOT_FOUND',
  // Document errors
  DOCUMENT_OPEN_ERROR = 'DOCUMENT_OPEN_ERROR',
  DOCUMENT_PARSE_ERROR = 'DOCUMENT_PARSE_ERROR',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  // Domain errors
  EMPTY_CONFIG_DATA = 'EMPTY_CONFIG_DATA',
  MISSING_CONFIG_KEY = 'MISSING_CONFIG_KEY',
  FLOW_NOT_FOUND = 'FLOW_NOT_FOUND',
  BACKEND_PATH_NOT_FOUND = 'BACKEND_PATH_NOT_FOUND',
  // Flow/tool errors
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  NO_SUITABLE_VERSION = 'NO_SUITABLE_VERSION',
  VERSION_CONFLICT = 'VERSION_CONFLICT',
  DEPENDENCY_CYCLE = 'DEPENDENCY_CYCLE'
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
