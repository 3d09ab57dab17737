import { ChainError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the chain build environment
 */

// ---------------------------------------------------------------------------
// Location errors
// ---------------------------------------------------------------------------

export type ConfigPathErrorKind = 'not-absolute' | 'not-directory' | 'not-file' | 'not-exist';

const PATH_ERROR_DESCRIPTIONS: Record<ConfigPathErrorKind, string> = {
  'not-absolute': 'path must be absolute',
  'not-directory': 'not a directory',
  'not-file': 'not a file',
  'not-exist': 'does not exist'
};

export class ConfigPathError extends ChainError {
  readonly kind: ConfigPathErrorKind;
  readonly path: string;
  readonly location: string;

  constructor(kind: ConfigPathErrorKind, path: string, location: string) {
    super(
      `${PATH_ERROR_DESCRIPTIONS[kind]} (${location}): '${path}'`,
      ErrorCodes.CONFIG_PATH_ERROR,
      { kind, path, location }
    );
    this.name = 'ConfigPathError';
    this.kind = kind;
    this.path = path;
    this.location = location;
  }
}

export class ConfigFileNotFoundError extends ChainError {
  constructor(forWhat: string, fileName: string, searched: string[]) {
    super(
      `Configuration file '${fileName}' for ${forWhat} not found${searched.length ? ` (searched: ${searched.join(', ')})` : ''}`,
      ErrorCodes.CONFIG_FILE_NOT_FOUND,
      { forWhat, fileName, searched }
    );
    this.name = 'ConfigFileNotFoundError';
  }
}

// ---------------------------------------------------------------------------
// Document errors
// ---------------------------------------------------------------------------

export class DocumentOpenError extends ChainError {
  constructor(path: string, cause: unknown) {
    super(`Failed to open configuration file: ${path}`, ErrorCodes.DOCUMENT_OPEN_ERROR, {
      path,
      reason: describeCause(cause)
    });
    this.name = 'DocumentOpenError';
  }
}

export class DocumentParseError extends ChainError {
  constructor(path: string, reason: string) {
    super(`Failed to parse configuration file: ${path}: ${reason}`, ErrorCodes.DOCUMENT_PARSE_ERROR, {
      path,
      reason
    });
    this.name = 'DocumentParseError';
  }
}

export class UnsupportedFormatError extends ChainError {
  constructor(path: string, extension: string) {
    super(
      `Unsupported configuration format '${extension || '(none)'}': ${path}`,
      ErrorCodes.UNSUPPORTED_FORMAT,
      { path, extension }
    );
    this.name = 'UnsupportedFormatError';
  }
}

export class ConfigValidationError extends ChainError {
  readonly problems: string[];

  constructor(path: string, problems: string[]) {
    super(
      `Invalid configuration in ${path}:\n  - ${problems.join('\n  - ')}`,
      ErrorCodes.VALIDATION_ERROR,
      { path, problems }
    );
    this.name = 'ConfigValidationError';
    this.problems = problems;
  }
}

// ---------------------------------------------------------------------------
// Domain errors
// ---------------------------------------------------------------------------

export class EmptyConfigDataError extends ChainError {
  constructor(forWhat: string, paths: string[]) {
    super(`No ${forWhat} entries found in configuration: ${paths.join(', ')}`, ErrorCodes.EMPTY_CONFIG_DATA, {
      forWhat,
      paths
    });
    this.name = 'EmptyConfigDataError';
  }
}

export class MissingConfigKeyError extends ChainError {
  readonly key: string;

  constructor(key: string, forWhat: string, name: string) {
    super(`Required key '${key}' not found for ${forWhat} '${name}'`, ErrorCodes.MISSING_CONFIG_KEY, {
      key,
      forWhat,
      name
    });
    this.name = 'MissingConfigKeyError';
    this.key = key;
  }
}

export class FlowNotFoundError extends ChainError {
  readonly flowName: string;

  constructor(flowName: string, requestedBy?: string) {
    super(
      `Flow '${flowName}' not found${requestedBy ? ` (required by flow '${requestedBy}')` : ''}`,
      ErrorCodes.FLOW_NOT_FOUND,
      { flowName, requestedBy }
    );
    this.name = 'FlowNotFoundError';
    this.flowName = flowName;
  }
}

export class BackendPathNotFoundError extends ChainError {
  constructor(forWhat: string, name: string, path: string) {
    super(`Backend path for ${forWhat} '${name}' does not exist: ${path}`, ErrorCodes.BACKEND_PATH_NOT_FOUND, {
      forWhat,
      name,
      path
    });
    this.name = 'BackendPathNotFoundError';
  }
}

// ---------------------------------------------------------------------------
// Flow / tool errors
// ---------------------------------------------------------------------------

export class ToolNotFoundError extends ChainError {
  constructor(toolName: string, flowName: string) {
    super(`Tool '${toolName}' required by flow '${flowName}' not found`, ErrorCodes.TOOL_NOT_FOUND, {
      toolName,
      flowName
    });
    this.name = 'ToolNotFoundError';
  }
}

export class NoSuitableVersionError extends ChainError {
  constructor(
    toolName: string,
    details: {
      flowName: string;
      patterns: string[];
      availableVersions: string[];
    }
  ) {
    const msg = `No version of tool '${toolName}' (required by flow '${details.flowName}') matches: ${details.patterns.join(', ')}${details.availableVersions.length ? `. Available: ${details.availableVersions.join(', ')}` : ''}`;
    super(msg, ErrorCodes.NO_SUITABLE_VERSION, { toolName, ...details });
    this.name = 'NoSuitableVersionError';
  }
}

export class VersionConflictError extends ChainError {
  constructor(
    toolName: string,
    details: {
      flowName: string;
      boundVersion: string;
      requestedVersion: string;
      via?: string;
    }
  ) {
    const origin = details.via ? ` through flow '${details.via}'` : '';
    super(
      `Version conflict for tool '${toolName}' in flow '${details.flowName}': '${details.boundVersion}' is bound, '${details.requestedVersion}' requested${origin}`,
      ErrorCodes.VERSION_CONFLICT,
      { toolName, ...details }
    );
    this.name = 'VersionConflictError';
  }
}

export class DependencyCycleError extends ChainError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Circular flow dependency: ${cycle.join(' -> ')}`, ErrorCodes.DEPENDENCY_CYCLE, { cycle });
    this.name = 'DependencyCycleError';
    this.cycle = cycle;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError<T = unknown>(error: unknown): CommandResult<T> {
  if (error instanceof ChainError) {
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
      process.exit(1);
    }
  };
}
