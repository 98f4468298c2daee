import { PreprocessorError, ErrorCodes, CommandResult, IncludeLocation } from '../types/index.js';
import { CHAIN_SEPARATOR } from '../constants/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failures an include expansion can end in
 */

function at(location?: IncludeLocation): string {
  return location ? ` (included from ${location.sourceFile}:${location.lineNumber})` : '';
}

export class InvalidIncludeDirectiveError extends PreprocessorError {
  constructor(public readonly directive: string, public readonly location: IncludeLocation) {
    super(
      `Invalid include directive at ${location.sourceFile}:${location.lineNumber}: ${directive}`,
      ErrorCodes.INVALID_INCLUDE_DIRECTIVE,
      { directive, ...location }
    );
    this.name = 'InvalidIncludeDirectiveError';
  }
}

export class FileNotFoundError extends PreprocessorError {
  constructor(public readonly path: string, public readonly location?: IncludeLocation, options?: { cause?: unknown }) {
    super(`File not found: ${path}${at(location)}`, ErrorCodes.FILE_NOT_FOUND, { path, ...location }, options);
    this.name = 'FileNotFoundError';
  }
}

export class PermissionDeniedError extends PreprocessorError {
  constructor(public readonly path: string, public readonly location?: IncludeLocation, options?: { cause?: unknown }) {
    super(`Permission denied: ${path}${at(location)}`, ErrorCodes.PERMISSION_DENIED, { path, ...location }, options);
    this.name = 'PermissionDeniedError';
  }
}

export class CircularDependencyError extends PreprocessorError {
  /**
   * @param chain - the open include stack followed by the repeated path
   */
  constructor(public readonly chain: string[], public readonly location?: IncludeLocation) {
    super(
      `Circular dependency detected: ${chain.join(CHAIN_SEPARATOR)}${at(location)}`,
      ErrorCodes.CIRCULAR_DEPENDENCY,
      { chain, ...location }
    );
    this.name = 'CircularDependencyError';
  }
}

export class MaxDepthExceededError extends PreprocessorError {
  constructor(public readonly path: string, public readonly maxDepth: number, public readonly location?: IncludeLocation) {
    super(
      `Maximum include depth (${maxDepth}) exceeded at: ${path}${at(location)}`,
      ErrorCodes.MAX_DEPTH_EXCEEDED,
      { path, maxDepth, ...location }
    );
    this.name = 'MaxDepthExceededError';
  }
}

export class IncludeIoError extends PreprocessorError {
  constructor(public readonly path: string, cause: unknown, public readonly location?: IncludeLocation) {
    super(
      `IO error on ${path}${at(location)}: ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCodes.IO_ERROR,
      { path, ...location },
      { cause }
    );
    this.name = 'IncludeIoError';
  }
}

export class ConfigError extends PreprocessorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Translate a failed filesystem call into the preprocessor's error taxonomy
 */
export function toFileSystemError(error: unknown, path: string, location?: IncludeLocation): PreprocessorError {
  if (error instanceof PreprocessorError) {
    return error;
  }
  if (isErrnoException(error)) {
    switch (error.code) {
      case 'ENOENT':
      case 'ENOTDIR':
        return new FileNotFoundError(path, location, { cause: error });
      case 'EACCES':
      case 'EPERM':
        return new PermissionDeniedError(path, location, { cause: error });
    }
  }
  return new IncludeIoError(path, error, location);
}

/**
 * Multi-line report for the terminal: message, include stack and cause chain
 */
export function formatErrorReport(error: unknown): string {
  if (!(error instanceof Error)) {
    return `Error: ${String(error)}`;
  }
  const lines = [`Error: ${error.message}`];
  if (error instanceof PreprocessorError && error.includeStack && error.includeStack.length > 0) {
    lines.push(`  Include stack: ${error.includeStack.join(CHAIN_SEPARATOR)}`);
  }
  let cause: unknown = error.cause;
  while (cause !== undefined) {
    lines.push(`  Caused by: ${cause instanceof Error ? cause.message : String(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return lines.join('\n');
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PreprocessorError) {
    logger.debug(error.message, { code: error.code, details: error.details, includeStack: error.includeStack });
    return {
      success: false,
      error: formatErrorReport(error)
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: formatErrorReport(error)
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
