/**
 * Common types and interfaces for the shpp preprocessor
 */

// Directive types

/**
 * Delimiters used around the path of an include directive
 */
export type IncludeQuoteStyle = 'angle' | 'double' | 'single' | 'none';

/**
 * One recognized `#include` line
 */
export interface IncludeDirective {
  /** Line number in the source file (1-indexed) */
  readonly lineNumber: number;
  /** Path exactly as written between the delimiters */
  readonly rawPath: string;
  readonly quoteStyle: IncludeQuoteStyle;
  /** File the directive was found in */
  readonly sourceFile: string;
}

/**
 * Where a directive sits, for diagnostics
 */
export interface IncludeLocation {
  sourceFile: string;
  lineNumber: number;
}

// Configuration types

export interface ProcessingConfig {
  /** Wrap every inlined block in begin/end marker comments */
  readonly debug: boolean;
  /** Longest allowed include chain, counting the top-level input */
  readonly maxIncludeDepth: number;
  /** Sandbox root; absolute include paths are rooted here */
  readonly baseDirectory: string;
}

/**
 * Shape of the optional YAML project file
 */
export interface ProjectConfigFile {
  debug?: boolean;
  maxDepth?: number;
  baseDirectory?: string;
}

// Command option types

export interface PreprocessCommandOptions {
  debug?: boolean;
  maxDepth?: number;
  baseDir?: string;
  config?: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class PreprocessorError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;
  /** Files open on the include chain when the error was raised, outermost first */
  public includeStack?: string[];

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PreprocessorError';
    this.code = code;
    this.details = details;
  }

  /**
   * Record the include chain once, at the innermost point of failure
   */
  attachIncludeStack(stack: readonly string[]): void {
    if (!this.includeStack) {
      this.includeStack = [...stack];
    }
  }
}

export enum ErrorCodes {
  INVALID_INCLUDE_DIRECTIVE = 'INVALID_INCLUDE_DIRECTIVE',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  CIRCULAR_DEPENDENCY = 'CIRCULAR_DEPENDENCY',
  MAX_DEPTH_EXCEEDED = 'MAX_DEPTH_EXCEEDED',
  IO_ERROR = 'IO_ERROR',
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
