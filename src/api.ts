/**
 * shpp - programmatic API
 */

export { ShellPreprocessor, PreprocessorBuilder, renderLines, type PreprocessorOptions } from './core/preprocessor.js';
export { ExpansionEngine } from './core/expansion-engine.js';
export { ProcessingContext } from './core/processing-context.js';
export {
  PathResolver,
  canonicalize,
  readSourceFile,
  isWithinRoot,
  nodeResolverFileSystem,
  type ResolverFileSystem
} from './core/path-resolver.js';
export { parseIncludeLine, parseIncludes, splitLines } from './core/directive-parser.js';
export { createProcessingConfig, loadProcessingConfig, parseProjectConfig, type LoadedConfig } from './core/config.js';
export {
  InvalidIncludeDirectiveError,
  FileNotFoundError,
  PermissionDeniedError,
  CircularDependencyError,
  MaxDepthExceededError,
  IncludeIoError,
  ConfigError,
  formatErrorReport
} from './utils/errors.js';
export {
  PreprocessorError,
  ErrorCodes,
  type IncludeDirective,
  type IncludeQuoteStyle,
  type IncludeLocation,
  type ProcessingConfig
} from './types/index.js';
export { DEFAULTS, DEBUG_MARKERS } from './constants/index.js';
