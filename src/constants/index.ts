/**
 * Shared constants for the shpp preprocessor
 * Single source of truth for directive syntax, marker text and defaults.
 */

export const DIRECTIVE = {
  KEYWORD: '#include'
} as const;

/**
 * Opening/closing delimiter pairs, in match precedence order
 */
export const QUOTE_DELIMITERS = [
  { open: '<', close: '>', style: 'angle' },
  { open: '"', close: '"', style: 'double' },
  { open: "'", close: "'", style: 'single' }
] as const;

export const DEBUG_MARKERS = {
  begin: (rawPath: string): string => `# --- Included from ${rawPath} ---`,
  end: (rawPath: string): string => `# --- End of ${rawPath} ---`
} as const;

export const DEFAULTS = {
  DEBUG: false,
  MAX_INCLUDE_DEPTH: 100
} as const;

export const FILE_PATTERNS = {
  PROJECT_CONFIG: '.shpp.yml'
} as const;

export const ENV_VARS = {
  VERBOSE: 'SHPP_VERBOSE'
} as const;

export const CHAIN_SEPARATOR = ' -> ';
