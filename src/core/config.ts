import * as yaml from 'js-yaml';
import { dirname, join, resolve } from 'path';
import type { PreprocessCommandOptions, ProcessingConfig, ProjectConfigFile } from '../types/index.js';
import { DEFAULTS, FILE_PATTERNS } from '../constants/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Configuration for a preprocessing run
 * Precedence: CLI flag > project file (.shpp.yml) > defaults
 */

const KNOWN_KEYS: ReadonlyArray<keyof ProjectConfigFile> = ['debug', 'maxDepth', 'baseDirectory'];

export interface LoadedConfig {
  config: ProcessingConfig;
  /** Project file the values came from, if one was read */
  configFile?: string;
  warnings: string[];
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Build a validated configuration, filling defaults
 */
export function createProcessingConfig(
  values: Partial<ProcessingConfig> & Pick<ProcessingConfig, 'baseDirectory'>
): ProcessingConfig {
  const maxIncludeDepth = values.maxIncludeDepth ?? DEFAULTS.MAX_INCLUDE_DEPTH;
  if (!isPositiveInteger(maxIncludeDepth)) {
    throw new ConfigError(`Max include depth must be a positive integer, got ${maxIncludeDepth}`, { maxIncludeDepth });
  }
  if (!values.baseDirectory) {
    throw new ConfigError('Base directory must not be empty');
  }

  return {
    debug: values.debug ?? DEFAULTS.DEBUG,
    maxIncludeDepth,
    baseDirectory: resolve(values.baseDirectory)
  };
}

/**
 * Parse and validate the contents of a YAML project file
 */
export function parseProjectConfig(content: string, filePath: string): { values: ProjectConfigFile; warnings: string[] } {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`, { filePath });
  }

  if (parsed === undefined || parsed === null) {
    return { values: {}, warnings: [] };
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`${filePath} must contain a mapping`, { filePath });
  }

  const raw = new Map<string, unknown>(Object.entries(parsed));
  const values: ProjectConfigFile = {};
  const warnings: string[] = [];

  for (const key of raw.keys()) {
    if (!KNOWN_KEYS.some(known => known === key)) {
      warnings.push(`Unknown key '${key}' in ${filePath} ignored`);
    }
  }

  const debug = raw.get('debug');
  if (debug !== undefined) {
    if (typeof debug !== 'boolean') {
      throw new ConfigError(`${filePath}: 'debug' must be a boolean`, { filePath, debug });
    }
    values.debug = debug;
  }

  const maxDepth = raw.get('maxDepth');
  if (maxDepth !== undefined) {
    if (!isPositiveInteger(maxDepth)) {
      throw new ConfigError(`${filePath}: 'maxDepth' must be a positive integer`, { filePath, maxDepth });
    }
    values.maxDepth = maxDepth;
  }

  const baseDirectory = raw.get('baseDirectory');
  if (baseDirectory !== undefined) {
    if (typeof baseDirectory !== 'string' || !baseDirectory.trim()) {
      throw new ConfigError(`${filePath}: 'baseDirectory' must be a non-empty string`, { filePath, baseDirectory });
    }
    values.baseDirectory = baseDirectory;
  }

  return { values, warnings };
}

/**
 * Resolve the configuration for preprocessing `inputPath`
 */
export async function loadProcessingConfig(
  inputPath: string,
  options: PreprocessCommandOptions = {}
): Promise<LoadedConfig> {
  const inputDir = dirname(resolve(inputPath));
  const configPath = options.config ? resolve(options.config) : join(inputDir, FILE_PATTERNS.PROJECT_CONFIG);

  let fileValues: ProjectConfigFile = {};
  let configFile: string | undefined;
  const warnings: string[] = [];

  if (await exists(configPath)) {
    logger.debug(`Loading config from: ${configPath}`);
    const parsed = parseProjectConfig(await readTextFile(configPath), configPath);
    fileValues = parsed.values;
    configFile = configPath;
    warnings.push(...parsed.warnings);
  } else if (options.config) {
    throw new ConfigError(`Config file not found: ${options.config}`, { configPath });
  } else {
    logger.debug('No project config file, using defaults');
  }

  let baseDirectory = inputDir;
  if (options.baseDir) {
    baseDirectory = resolve(options.baseDir);
  } else if (fileValues.baseDirectory && configFile) {
    baseDirectory = resolve(dirname(configFile), fileValues.baseDirectory);
  }

  const config = createProcessingConfig({
    debug: options.debug ?? fileValues.debug,
    maxIncludeDepth: options.maxDepth ?? fileValues.maxDepth,
    baseDirectory
  });

  return { config, configFile, warnings };
}
