/**
 * Shell script preprocessor
 *
 * One `process` call is one top-level run: a fresh context, a fresh
 * resolver, and the input entered at depth 1 before expansion starts.
 */

import { dirname, resolve } from 'path';
import type { ProcessingConfig } from '../types/index.js';
import { createProcessingConfig } from './config.js';
import { ExpansionEngine } from './expansion-engine.js';
import { canonicalize, PathResolver } from './path-resolver.js';
import { ProcessingContext } from './processing-context.js';
import { writeTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

export type PreprocessorOptions = { -readonly [K in keyof ProcessingConfig]?: ProcessingConfig[K] };

/**
 * Join output lines, terminating each with a newline
 */
export function renderLines(lines: readonly string[]): string {
  return lines.map(line => `${line}\n`).join('');
}

export class ShellPreprocessor {
  constructor(private readonly options: PreprocessorOptions = {}) {}

  /**
   * Configuration for a run on `inputPath`; the base directory defaults to the input's directory
   */
  configFor(inputPath: string): ProcessingConfig {
    return createProcessingConfig({
      ...this.options,
      baseDirectory: this.options.baseDirectory ?? dirname(resolve(inputPath))
    });
  }

  /**
   * Expand every include reachable from `inputPath` and return the resulting text
   */
  process(inputPath: string): string {
    const config = this.configFor(inputPath);
    const input = canonicalize(resolve(inputPath));
    const context = new ProcessingContext(config);
    const engine = new ExpansionEngine(new PathResolver(config.baseDirectory));

    const lines = context.withFile(input, undefined, () => engine.expand(input, context));
    logger.debug(`Expanded ${input} into ${lines.length} lines`);
    return renderLines(lines);
  }

  /**
   * Process `inputPath` and write the result; nothing is written if expansion fails
   */
  async processFile(inputPath: string, outputPath: string): Promise<void> {
    const output = this.process(inputPath);
    await writeTextFile(outputPath, output);
    logger.info(`Preprocessed ${inputPath} -> ${outputPath}`);
  }
}

/**
 * Fluent construction of a {@link ShellPreprocessor}
 */
export class PreprocessorBuilder {
  private readonly options: PreprocessorOptions = {};

  debugMode(enabled: boolean): this {
    this.options.debug = enabled;
    return this;
  }

  maxIncludeDepth(depth: number): this {
    this.options.maxIncludeDepth = depth;
    return this;
  }

  baseDirectory(path: string): this {
    this.options.baseDirectory = path;
    return this;
  }

  build(): ShellPreprocessor {
    return new ShellPreprocessor({ ...this.options });
  }
}
