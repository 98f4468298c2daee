/**
 * Expansion Engine
 *
 * Depth-first, line-order expansion of the include tree. Each directive
 * line is replaced by the full expansion of the file it names. The first
 * failure anywhere aborts the whole run.
 */

import { PreprocessorError } from '../types/index.js';
import { DEBUG_MARKERS } from '../constants/index.js';
import { parseIncludeLine, splitLines } from './directive-parser.js';
import { PathResolver, readSourceFile } from './path-resolver.js';
import { ProcessingContext } from './processing-context.js';
import { logger } from '../utils/logger.js';

export class ExpansionEngine {
  constructor(private readonly resolver: PathResolver) {}

  /**
   * Expand the file at `path`, which the caller has already entered on `context`
   */
  expand(path: string, context: ProcessingContext): string[] {
    logger.debug(`Expanding ${path} (depth ${context.depth})`);

    try {
      const lines = splitLines(readSourceFile(path));
      const output: string[] = [];

      lines.forEach((line, index) => {
        const directive = parseIncludeLine(line, index + 1, path);
        if (!directive) {
          output.push(line);
          return;
        }

        const target = this.resolver.resolve(directive);
        const location = { sourceFile: path, lineNumber: directive.lineNumber };
        const included = context.withFile(target, location, () => this.expand(target, context));

        if (context.config.debug) {
          output.push(DEBUG_MARKERS.begin(directive.rawPath));
        }
        for (const includedLine of included) {
          output.push(includedLine);
        }
        if (context.config.debug) {
          output.push(DEBUG_MARKERS.end(directive.rawPath));
        }
      });

      return output;
    } catch (error) {
      if (error instanceof PreprocessorError) {
        error.attachIncludeStack(context.stack);
      }
      throw error;
    }
  }
}
