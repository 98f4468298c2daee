/**
 * Include Directive Parser
 *
 * Recognizes `#include` lines in shell-script-like text. Four argument
 * forms are accepted, tried in this order:
 * - `#include <lib/path.sh>`
 * - `#include "lib/path.sh"`
 * - `#include 'lib/path.sh'`
 * - `#include lib/path.sh` (the trimmed remainder of the line)
 */

import type { IncludeDirective, IncludeQuoteStyle } from '../types/index.js';
import { DIRECTIVE, QUOTE_DELIMITERS } from '../constants/index.js';
import { InvalidIncludeDirectiveError } from '../utils/errors.js';

interface ExtractedPath {
  rawPath: string;
  quoteStyle: IncludeQuoteStyle;
}

/**
 * Split file content into lines.
 * A trailing newline does not yield an extra empty line; `\r` is left on its line.
 */
export function splitLines(content: string): string[] {
  if (content === '') {
    return [];
  }
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Pull the path out of the text following `#include`.
 * Returns null when a delimiter is left open, the path is empty,
 * or text follows the closing delimiter.
 */
function extractPath(argument: string): ExtractedPath | null {
  for (const { open, close, style } of QUOTE_DELIMITERS) {
    if (!argument.startsWith(open)) {
      continue;
    }
    const closeIndex = argument.indexOf(close, open.length);
    if (closeIndex === -1 || closeIndex !== argument.length - close.length) {
      return null;
    }
    const rawPath = argument.slice(open.length, closeIndex);
    return rawPath ? { rawPath, quoteStyle: style } : null;
  }

  return { rawPath: argument, quoteStyle: 'none' };
}

/**
 * Parses a single line for an include directive
 *
 * @returns the directive, or null when the line is ordinary text
 * @throws InvalidIncludeDirectiveError when the line is a malformed directive
 */
export function parseIncludeLine(line: string, lineNumber: number, sourceFile: string): IncludeDirective | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(DIRECTIVE.KEYWORD)) {
    return null;
  }

  // `#include_guard` and friends are not directives
  const rest = trimmed.slice(DIRECTIVE.KEYWORD.length);
  if (rest.length > 0 && !/^\s/.test(rest)) {
    return null;
  }

  const extracted = extractPath(rest.trim());
  if (!extracted || !extracted.rawPath) {
    throw new InvalidIncludeDirectiveError(trimmed, { sourceFile, lineNumber });
  }

  return {
    lineNumber,
    rawPath: extracted.rawPath,
    quoteStyle: extracted.quoteStyle,
    sourceFile
  };
}

/**
 * Parses content for all include directives, in line order
 */
export function parseIncludes(content: string, sourceFile: string): IncludeDirective[] {
  const directives: IncludeDirective[] = [];
  splitLines(content).forEach((line, index) => {
    const directive = parseIncludeLine(line, index + 1, sourceFile);
    if (directive) {
      directives.push(directive);
    }
  });
  return directives;
}
