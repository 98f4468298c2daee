/**
 * Path Resolver
 *
 * Maps the raw path of an include directive to a canonical file path
 * confined to the sandbox root:
 * - absolute paths are rooted at the base directory, not the filesystem root
 * - relative paths resolve against the directory of the including file
 *
 * Canonical paths have symlinks and `.`/`..` segments resolved, so they
 * can be compared directly for cycle detection.
 */

import { accessSync, constants as fsConstants, readFileSync, realpathSync, statSync } from 'fs';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import type { IncludeDirective, IncludeLocation } from '../types/index.js';
import { FileNotFoundError, toFileSystemError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Canonicalize a path, mapping failures to the preprocessor error taxonomy
 */
export function canonicalize(path: string, location?: IncludeLocation): string {
  try {
    return realpathSync(path);
  } catch (error) {
    throw toFileSystemError(error, path, location);
  }
}

/**
 * Read a source file as text
 */
export function readSourceFile(path: string, location?: IncludeLocation): string {
  try {
    return readFileSync(path, 'utf8');
  } catch (error) {
    throw toFileSystemError(error, path, location);
  }
}

/**
 * Whether `candidate` is `root` or lies below it
 */
export function isWithinRoot(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

/**
 * The filesystem calls the resolver makes; each throws the underlying errno error on failure
 */
export interface ResolverFileSystem {
  realpath(path: string): string;
  isFile(path: string): boolean;
  assertReadable(path: string): void;
}

export const nodeResolverFileSystem: ResolverFileSystem = {
  realpath: path => realpathSync(path),
  isFile: path => statSync(path).isFile(),
  assertReadable: path => accessSync(path, fsConstants.R_OK)
};

export class PathResolver {
  /** Canonical sandbox root */
  readonly root: string;

  constructor(baseDirectory: string, private readonly fs: ResolverFileSystem = nodeResolverFileSystem) {
    this.root = this.canonical(resolve(baseDirectory));
  }

  private canonical(path: string, location?: IncludeLocation): string {
    try {
      return this.fs.realpath(path);
    } catch (error) {
      throw toFileSystemError(error, path, location);
    }
  }

  /**
   * Resolve an include directive to the canonical path of a readable file
   */
  resolve(directive: IncludeDirective): string {
    const location: IncludeLocation = { sourceFile: directive.sourceFile, lineNumber: directive.lineNumber };
    const { rawPath } = directive;

    const candidate = isAbsolute(rawPath)
      ? join(this.root, rawPath)
      : resolve(dirname(directive.sourceFile), rawPath);

    // Escapes are reported with the raw path so nothing outside the root is revealed
    if (!isWithinRoot(this.root, candidate)) {
      logger.debug(`Include escapes sandbox root: ${rawPath}`, { root: this.root, ...location });
      throw new FileNotFoundError(rawPath, location);
    }

    const canonical = this.canonical(candidate, location);
    if (!isWithinRoot(this.root, canonical)) {
      logger.debug(`Include resolves outside sandbox root through a symlink: ${rawPath}`, { root: this.root, ...location });
      throw new FileNotFoundError(rawPath, location);
    }

    try {
      if (!this.fs.isFile(canonical)) {
        throw new FileNotFoundError(candidate, location);
      }
      this.fs.assertReadable(canonical);
    } catch (error) {
      throw toFileSystemError(error, candidate, location);
    }

    logger.debug(`Resolved include ${rawPath} -> ${canonical}`);
    return canonical;
  }
}
