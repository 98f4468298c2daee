/**
 * Processing Context
 *
 * Ledger of the files currently open on the include chain. The set and the
 * stack always hold the same paths; depth is the stack length and the
 * top-level input sits at depth 1.
 */

import type { IncludeLocation, ProcessingConfig } from '../types/index.js';
import { CircularDependencyError, MaxDepthExceededError } from '../utils/errors.js';

export class ProcessingContext {
  private readonly openFiles = new Set<string>();
  private readonly includeStack: string[] = [];

  constructor(readonly config: ProcessingConfig) {}

  get depth(): number {
    return this.includeStack.length;
  }

  /** Snapshot of the include chain, outermost first */
  get stack(): string[] {
    return [...this.includeStack];
  }

  has(path: string): boolean {
    return this.openFiles.has(path);
  }

  /**
   * Push a canonical path onto the include chain
   */
  enter(path: string, location?: IncludeLocation): void {
    if (this.openFiles.has(path)) {
      throw new CircularDependencyError([...this.includeStack, path], location);
    }
    if (this.includeStack.length + 1 > this.config.maxIncludeDepth) {
      throw new MaxDepthExceededError(path, this.config.maxIncludeDepth, location);
    }
    this.openFiles.add(path);
    this.includeStack.push(path);
  }

  /**
   * Pop the innermost file off the include chain; every call must match an earlier `enter`
   */
  leave(): void {
    const path = this.includeStack.pop();
    if (path === undefined) {
      throw new Error('ProcessingContext.leave() called with no file on the include chain');
    }
    this.openFiles.delete(path);
  }

  /**
   * Run `fn` with `path` entered, leaving again however `fn` exits
   */
  withFile<T>(path: string, location: IncludeLocation | undefined, fn: () => T): T {
    this.enter(path, location);
    try {
      return fn();
    } finally {
      this.leave();
    }
  }
}
