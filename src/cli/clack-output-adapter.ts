/**
 * Clack Output Adapter
 *
 * OutputPort implementations for the CLI: @clack/prompts for interactive
 * terminals, plain console for everything else.
 */

import { log } from '@clack/prompts';
import type { OutputPort } from '../core/ports/output.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    success(message: string): void {
      log.success(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    error(message: string): void {
      log.error(message);
    }
  };
}

/**
 * Create a plain console OutputPort for non-interactive sessions (CI, piped output).
 * Everything goes to stderr so stdout stays clean.
 */
export function createPlainOutput(): OutputPort {
  return {
    info(message: string): void {
      console.error(message);
    },

    success(message: string): void {
      console.error(`✓ ${message}`);
    },

    warn(message: string): void {
      console.error(`⚠️  ${message}`);
    },

    error(message: string): void {
      console.error(message);
    }
  };
}

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stderr.isTTY === true && process.env.CI !== 'true';
}

export function createCliOutput(interactive?: boolean): OutputPort {
  return detectInteractive(interactive) ? createClackOutput() : createPlainOutput();
}
