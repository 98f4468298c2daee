/**
 * Output Port Interface
 *
 * User-facing messages of the command layer go through this interface
 * instead of console.log or @clack/prompts directly.
 *
 * Implementations:
 *   - Clack adapter (interactive terminal): routes to @clack/prompts
 *   - Plain adapter (CI, piped output): routes to console
 */
export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Display an error message */
  error(message: string): void;
}
