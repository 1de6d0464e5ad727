/**
 * overlay-spec Errors
 * Every fatal condition surfaces as an OverlayError; the CLI maps it to exit code 2
 */

export const FATAL_EXIT_CODE = 2;

export class OverlayError extends Error {
  readonly exitCode: number = FATAL_EXIT_CODE;

  constructor(message: string) {
    super(message);
    this.name = 'OverlayError';
  }
}

/**
 * Missing or malformed configuration
 */
export class ConfigError extends OverlayError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A git invocation exited non-zero
 */
export class GitCommandError extends OverlayError {
  readonly args: string[];
  readonly stderr: string;
  readonly code: number | null;

  constructor(message: string, args: string[], stderr: string, code: number | null) {
    super(stderr.trim() ? `${message}\n${stderr.trimEnd()}` : message);
    this.name = 'GitCommandError';
    this.args = args;
    this.stderr = stderr;
    this.code = code;
  }
}

/**
 * Explicitly selected paths that cannot be honoured
 */
export class SelectionError extends OverlayError {
  readonly paths: string[];

  constructor(message: string, paths: string[] = []) {
    super(message);
    this.name = 'SelectionError';
    this.paths = paths;
  }
}

export function isOverlayError(error: unknown): error is OverlayError {
  return error instanceof OverlayError;
}
