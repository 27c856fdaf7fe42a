/**
 * Error types surfaced by tracehound.
 *
 * Line, timestamp and byte-count problems are recovered where they occur
 * and never become errors. Only file access and configuration problems
 * reach the caller.
 */

export type TracehoundErrorCode =
  | 'NOT_FOUND'
  | 'READ_FAILED'
  | 'CONFIG_READ_FAILED'
  | 'CONFIG_INVALID';

export class TracehoundError extends Error {
  constructor(
    message: string,
    public readonly code: TracehoundErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TracehoundError';
  }
}

export class LogSourceError extends TracehoundError {
  constructor(
    message: string,
    code: 'NOT_FOUND' | 'READ_FAILED',
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = 'LogSourceError';
  }
}

export class ConfigError extends TracehoundError {
  constructor(
    message: string,
    code: 'CONFIG_READ_FAILED' | 'CONFIG_INVALID',
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = 'ConfigError';
  }
}

/**
 * Render any thrown value as a one-line message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
