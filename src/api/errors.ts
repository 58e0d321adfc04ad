/**
 * Error types for the cache manager.
 *
 * Every failure surfaced to callers is a HubCacheError carrying a stable
 * string code, so the CLI can print a diagnostic and pick an exit code
 * without inspecting messages.
 */

export type HubCacheErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'NOT_FOUND'
  | 'TRANSFER_ERROR'
  | 'VALIDATION_ERROR'
  | 'UNKNOWN_ERROR';

/**
 * Base error class
 */
export class HubCacheError extends Error {
  public readonly code: HubCacheErrorCode;
  public readonly context: Record<string, unknown>;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: HubCacheErrorCode = 'UNKNOWN_ERROR',
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'HubCacheError';
    this.code = code;
    this.context = context || {};
    this.cause = cause;
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        context: this.context,
      },
    };
  }
}

/**
 * Cache root (or configuration file) cannot be resolved. Fatal.
 */
export class ConfigurationError extends HubCacheError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', context, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * A manifest or directory argument does not exist
 */
export class NotFoundError extends HubCacheError {
  constructor(message: string, public readonly path: string) {
    super(message, 'NOT_FOUND', { path });
    this.name = 'NotFoundError';
  }
}

/**
 * The fetch capability failed for one artifact
 */
export class TransferError extends HubCacheError {
  constructor(message: string, public readonly artifactId: string, cause?: Error) {
    super(message, 'TRANSFER_ERROR', { artifactId }, cause);
    this.name = 'TransferError';
  }
}

/**
 * Rejected token or invalid configuration values
 */
export class ValidationError extends HubCacheError {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }> = [],
    cause?: Error
  ) {
    super(message, 'VALIDATION_ERROR', { issues }, cause);
    this.name = 'ValidationError';
  }
}

export function isHubCacheError(error: unknown): error is HubCacheError {
  return error instanceof HubCacheError;
}

/**
 * Wrap unknown error as HubCacheError
 */
export function wrapError(error: unknown, message?: string): HubCacheError {
  if (isHubCacheError(error)) {
    return error;
  }

  const errorMessage = message || (error instanceof Error ? error.message : String(error));
  const cause = error instanceof Error ? error : undefined;

  return new HubCacheError(errorMessage, 'UNKNOWN_ERROR', {}, cause);
}

/**
 * Narrow a thrown value to a Node.js errno error with the given code
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
