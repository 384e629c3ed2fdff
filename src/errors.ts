/**
 * Structured error classes for the connection manager.
 *
 * Inside the core, expected failures travel as result values that carry one of
 * these errors. Only `ConfigError` is ever thrown at the caller.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  READ_FAULT: 'READ_FAULT',
  WRITE_FAILED: 'WRITE_FAILED',
  CANCELLED: 'CANCELLED',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class with code property.
 */
abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * A connection attempt failed while resolving, connecting or handshaking.
 */
export class ConnectionError extends BaseError {
  readonly code = 'CONNECTION_FAILED' as const;

  constructor(message = 'Connection failed', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * The connection broke while a read was outstanding.
 */
export class ReadFaultError extends BaseError {
  readonly code = 'READ_FAULT' as const;

  constructor(message = 'Read failed', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * A frame could not be written to the connection.
 */
export class WriteError extends BaseError {
  readonly code = 'WRITE_FAILED' as const;

  constructor(message = 'Write failed', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * An operation was cut short because the client closed the connection itself.
 */
export class CancelledError extends BaseError {
  readonly code = 'CANCELLED' as const;

  constructor(message = 'Operation cancelled') {
    super(message);
  }
}

/**
 * Thrown by the client constructor when the configuration is invalid.
 */
export class ConfigError extends BaseError {
  readonly code = 'INVALID_CONFIG' as const;

  constructor(message: string) {
    super(`Invalid configuration! ${message}`);
  }
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}

/**
 * Normalise a thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
