/**
 * Custom Error Classes
 *
 * Standardized error types for better error handling and debugging.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * Error for missing or malformed configuration
 */
export class ConfigError extends AppError {
  constructor(message: string, public variables: string[]) {
    super(message, 'CONFIG_ERROR', 500);
  }
}

/**
 * Error for scores API failures: unreachable host, non-2xx status or a body
 * that does not decode as a list of games.
 *
 * `url` never carries the API key.
 */
export class FetchError extends AppError {
  constructor(
    message: string,
    public url: string,
    public status: number,
    cause?: Error
  ) {
    super(message, 'FETCH_ERROR', 500, cause);
  }
}

/**
 * Error for pub/sub transport failures
 */
export class PublishError extends AppError {
  constructor(message: string, public topic: string, cause?: Error) {
    super(message, 'PUBLISH_ERROR', 500, cause);
  }
}

/**
 * Normalizes a caught value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
