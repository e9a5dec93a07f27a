/**
 * Error types for the BatchRouter client.
 *
 * Errors reported by the API share the {@link BatchRouterError} base and carry
 * the HTTP status they were raised for. Transport failures extend the same base
 * without a status. Problems detected locally before a request is sent, and
 * undecodable success bodies, use their own classes.
 */

/**
 * Base error for everything the API (or the connection to it) reports.
 */
export class BatchRouterError extends Error {
  /** HTTP status code, when the error came from a response. */
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'BatchRouterError';
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Converts to JSON.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Invalid or missing API key (401).
 */
export class AuthenticationError extends BatchRouterError {
  constructor(message = 'Invalid or missing API key') {
    super(message, 401);
    this.name = 'AuthenticationError';
  }
}

/**
 * Requested resource does not exist (404).
 */
export class NotFoundError extends BatchRouterError {
  constructor(message = 'Resource not found') {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Request rejected by server-side validation (422).
 */
export class ValidationError extends BatchRouterError {
  constructor(message = 'Validation failed') {
    super(message, 422);
    this.name = 'ValidationError';
  }
}

/**
 * Server-side failure (5xx). Keeps the actual status it was raised for.
 */
export class ServerError extends BatchRouterError {
  constructor(message = 'Server error', statusCode = 500) {
    super(message, statusCode);
    this.name = 'ServerError';
  }
}

/**
 * The request never produced a response.
 */
export class NetworkError extends BatchRouterError {
  /** Underlying transport error. */
  readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'NetworkError';
    this.cause = cause;
  }
}

/**
 * The request exceeded the configured timeout.
 */
export class TimeoutError extends NetworkError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'TimeoutError';
  }
}

/**
 * Invalid client configuration (base URL, timeout).
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * An argument was rejected before any request was issued.
 */
export class InvalidArgumentError extends Error {
  /** Name of the offending parameter. */
  readonly param?: string;

  constructor(message: string, param?: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.param = param;
  }
}

/**
 * A successful response body could not be decoded into the expected shape.
 */
export class ResponseDecodeError extends Error {
  /** Individual problems, as `path: message` strings. */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join(', ')}` : message);
    this.name = 'ResponseDecodeError';
    this.issues = issues;
  }
}

/**
 * Type guard for BatchRouterError.
 */
export function isBatchRouterError(error: unknown): error is BatchRouterError {
  return error instanceof BatchRouterError;
}

/**
 * Server failures and lost connections are worth another attempt.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof ServerError || error instanceof NetworkError;
}

/**
 * Selects the error kind for a non-success status.
 */
export function errorFromStatus(status: number, message: string): BatchRouterError {
  switch (status) {
    case 401:
      return new AuthenticationError(message);
    case 404:
      return new NotFoundError(message);
    case 422:
      return new ValidationError(message);
    default:
      if (status >= 500) {
        return new ServerError(message, status);
      }
      return new BatchRouterError(message, status);
  }
}

/**
 * Extracts a human-readable message from an error response body.
 *
 * Prefers the `detail` field of a JSON object, then the raw text, then
 * `HTTP <status>`.
 */
export function extractErrorMessage(status: number, body: Buffer): string {
  const text = body.toString('utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text || `HTTP ${status}`;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return text || `HTTP ${status}`;
  }

  if (!('detail' in parsed)) {
    return JSON.stringify(parsed);
  }

  const { detail } = parsed;
  return typeof detail === 'string' ? detail : JSON.stringify(detail);
}

/**
 * Builds the error for a non-success response.
 */
export function fromResponse(status: number, body: Buffer): BatchRouterError {
  return errorFromStatus(status, extractErrorMessage(status, body));
}
