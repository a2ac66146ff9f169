/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of errors:
 *
 *   1. Operational errors — expected problems like an upstream request that
 *      failed or a bad query parameter. They carry a proper HTTP status and a
 *      message that can be shown to the caller.
 *
 *   2. Programmer errors — bugs or a broken configuration (e.g. an unknown
 *      multi-value policy name). These get a generic 500 over HTTP.
 *
 * The `isOperational` flag distinguishes the two; errorHandler.ts checks it.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses under every compilation target.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/**
 * A live request to the API failed: network error, non-2xx status,
 * unparseable body, or an empty body. Never retried automatically.
 */
export class FetchFailure extends AppError {
  public readonly url: string;
  public readonly cause?: unknown;

  constructor(url: string, reason: string, cause?: unknown) {
    super(`Request failed with URL: ${url} (${reason})`, 502);
    this.url = url;
    this.cause = cause;
  }
}

/** A cache entry could not be read or parsed. Always recovered as a cache miss. */
export class CacheReadFailure extends AppError {
  public readonly fileName: string;

  constructor(fileName: string, reason: string) {
    super(`Cache entry unreadable: ${fileName} (${reason})`, 500);
    this.fileName = fileName;
  }
}

/** Invalid configuration, e.g. an unknown multi-value policy name. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, false);
  }
}
