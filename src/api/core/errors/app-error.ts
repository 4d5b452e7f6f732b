/**
 * Base class for application errors
 */
export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public code: string = "APP_ERROR",
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Blank or missing search term
 */
export class InvalidQueryError extends AppError {
  constructor(message: string = "Model query cannot be empty.") {
    super(400, message, "INVALID_QUERY");
  }
}

/**
 * Malformed request parameter (limit and the like)
 */
export class InvalidParameterError extends AppError {
  constructor(message: string = "Invalid parameter") {
    super(400, message, "INVALID_PARAMETER");
  }
}

/**
 * Catalog store unreachable or timed out. Not retried: the caller decides.
 */
export class StoreUnavailableError extends AppError {
  constructor(message: string = "Catalog store is unavailable", public cause?: unknown) {
    super(503, message, "STORE_UNAVAILABLE");
  }
}

/**
 * Client went away before the response was ready
 */
export class RequestAbortedError extends AppError {
  constructor(message: string = "Request aborted") {
    super(499, message, "REQUEST_ABORTED");
  }
}
