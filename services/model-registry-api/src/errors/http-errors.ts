/**
 * HTTP-aware error types.
 *
 * Anything thrown (or passed to `next`) from a route is rendered by the
 * ErrorHandler middleware; errors extending HttpError keep their status code
 * and message, everything else becomes a 500.
 */

export class HttpError extends Error {
  readonly statusCode: number;
  readonly headers: Record<string, string>;

  constructor(statusCode: number, message: string, headers: Record<string, string> = {}) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.headers = headers;
  }

  /**
   * Short reason phrase used as the `error` field of the response body
   */
  get reason(): string {
    return REASON_PHRASES[this.statusCode] ?? 'Error';
  }
}

const REASON_PHRASES: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  404: 'Not Found',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message: string = 'Incorrect username or password') {
    super(401, message, { 'WWW-Authenticate': 'Basic' });
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
  }
}

export class TooManyRequestsError extends HttpError {
  constructor(retryAfterSeconds: number) {
    super(429, 'Rate limit exceeded', { 'Retry-After': retryAfterSeconds.toString() });
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(message: string) {
    super(503, message);
  }
}

// Registry domain errors

export class ModelNotFoundError extends NotFoundError {
  constructor(message: string = 'Model not found') {
    super(message);
  }
}

export class InvalidModelIdError extends BadRequestError {
  constructor(modelId: string) {
    super(`Invalid model ID '${modelId}': expected a 24 character hex ObjectId`);
  }
}

export class ModelFileError extends BadRequestError {}

export class UserCommandError extends BadRequestError {}

/**
 * Extract error message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
