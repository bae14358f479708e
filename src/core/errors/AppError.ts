/**
 * HTTP-facing errors raised before a service runs (authentication,
 * identifier checks, request parsing). The web error middleware turns
 * them into envelopes; anything that is not an AppError becomes a 500.
 */
export type ErrorDetails = Record<string, string[]> | { detail: string };

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly details: ErrorDetails | null;

  constructor(message: string, statusCode: number, details: ErrorDetails | null = null) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(details: ErrorDetails) {
    super('Validation error', 400, details);
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends AppError {
  constructor() {
    super('Invalid API Key', 401, { detail: 'Invalid API Key' });
    this.name = 'AuthenticationError';
  }
}

export class MethodNotAllowedError extends AppError {
  constructor(method: string) {
    super(`Method "${method}" not allowed.`, 405, { detail: `Method "${method}" not allowed.` });
    this.name = 'MethodNotAllowedError';
  }
}
