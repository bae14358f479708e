import { Response } from 'express';
import { ErrorDetails } from '../../core/errors/AppError.js';
import { ServiceError, ServiceResult } from '../../core/entities/Result.js';

export const STATUS_MESSAGES: Readonly<Record<number, string>> = {
  400: 'Validation error',
  401: 'Authentication failed',
  403: 'Permission denied',
  404: 'Resource not found',
  405: 'Method not allowed',
  500: 'Internal server error',
};

export const FALLBACK_ERROR_MESSAGE = 'An error occurred';

export const UNEXPECTED_ERROR_DETAIL = 'An unexpected error occurred. Please try again later.';

export interface SuccessEnvelope<T> {
  code: number;
  message: string;
  data: T;
}

export interface ErrorEnvelope {
  code: number;
  message: string;
  errors: ErrorDetails | null;
}

export function statusMessage(status: number): string {
  return STATUS_MESSAGES[status] ?? FALLBACK_ERROR_MESSAGE;
}

export function successEnvelope<T>(status: number, message: string, data: T): SuccessEnvelope<T> {
  return { code: status, message, data };
}

export function errorEnvelope(status: number, errors: ErrorDetails | null): ErrorEnvelope {
  return { code: status, message: statusMessage(status), errors };
}

export function sendSuccess<T>(res: Response, status: number, message: string, data: T): void {
  res.status(status).json(successEnvelope(status, message, data));
}

export function sendError(res: Response, status: number, errors: ErrorDetails | null): void {
  res.status(status).json(errorEnvelope(status, errors));
}

export function serviceErrorStatus(error: ServiceError): number {
  return error.kind === 'validation' ? 400 : 404;
}

export function serviceErrorDetails(error: ServiceError): ErrorDetails {
  if (error.kind === 'validation') {
    return error.details;
  }
  const resource = error.resource === 'conversation' ? 'Conversation' : 'Message';
  return { detail: `${resource} ${error.id} not found` };
}

/**
 * Sends a service outcome: the mapped value on success, the matching
 * 400/404 envelope otherwise.
 */
export function sendResult<T, V>(
  res: Response,
  result: ServiceResult<T>,
  success: { status: number; message: string; view: (value: T) => V }
): void {
  if (result.ok) {
    sendSuccess(res, success.status, success.message, success.view(result.value));
    return;
  }
  sendError(res, serviceErrorStatus(result.error), serviceErrorDetails(result.error));
}
