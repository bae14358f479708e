import { createHash, timingSafeEqual } from 'crypto';
import { NextFunction, Request, RequestHandler, Response } from 'express';
import { AuthenticationError } from '../../../core/errors/AppError.js';

export const API_KEY_HEADER = 'X-API-Key';

/**
 * Compares fixed-length digests so the comparison time does not depend on
 * the supplied value.
 */
export function safeCompare(a: string, b: string): boolean {
  const hashA = createHash('sha256').update(a, 'utf8').digest();
  const hashB = createHash('sha256').update(b, 'utf8').digest();
  return timingSafeEqual(hashA, hashB);
}

/**
 * Rejects the request with 401 unless the `X-API-Key` header matches the
 * configured key. Mount it only on routes that mutate state.
 */
export function requireApiKey(apiKey: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const supplied = req.get(API_KEY_HEADER);
    if (supplied === undefined || !safeCompare(supplied, apiKey)) {
      next(new AuthenticationError());
      return;
    }
    next();
  };
}
