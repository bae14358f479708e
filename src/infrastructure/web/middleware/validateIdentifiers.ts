import { NextFunction, Request, RequestHandler, Response } from 'express';
import { ValidationError } from '../../../core/errors/AppError.js';
import { isUuid } from '../../../application/validation/schemas.js';

/**
 * Checks that the named route parameters are UUIDs and lower-cases them
 * before any handler looks them up.
 */
export function validateIdentifiers(...params: string[]): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    for (const param of params) {
      const value = req.params[param] ?? '';
      if (!isUuid(value)) {
        next(new ValidationError({ [param]: [`Invalid UUID format: '${value}'`] }));
        return;
      }
      req.params[param] = value.toLowerCase();
    }
    next();
  };
}
