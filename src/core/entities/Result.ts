/**
 * Outcome of a service operation. Validation and not-found are expected
 * outcomes and travel as values; anything thrown is unexpected.
 */
export type ValidationDetails = Record<string, string[]>;

export type ServiceError =
  | { kind: 'validation'; details: ValidationDetails }
  | { kind: 'not_found'; resource: 'conversation' | 'message'; id: string };

export type ServiceResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ServiceError };

export function ok<T>(value: T): ServiceResult<T> {
  return { ok: true, value };
}

export function invalid<T>(details: ValidationDetails): ServiceResult<T> {
  return { ok: false, error: { kind: 'validation', details } };
}

export function notFound<T>(resource: 'conversation' | 'message', id: string): ServiceResult<T> {
  return { ok: false, error: { kind: 'not_found', resource, id } };
}
