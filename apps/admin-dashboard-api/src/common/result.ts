import type { AdminError } from './errors/admin-error';

/**
 * Outcome of an operation that can fail in an expected way.
 * Callers must check `ok` before reading `value`.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: AdminError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(error: AdminError): Result<never> {
  return { ok: false, error };
}
