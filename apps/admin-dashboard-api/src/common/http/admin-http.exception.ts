import { HttpException } from '@nestjs/common';
import type { AdminError } from '../errors/admin-error';
import type { Result } from '../result';

/** Carries an `AdminError` through Nest's exception layer to `HttpErrorFilter`. */
export class AdminHttpException extends HttpException {
  constructor(readonly error: AdminError) {
    super({ statusCode: error.statusCode, kind: error.kind, message: error.message }, error.statusCode, {
      cause: error.cause
    });
  }
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new AdminHttpException(result.error);
  }
  return result.value;
}
