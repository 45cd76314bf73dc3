import { HttpStatus } from '@nestjs/common';
import { ERROR_KINDS, ErrorKind } from '../http/error-kinds';

/** A failure this service reports to its callers. */
export interface AdminError {
  kind: ErrorKind;
  /** HTTP status the failure is reported with */
  statusCode: number;
  message: string;
  /** Status returned by the auth module, when the failure came from there */
  upstreamStatus?: number;
  cause?: unknown;
}

export function invalidArgument(message: string, upstreamStatus?: number): AdminError {
  return {
    kind: ERROR_KINDS.INVALID_ARGUMENT,
    statusCode: upstreamStatus ?? HttpStatus.BAD_REQUEST,
    message,
    upstreamStatus
  };
}

export function notFound(message: string, upstreamStatus?: number): AdminError {
  return { kind: ERROR_KINDS.NOT_FOUND, statusCode: HttpStatus.NOT_FOUND, message, upstreamStatus };
}

export function serviceUnavailable(message: string, details: { upstreamStatus?: number; cause?: unknown } = {}): AdminError {
  return {
    kind: ERROR_KINDS.SERVICE_UNAVAILABLE,
    statusCode: HttpStatus.SERVICE_UNAVAILABLE,
    message,
    ...details
  };
}
