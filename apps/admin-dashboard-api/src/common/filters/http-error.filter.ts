import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import { JsonLogger } from '../../logging/json-logger.service';
import { AdminHttpException } from '../http/admin-http.exception';
import { ERROR_KINDS, ErrorKind } from '../http/error-kinds';
import type { ErrorResponseBody } from '../http/error-response';
import { safePath, TracedRequest } from '../request/traced-request';

/** Kind for exceptions raised by the framework itself (routing, body parsing). */
export function kindForStatus(statusCode: number): ErrorKind {
  if (statusCode === HttpStatus.NOT_FOUND) return ERROR_KINDS.NOT_FOUND;
  if (statusCode === HttpStatus.UNAUTHORIZED) return ERROR_KINDS.UNAUTHENTICATED;
  if (statusCode === HttpStatus.FORBIDDEN) return ERROR_KINDS.FORBIDDEN;
  if (statusCode === HttpStatus.CONFLICT) return ERROR_KINDS.CONFLICT;
  if (statusCode === HttpStatus.SERVICE_UNAVAILABLE) return ERROR_KINDS.SERVICE_UNAVAILABLE;
  if (statusCode >= 500) return ERROR_KINDS.INTERNAL;
  return ERROR_KINDS.INVALID_ARGUMENT;
}

// Framework messages can echo parser internals; clients get a fixed text per status.
function safeMessageForStatus(statusCode: number): string {
  if (statusCode === HttpStatus.NOT_FOUND) return 'Not Found';
  if (statusCode === HttpStatus.PAYLOAD_TOO_LARGE) return 'Payload Too Large';
  if (statusCode < 500) return 'Bad Request';
  if (statusCode === HttpStatus.SERVICE_UNAVAILABLE) return 'Service Unavailable';
  return 'Internal Server Error';
}

/**
 * Turns every exception into an `ErrorResponseBody`.
 * 5xx are logged as errors with the stack, 4xx as warnings.
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  constructor(private readonly logger: JsonLogger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<TracedRequest>();
    const response = ctx.getResponse<Response>();

    const statusCode = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;

    let kind: ErrorKind;
    let message: string;
    if (exception instanceof AdminHttpException) {
      kind = exception.error.kind;
      message = exception.error.message;
    } else {
      kind = kindForStatus(statusCode);
      message = safeMessageForStatus(statusCode);
    }

    const path = safePath(request);
    const meta: Record<string, unknown> = {
      requestId: request.requestId,
      method: request.method,
      path,
      statusCode,
      kind
    };

    if (exception instanceof AdminHttpException && exception.error.upstreamStatus !== undefined) {
      meta.upstreamStatus = exception.error.upstreamStatus;
    }

    if (exception instanceof Error) {
      meta.errorName = exception.name;
      meta.errorMessage = exception.message;
      if (statusCode >= 500) meta.stack = exception.stack;
    } else {
      meta.error = String(exception);
    }

    if (statusCode >= 500) {
      this.logger.error('Request failed', meta);
    } else {
      this.logger.warn('Request rejected', meta);
    }

    const body: ErrorResponseBody = {
      statusCode,
      kind,
      message,
      timestamp: new Date().toISOString(),
      path,
      requestId: request.requestId
    };

    response.status(statusCode).json(body);
  }
}
