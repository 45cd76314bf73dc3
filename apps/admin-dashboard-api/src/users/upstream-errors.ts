import { HttpStatus } from '@nestjs/common';
import { AdminError, invalidArgument, notFound, serviceUnavailable } from '../common/errors/admin-error';
import { ERROR_KINDS } from '../common/http/error-kinds';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): { parsed: unknown } | undefined {
  try {
    return { parsed: JSON.parse(text) };
  } catch {
    return undefined;
  }
}

/**
 * The auth module reports errors as JSON `{detail}`; `{message}` is accepted
 * too. A body that is not JSON is used as plain text.
 */
export function upstreamMessage(body: string | undefined): string | undefined {
  if (body === undefined) return undefined;
  const json = parseJson(body);
  if (json === undefined) {
    const text = body.trim();
    return text.length > 0 ? text : undefined;
  }
  const { parsed } = json;
  if (!isRecord(parsed)) return undefined;
  if (typeof parsed.detail === 'string') return parsed.detail;
  if (typeof parsed.message === 'string') return parsed.message;
  return undefined;
}

/**
 * Maps a non-2xx auth module reply onto an `AdminError` that keeps its meaning:
 * client errors keep their status, server errors become 503.
 */
export function errorForUpstream(status: number, body: string | undefined, fallback: string): AdminError {
  const message = upstreamMessage(body) ?? fallback;

  if (status === HttpStatus.NOT_FOUND) return notFound(message, status);
  if (status === HttpStatus.UNAUTHORIZED) {
    return { kind: ERROR_KINDS.UNAUTHENTICATED, statusCode: status, message, upstreamStatus: status };
  }
  if (status === HttpStatus.FORBIDDEN) {
    return { kind: ERROR_KINDS.FORBIDDEN, statusCode: status, message, upstreamStatus: status };
  }
  if (status === HttpStatus.CONFLICT) {
    return { kind: ERROR_KINDS.CONFLICT, statusCode: status, message, upstreamStatus: status };
  }
  if (status >= 400 && status < 500) return invalidArgument(message, status);

  // 5xx and anything unexpected (1xx/3xx) mean the auth module could not serve the call.
  return serviceUnavailable(`Auth module error: ${message}`, { upstreamStatus: status });
}
