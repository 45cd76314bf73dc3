import { BadRequestException, NotFoundException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { notFound, serviceUnavailable } from '../../src/common/errors/admin-error';
import { HttpErrorFilter, kindForStatus } from '../../src/common/filters/http-error.filter';
import { AdminHttpException } from '../../src/common/http/admin-http.exception';
import { JsonLogger } from '../../src/logging/json-logger.service';

function setup() {
  const logger = new JsonLogger('test');
  const error = jest.spyOn(logger, 'error').mockImplementation(() => undefined);
  const warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);

  const request = { method: 'GET', originalUrl: '/api/users/alice@example.com?token=test-secret', requestId: 'req-1' };
  const response = { status: jest.fn().mockReturnThis(), json: jest.fn() };
  const host = new ExecutionContextHost([request, response]);

  return { filter: new HttpErrorFilter(logger), error, warn, response, host };
}

describe('HttpErrorFilter', () => {
  it('writes the kind and message of an AdminHttpException', () => {
    const { filter, warn, response, host } = setup();

    filter.catch(new AdminHttpException(notFound('User not found', 404)), host);

    expect(response.status).toHaveBeenCalledWith(404);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 404,
      kind: 'NOT_FOUND',
      message: 'User not found',
      timestamp: expect.any(String),
      path: '/api/users/alice@example.com',
      requestId: 'req-1'
    });
    expect(warn).toHaveBeenCalledWith('Request rejected', expect.objectContaining({ upstreamStatus: 404 }));
  });

  it('logs a 503 as an error', () => {
    const { filter, error, response, host } = setup();

    filter.catch(new AdminHttpException(serviceUnavailable('Auth module unavailable: ECONNREFUSED')), host);

    expect(response.status).toHaveBeenCalledWith(503);
    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({ kind: 'SERVICE_UNAVAILABLE', message: 'Auth module unavailable: ECONNREFUSED' })
    );
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('hides framework messages behind a fixed text', () => {
    const { filter, response, host } = setup();

    filter.catch(new BadRequestException('Unexpected token } in JSON at position 12'), host);

    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 400, kind: 'INVALID_ARGUMENT', message: 'Bad Request' })
    );
  });

  it('maps unmatched routes to NOT_FOUND', () => {
    const { filter, response, host } = setup();

    filter.catch(new NotFoundException('Cannot GET /nowhere'), host);

    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 404, kind: 'NOT_FOUND', message: 'Not Found' })
    );
  });

  it('reports unknown errors as INTERNAL and logs the stack', () => {
    const { filter, error, response, host } = setup();

    filter.catch(new Error('boom'), host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({ kind: 'INTERNAL', message: 'Internal Server Error' })
    );
    expect(error).toHaveBeenCalledWith('Request failed', expect.objectContaining({ errorMessage: 'boom', stack: expect.any(String) }));
  });
});

describe('kindForStatus', () => {
  it.each([
    [400, 'INVALID_ARGUMENT'],
    [401, 'UNAUTHENTICATED'],
    [403, 'FORBIDDEN'],
    [404, 'NOT_FOUND'],
    [409, 'CONFLICT'],
    [413, 'INVALID_ARGUMENT'],
    [500, 'INTERNAL'],
    [503, 'SERVICE_UNAVAILABLE']
  ])('maps %d to %s', (status, kind) => {
    expect(kindForStatus(status)).toBe(kind);
  });
});
