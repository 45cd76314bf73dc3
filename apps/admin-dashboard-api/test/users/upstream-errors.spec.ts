import { errorForUpstream, upstreamMessage } from '../../src/users/upstream-errors';

describe('upstreamMessage', () => {
  it('prefers a plain-text body', () => {
    expect(upstreamMessage('  upstream exploded  ')).toBe('upstream exploded');
  });

  it('reads detail, then message, from a JSON body', () => {
    expect(upstreamMessage('{"detail":"User not found","message":"ignored"}')).toBe('User not found');
    expect(upstreamMessage('{"message":"Email taken"}')).toBe('Email taken');
  });

  it('ignores structured detail and non-object JSON', () => {
    expect(upstreamMessage('{"detail":[{"loc":["body","email"],"msg":"field required"}]}')).toBeUndefined();
    expect(upstreamMessage('["a"]')).toBeUndefined();
    expect(upstreamMessage('')).toBeUndefined();
    expect(upstreamMessage(undefined)).toBeUndefined();
  });
});

describe('errorForUpstream', () => {
  it('maps 404 to NOT_FOUND', () => {
    expect(errorForUpstream(404, '{"detail":"User not found"}', 'Delete failed')).toEqual({
      kind: 'NOT_FOUND',
      statusCode: 404,
      message: 'User not found',
      upstreamStatus: 404
    });
  });

  it('keeps the status of validation errors', () => {
    expect(errorForUpstream(422, '{"detail":[{"msg":"field required"}]}', 'Update failed')).toEqual({
      kind: 'INVALID_ARGUMENT',
      statusCode: 422,
      message: 'Update failed',
      upstreamStatus: 422
    });
    expect(errorForUpstream(400, '{"detail":"Bad email"}', 'Create failed').statusCode).toBe(400);
  });

  it.each([
    [401, 'UNAUTHENTICATED'],
    [403, 'FORBIDDEN'],
    [409, 'CONFLICT']
  ])('maps %d to %s', (status, kind) => {
    expect(errorForUpstream(status, '{"detail":"nope"}', 'fallback')).toEqual({
      kind,
      statusCode: status,
      message: 'nope',
      upstreamStatus: status
    });
  });

  it('treats other 4xx as INVALID_ARGUMENT', () => {
    expect(errorForUpstream(418, undefined, 'Update failed')).toMatchObject({
      kind: 'INVALID_ARGUMENT',
      statusCode: 418,
      message: 'Update failed'
    });
  });

  it('reports 5xx as SERVICE_UNAVAILABLE', () => {
    expect(errorForUpstream(500, 'Internal Server Error', 'Failed to list users')).toEqual({
      kind: 'SERVICE_UNAVAILABLE',
      statusCode: 503,
      message: 'Auth module error: Internal Server Error',
      upstreamStatus: 500
    });
  });

  it('reports unexpected statuses as SERVICE_UNAVAILABLE', () => {
    expect(errorForUpstream(302, undefined, 'User not found')).toMatchObject({
      kind: 'SERVICE_UNAVAILABLE',
      statusCode: 503,
      message: 'Auth module error: User not found'
    });
  });
});
