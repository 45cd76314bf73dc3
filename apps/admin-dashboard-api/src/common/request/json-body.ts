import type { Request } from 'express';

/**
 * The parsed body when the request declared `application/json`, otherwise
 * `undefined`. Express leaves `req.body` as `{}` for requests the JSON parser
 * skipped, which would read as an empty object.
 */
export function jsonBody(req: Request): unknown {
  return req.is('application/json') ? req.body : undefined;
}
