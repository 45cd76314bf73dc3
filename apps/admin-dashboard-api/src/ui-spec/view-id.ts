import { isEmail } from 'class-validator';
import { invalidArgument, notFound } from '../common/errors/admin-error';
import { fail, ok, Result } from '../common/result';

export type ViewId = { view: 'dashboard' } | { view: 'users' } | { view: 'user-edit'; email: string };

const USER_EDIT_PREFIX = 'users/';

/**
 * Parses a view identifier such as `dashboard`, `users` or `users/alice@example.com`.
 * A leading slash is accepted; anything else must match exactly.
 */
export function parseViewId(raw: string): Result<ViewId> {
  const id = raw.startsWith('/') ? raw.slice(1) : raw;

  if (id === 'dashboard') return ok({ view: 'dashboard' });
  if (id === 'users') return ok({ view: 'users' });

  if (id.startsWith(USER_EDIT_PREFIX)) {
    const email = id.slice(USER_EDIT_PREFIX.length);
    if (!isEmail(email)) {
      return fail(invalidArgument(`Malformed user identifier: '${email}'`));
    }
    return ok({ view: 'user-edit', email });
  }

  return fail(notFound(`Unknown view: '${id}'`));
}
