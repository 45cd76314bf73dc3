import { HttpStatus, Injectable } from '@nestjs/common';
import { AuthModuleClient, AuthModuleRequest } from '../auth-module/auth-module.client';
import { invalidArgument } from '../common/errors/admin-error';
import { emailPathSegment } from '../common/http/path-segment';
import { fail, ok, Result } from '../common/result';
import { errorForUpstream, isRecord } from './upstream-errors';
import type { GatewayReply } from './user.types';

/**
 * Relays user and stats operations to the auth module, one outbound call per
 * operation. Nothing is cached and nothing is retried.
 */
@Injectable()
export class UsersGatewayService {
  constructor(private readonly authModule: AuthModuleClient) {}

  listUsers(signal?: AbortSignal): Promise<Result<GatewayReply>> {
    return this.relay({ method: 'GET', path: '/users' }, 'Failed to list users', signal);
  }

  getUser(email: string, signal?: AbortSignal): Promise<Result<GatewayReply>> {
    return this.relay({ method: 'GET', path: userPath(email) }, 'User not found', signal);
  }

  async createUser(body: unknown, signal?: AbortSignal): Promise<Result<GatewayReply>> {
    if (!isRecord(body)) return fail(invalidArgument('Request body must be a JSON object'));
    return this.relay({ method: 'POST', path: '/users', body }, 'Create failed', signal);
  }

  async updateUser(email: string, body: unknown, signal?: AbortSignal): Promise<Result<GatewayReply>> {
    if (!isRecord(body)) return fail(invalidArgument('Request body must be a JSON object'));
    return this.relay({ method: 'PUT', path: userPath(email), body }, 'Update failed', signal);
  }

  async deleteUser(email: string, signal?: AbortSignal): Promise<Result<GatewayReply>> {
    const result = await this.relay({ method: 'DELETE', path: userPath(email) }, 'Delete failed', signal);
    if (!result.ok) return result;
    return ok({ status: HttpStatus.NO_CONTENT });
  }

  getStats(signal?: AbortSignal): Promise<Result<GatewayReply>> {
    return this.relay({ method: 'GET', path: '/stats' }, 'Failed to load stats', signal);
  }

  private async relay(
    request: AuthModuleRequest,
    fallbackMessage: string,
    signal?: AbortSignal
  ): Promise<Result<GatewayReply>> {
    const sent = await this.authModule.send(request, signal);
    if (!sent.ok) return sent;

    const { status, body, contentType } = sent.value;
    if (status >= 200 && status < 300) {
      return ok({ status, body, contentType });
    }
    return fail(errorForUpstream(status, body, fallbackMessage));
  }
}

function userPath(email: string): string {
  return `/users/${emailPathSegment(email)}`;
}
