import { Inject, Injectable } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { serviceUnavailable } from '../common/errors/admin-error';
import { fail, ok, Result } from '../common/result';
import { JsonLogger } from '../logging/json-logger.service';

export type AuthModuleMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface AuthModuleRequest {
  method: AuthModuleMethod;
  /** Path relative to the auth module base URL, already encoded */
  path: string;
  body?: unknown;
}

export interface AuthModuleReply {
  status: number;
  /** Body text exactly as received; undefined when empty */
  body?: string;
  contentType?: string;
}

/**
 * HTTP client for the auth module. One axios instance is shared by all
 * requests; every call is sent exactly once.
 */
@Injectable()
export class AuthModuleClient {
  private readonly http: AxiosInstance;

  constructor(
    @Inject(APP_CONFIG) config: AppConfig,
    private readonly logger: JsonLogger
  ) {
    this.http = axios.create({
      baseURL: config.authModule.baseUrl,
      timeout: config.authModule.timeoutMs,
      headers: { Accept: 'application/json' },
      // Every status is a reply to pass on; only transport failures reject.
      validateStatus: () => true,
      // Relayed byte for byte; never parsed here.
      responseType: 'text'
    });
  }

  async send(request: AuthModuleRequest, signal?: AbortSignal): Promise<Result<AuthModuleReply>> {
    const start = Date.now();
    try {
      const response = await this.http.request<string>({
        method: request.method,
        url: request.path,
        data: request.body,
        signal
      });

      this.logger.debug('auth module replied', {
        method: request.method,
        path: request.path,
        status: response.status,
        latencyMs: Date.now() - start
      });

      const contentType = response.headers['content-type'];
      return ok({
        status: response.status,
        body: response.data === '' ? undefined : response.data,
        contentType: typeof contentType === 'string' ? contentType : undefined
      });
    } catch (error: unknown) {
      const reason = describeTransportError(error);
      this.logger.warn('auth module unreachable', {
        method: request.method,
        path: request.path,
        reason,
        latencyMs: Date.now() - start
      });
      return fail(serviceUnavailable(`Auth module unavailable: ${reason}`, { cause: error }));
    }
  }
}

export function describeTransportError(error: unknown): string {
  if (axios.isCancel(error)) return 'request aborted';
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') return 'timed out';
    return error.code ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
