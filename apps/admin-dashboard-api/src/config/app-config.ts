import type { AppEnv } from './env.validation';

/** Injection token for the immutable runtime configuration. */
export const APP_CONFIG = Symbol('APP_CONFIG');

export interface AuthModuleConfig {
  /** Base URL of the auth module, e.g. `http://auth:8001`. */
  baseUrl: string;
  timeoutMs: number;
}

export interface DocumentPaths {
  /** Prefix of the data endpoints referenced by UI documents. */
  apiBasePath: string;
  /** Prefix of the UI spec routes used as navigation targets. */
  uiBasePath: string;
}

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  corsOrigins: string[];
  swaggerEnabled: boolean;
}

export interface AppConfig {
  authModule: AuthModuleConfig;
  paths: DocumentPaths;
  server: ServerConfig;
}

export const DEFAULT_DOCUMENT_PATHS: DocumentPaths = {
  apiBasePath: '/api',
  uiBasePath: '/ui'
};

function trimTrailingSlash(value: string): string {
  return value.length > 1 ? value.replace(/\/+$/, '') : value;
}

export function appConfigFromEnv(env: AppEnv): AppConfig {
  return {
    authModule: {
      baseUrl: trimTrailingSlash(env.AUTH_MODULE_URL),
      timeoutMs: env.AUTH_MODULE_TIMEOUT_MS
    },
    paths: {
      apiBasePath: trimTrailingSlash(env.API_BASE_PATH),
      uiBasePath: trimTrailingSlash(env.UI_BASE_PATH)
    },
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      corsOrigins: (env.CORS_ORIGINS ?? '')
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean),
      swaggerEnabled: env.SWAGGER_ENABLED
    }
  };
}
