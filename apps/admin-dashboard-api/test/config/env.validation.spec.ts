import { appConfigFromEnv } from '../../src/config/app-config';
import { validateEnv } from '../../src/config/env.validation';

describe('validateEnv', () => {
  it('applies defaults when only the auth module URL is set', () => {
    expect(validateEnv({ AUTH_MODULE_URL: 'http://auth:8001' })).toEqual({
      NODE_ENV: 'development',
      PORT: 8200,
      AUTH_MODULE_URL: 'http://auth:8001',
      AUTH_MODULE_TIMEOUT_MS: 10_000,
      API_BASE_PATH: '/api',
      UI_BASE_PATH: '/ui',
      SWAGGER_ENABLED: true
    });
  });

  it('coerces numeric and boolean values', () => {
    const env = validateEnv({
      AUTH_MODULE_URL: 'https://auth.internal',
      PORT: '9000',
      AUTH_MODULE_TIMEOUT_MS: '250',
      SWAGGER_ENABLED: 'FALSE'
    });
    expect(env.PORT).toBe(9000);
    expect(env.AUTH_MODULE_TIMEOUT_MS).toBe(250);
    expect(env.SWAGGER_ENABLED).toBe(false);
  });

  it('fails fast without an auth module URL', () => {
    expect(() => validateEnv({ PORT: '8200' })).toThrow(
      'Invalid environment configuration. Missing/invalid: AUTH_MODULE_URL.'
    );
  });

  it('points at .env.local in the working directory', () => {
    expect(() => validateEnv({})).toThrow(
      'Set them in the environment, or in .env.local in the working directory (see apps/admin-dashboard-api/.env.example).'
    );
  });

  it('rejects a non-http auth module URL', () => {
    expect(() => validateEnv({ AUTH_MODULE_URL: 'ftp://auth:21' })).toThrow(/Missing\/invalid: AUTH_MODULE_URL\./);
  });

  it('names every invalid key', () => {
    expect(() =>
      validateEnv({ AUTH_MODULE_URL: 'http://auth:8001', API_BASE_PATH: 'api', AUTH_MODULE_TIMEOUT_MS: '-5' })
    ).toThrow(/Missing\/invalid: (AUTH_MODULE_TIMEOUT_MS, API_BASE_PATH|API_BASE_PATH, AUTH_MODULE_TIMEOUT_MS)\./);
  });
});

describe('appConfigFromEnv', () => {
  it('normalizes URLs and splits the CORS allow list', () => {
    const config = appConfigFromEnv(
      validateEnv({
        AUTH_MODULE_URL: 'http://auth:8001/',
        API_BASE_PATH: '/admin-api/',
        CORS_ORIGINS: 'http://localhost:3000, https://admin.example.com ,'
      })
    );
    expect(config).toEqual({
      authModule: { baseUrl: 'http://auth:8001', timeoutMs: 10_000 },
      paths: { apiBasePath: '/admin-api', uiBasePath: '/ui' },
      server: {
        port: 8200,
        nodeEnv: 'development',
        corsOrigins: ['http://localhost:3000', 'https://admin.example.com'],
        swaggerEnabled: true
      }
    });
  });
});
