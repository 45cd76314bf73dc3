import type { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { AppModule } from '../../src/app.module';
import { configureApp } from '../../src/app.setup';
import type { AppConfig } from '../../src/config/app-config';
import { JsonLogger } from '../../src/logging/json-logger.service';

export function testConfig(authModuleUrl: string, overrides: Partial<AppConfig['authModule']> = {}): AppConfig {
  return {
    authModule: { baseUrl: authModuleUrl, timeoutMs: 2_000, ...overrides },
    paths: { apiBasePath: '/api', uiBasePath: '/ui' },
    server: { port: 0, nodeEnv: 'test', corsOrigins: [], swaggerEnabled: false }
  };
}

/** Full HTTP stack wired the way `main.ts` wires it, with logging silenced. */
export async function createTestApp(config: AppConfig): Promise<INestApplication> {
  const moduleRef = await Test.createTestingModule({
    imports: [AppModule.register({ config })]
  }).compile();

  const app = moduleRef.createNestApplication({ logger: false });
  const logger = app.get(JsonLogger);
  logger.setLogLevels([]);
  configureApp(app, logger, config.server);
  await app.init();
  return app;
}
