import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { APP_CONFIG, AppConfig } from './config/app-config';
import { JsonLogger } from './logging/json-logger.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule.register(), {
    bufferLogs: true,
    logger: new JsonLogger('bootstrap')
  });

  const logger = app.get(JsonLogger);
  app.useLogger(logger);
  const config = app.get<AppConfig>(APP_CONFIG);
  const { port, nodeEnv } = config.server;

  logger.setLogLevels(
    nodeEnv === 'production' ? ['log', 'warn', 'error'] : ['log', 'warn', 'error', 'debug', 'verbose']
  );

  configureApp(app, logger, config.server);

  process.on('unhandledRejection', (reason) => {
    logger.error('unhandledRejection', { reason: reason instanceof Error ? reason.stack ?? reason.message : String(reason) });
  });

  process.on('uncaughtException', (error) => {
    logger.error('uncaughtException', { error: error.stack ?? error.message });
  });

  app.enableShutdownHooks();

  await app.listen(port);
  logger.log('admin dashboard listening', { port, env: nodeEnv, authModule: config.authModule.baseUrl });
}

bootstrap().catch((error: unknown) => {
  // Configuration errors land here before any logger is attached.
  console.error(
    JSON.stringify({
      level: 'error',
      kind: 'FATAL',
      msg: 'bootstrap failed',
      error: error instanceof Error ? error.message : String(error)
    })
  );
  process.exit(1);
});
