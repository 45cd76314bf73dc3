import type { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { HttpErrorFilter } from './common/filters/http-error.filter';
import type { ServerConfig } from './config/app-config';
import { createHttpLoggingMiddleware } from './logging/http-logging.middleware';
import { JsonLogger } from './logging/json-logger.service';

/**
 * Middleware, error shape, CORS and API docs shared by `main.ts` and the HTTP tests.
 */
export function configureApp(app: INestApplication, logger: JsonLogger, server: ServerConfig): void {
  app.use(createHttpLoggingMiddleware(logger));
  app.useGlobalFilters(new HttpErrorFilter(logger));

  // The SDK runs in the host app's origin; without an allow list any origin may read.
  const allowSet = new Set(server.corsOrigins.map((origin) => origin.replace(/\/$/, '')));
  app.enableCors({
    origin:
      allowSet.size === 0
        ? '*'
        : (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
            if (!origin || allowSet.has(origin.replace(/\/$/, ''))) return callback(null, true);
            logger.warn('CORS blocked origin', { origin });
            return callback(null, false);
          },
    credentials: false,
    methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS']
  });

  if (server.swaggerEnabled) {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('Admin Dashboard API')
        .setDescription('UI specification documents and user data for the admin dashboard')
        .setVersion('1.0.0')
        .addTag('UI', 'Page documents rendered by the frontend SDK')
        .addTag('Users', 'User data relayed to the auth module')
        .addTag('Health', 'Probes and component manifest')
        .build()
    );
    SwaggerModule.setup('docs', app, document);
  }
}
