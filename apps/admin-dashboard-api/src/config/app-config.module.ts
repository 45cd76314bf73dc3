import { DynamicModule, Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_CONFIG, AppConfig, appConfigFromEnv } from './app-config';
import { AppEnv, validateEnv } from './env.validation';

/**
 * Provides the `APP_CONFIG` value to every module.
 * `forRoot` reads and validates the environment; `forValue` takes a prepared
 * config so tests never have to touch `process.env`.
 */
@Global()
@Module({})
export class AppConfigModule {
  static forRoot(): DynamicModule {
    return {
      module: AppConfigModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          // Container environments inject variables directly; the files are for local runs.
          envFilePath: ['.env', '.env.local'],
          validate: validateEnv
        })
      ],
      providers: [
        {
          provide: APP_CONFIG,
          inject: [ConfigService],
          useFactory: (config: ConfigService<AppEnv, true>): AppConfig =>
            appConfigFromEnv({
              NODE_ENV: config.get('NODE_ENV', { infer: true }),
              PORT: config.get('PORT', { infer: true }),
              AUTH_MODULE_URL: config.get('AUTH_MODULE_URL', { infer: true }),
              AUTH_MODULE_TIMEOUT_MS: config.get('AUTH_MODULE_TIMEOUT_MS', { infer: true }),
              API_BASE_PATH: config.get('API_BASE_PATH', { infer: true }),
              UI_BASE_PATH: config.get('UI_BASE_PATH', { infer: true }),
              CORS_ORIGINS: config.get('CORS_ORIGINS', { infer: true }),
              SWAGGER_ENABLED: config.get('SWAGGER_ENABLED', { infer: true })
            })
        }
      ],
      exports: [APP_CONFIG]
    };
  }

  static forValue(config: AppConfig): DynamicModule {
    return {
      module: AppConfigModule,
      providers: [{ provide: APP_CONFIG, useValue: config }],
      exports: [APP_CONFIG]
    };
  }
}
