import { DynamicModule, Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import type { AppConfig } from './config/app-config';
import { AppConfigModule } from './config/app-config.module';
import { LoggingModule } from './logging/logging.module';
import { UiSpecModule } from './ui-spec/ui-spec.module';
import { UsersModule } from './users/users.module';

export interface AppModuleOptions {
  /** Prepared configuration; when absent the environment is read and validated. */
  config?: AppConfig;
}

@Module({})
export class AppModule {
  static register(options: AppModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        options.config ? AppConfigModule.forValue(options.config) : AppConfigModule.forRoot(),
        LoggingModule,
        UiSpecModule,
        UsersModule
      ],
      controllers: [AppController],
      providers: [AppService]
    };
  }
}
