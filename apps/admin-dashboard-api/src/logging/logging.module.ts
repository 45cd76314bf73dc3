import { Global, Module } from '@nestjs/common';
import { JsonLogger } from './json-logger.service';

/** Single `JsonLogger` shared by every module; levels set in `main.ts` apply everywhere. */
@Global()
@Module({
  providers: [JsonLogger],
  exports: [JsonLogger]
})
export class LoggingModule {}
