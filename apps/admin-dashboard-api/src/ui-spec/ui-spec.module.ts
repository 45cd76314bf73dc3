import { Module } from '@nestjs/common';
import { UiSpecController } from './ui-spec.controller';
import { UiSpecService } from './ui-spec.service';

@Module({
  controllers: [UiSpecController],
  providers: [UiSpecService],
  exports: [UiSpecService]
})
export class UiSpecModule {}
