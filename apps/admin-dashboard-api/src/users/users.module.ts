import { Module } from '@nestjs/common';
import { AuthModuleClient } from '../auth-module/auth-module.client';
import { UsersController } from './users.controller';
import { UsersGatewayService } from './users-gateway.service';

@Module({
  controllers: [UsersController],
  providers: [UsersGatewayService, AuthModuleClient],
  exports: [UsersGatewayService]
})
export class UsersModule {}
