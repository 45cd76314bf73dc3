import { Controller, Delete, Get, Param, Post, Put, Req, Res } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiBody,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiServiceUnavailableResponse,
  ApiTags
} from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { unwrap } from '../common/http/admin-http.exception';
import { ErrorResponseDto } from '../common/http/error-response';
import { abortOnDisconnect } from '../common/request/abort-on-disconnect';
import { jsonBody } from '../common/request/json-body';
import type { Result } from '../common/result';
import type { GatewayReply } from './user.types';
import { UsersGatewayService } from './users-gateway.service';

/**
 * Data endpoints the UI documents bind to.
 * Replies are written by hand so the auth module's status, content type and
 * body bytes are kept.
 */
@ApiTags('Users')
@ApiServiceUnavailableResponse({ description: 'Auth module unreachable or failing', type: ErrorResponseDto })
@Controller('api')
export class UsersController {
  constructor(private readonly gateway: UsersGatewayService) {}

  @Get('users')
  @ApiOperation({ summary: 'List users' })
  @ApiOkResponse({ description: 'Users as returned by the auth module' })
  async list(@Res() res: Response): Promise<void> {
    relay(res, await this.gateway.listUsers(abortOnDisconnect(res)));
  }

  @Post('users')
  @ApiOperation({ summary: 'Create a user' })
  @ApiBody({ schema: { type: 'object' } })
  @ApiBadRequestResponse({ description: 'Body is not a JSON object or was rejected', type: ErrorResponseDto })
  async create(@Req() req: Request, @Res() res: Response): Promise<void> {
    relay(res, await this.gateway.createUser(jsonBody(req), abortOnDisconnect(res)));
  }

  @Get('users/:email')
  @ApiOperation({ summary: 'Get a user' })
  @ApiOkResponse({ description: 'User as returned by the auth module' })
  @ApiNotFoundResponse({ description: 'Unknown email', type: ErrorResponseDto })
  async get(@Param('email') email: string, @Res() res: Response): Promise<void> {
    relay(res, await this.gateway.getUser(email, abortOnDisconnect(res)));
  }

  @Put('users/:email')
  @ApiOperation({ summary: 'Update a user' })
  @ApiOkResponse({ description: 'Updated user as returned by the auth module' })
  @ApiBody({ schema: { type: 'object' } })
  @ApiBadRequestResponse({ description: 'Body is not a JSON object or was rejected', type: ErrorResponseDto })
  @ApiNotFoundResponse({ description: 'Unknown email', type: ErrorResponseDto })
  async update(
    @Param('email') email: string,
    @Req() req: Request,
    @Res() res: Response
  ): Promise<void> {
    relay(res, await this.gateway.updateUser(email, jsonBody(req), abortOnDisconnect(res)));
  }

  @Delete('users/:email')
  @ApiOperation({ summary: 'Delete a user' })
  @ApiNoContentResponse({ description: 'User deleted' })
  @ApiNotFoundResponse({ description: 'Unknown email', type: ErrorResponseDto })
  async remove(@Param('email') email: string, @Res() res: Response): Promise<void> {
    relay(res, await this.gateway.deleteUser(email, abortOnDisconnect(res)));
  }

  @Get('stats')
  @ApiOperation({ summary: 'Dashboard statistics' })
  @ApiOkResponse({ description: 'Aggregates computed by the auth module' })
  async stats(@Res() res: Response): Promise<void> {
    relay(res, await this.gateway.getStats(abortOnDisconnect(res)));
  }
}

function relay(res: Response, result: Result<GatewayReply>): void {
  const { status, body, contentType } = unwrap(result);
  res.status(status);
  if (body === undefined) {
    res.send();
    return;
  }
  res.type(contentType ?? 'text/plain').send(body);
}
