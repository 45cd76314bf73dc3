import { Controller, Get, Param } from '@nestjs/common';
import { ApiBadRequestResponse, ApiNotFoundResponse, ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { unwrap } from '../common/http/admin-http.exception';
import { ErrorResponseDto } from '../common/http/error-response';
import type { UiDocument } from './ui-node.types';
import { UiSpecService } from './ui-spec.service';

/**
 * UI Specification Documents for the frontend SDK.
 * Each route is a thin wrapper around `UiSpecService.resolve`.
 */
@ApiTags('UI')
@Controller('ui')
export class UiSpecController {
  constructor(private readonly uiSpecs: UiSpecService) {}

  @Get('dashboard')
  @ApiOperation({ summary: 'Dashboard page document' })
  @ApiOkResponse({ description: 'Page document bound to the stats and users endpoints' })
  dashboard(): UiDocument {
    return unwrap(this.uiSpecs.resolve('dashboard'));
  }

  @Get('users')
  @ApiOperation({ summary: 'Users list page document' })
  @ApiOkResponse({ description: 'Page document with a table bound to the users endpoint' })
  users(): UiDocument {
    return unwrap(this.uiSpecs.resolve('users'));
  }

  @Get('users/:email')
  @ApiOperation({ summary: 'User edit page document' })
  @ApiOkResponse({ description: 'Page document with a form bound to the user endpoint' })
  @ApiBadRequestResponse({ description: 'Malformed email', type: ErrorResponseDto })
  userEdit(@Param('email') email: string): UiDocument {
    return unwrap(this.uiSpecs.resolve(`users/${email}`));
  }

  // Declared last so the named views above win.
  @Get(':view')
  @ApiOperation({ summary: 'Any other view identifier' })
  @ApiNotFoundResponse({ description: 'Unknown view', type: ErrorResponseDto })
  other(@Param('view') view: string): UiDocument {
    return unwrap(this.uiSpecs.resolve(view));
  }
}
