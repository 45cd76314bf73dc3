import { Controller, Get } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { AppService, ComponentManifest } from './app.service';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('/health')
  @ApiOperation({ summary: 'Health check', description: 'Liveness probe for load balancers and host apps.' })
  @ApiOkResponse({
    description: 'Service is healthy',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        component: { type: 'string', example: 'admin-dashboard' },
        version: { type: 'string', example: '1.0.0' },
        timestamp: { type: 'string', format: 'date-time', example: '2026-01-19T00:00:00.000Z' }
      }
    }
  })
  health() {
    return this.appService.health();
  }

  @Get('/manifest')
  @ApiOperation({ summary: 'Component manifest', description: 'Navigation entries and routes for host apps.' })
  manifest(): ComponentManifest {
    return this.appService.manifest();
  }
}
