import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AppService } from './app.service';
import { Public } from './auth/public.decorator';

@ApiTags('health')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('/health')
  @Public() // probes carry no token
  @ApiOperation({
    summary: 'Health check endpoint',
    description: 'Returns service health status. Public endpoint, no authentication required.'
  })
  @ApiResponse({
    status: 200,
    description: 'Service is healthy',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        service: { type: 'string', example: 'access-api' },
        timestamp: { type: 'string', format: 'date-time', example: '2015-10-26T11:50:32.000Z' }
      }
    }
  })
  health() {
    return this.appService.health();
  }
}
