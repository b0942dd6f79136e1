import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

export const API_VERSION = '1.0.0';

@ApiTags('health')
@Controller()
export class AppController {
  @Get()
  @ApiOperation({ summary: 'API name and version' })
  getRoot(): { message: string; version: string } {
    return { message: 'Events API', version: API_VERSION };
  }

  @Get('health')
  @ApiOperation({ summary: 'Liveness probe' })
  getHealth(): { status: string } {
    return { status: 'healthy' };
  }
}
