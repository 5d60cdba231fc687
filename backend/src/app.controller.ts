import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { AppService, HealthStatus, ServiceInfo } from './app.service';

@ApiTags('Service')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  @ApiOperation({ summary: 'Service information' })
  getInfo(): ServiceInfo {
    return this.appService.getInfo();
  }

  @Get('health')
  @ApiOperation({ summary: 'Liveness and database reachability' })
  health(): Promise<HealthStatus> {
    return this.appService.checkHealth();
  }
}
