import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { MetricsService } from '../metrics/metrics.service';

@ApiTags('health')
@SkipThrottle()
@Controller()
export class HealthController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get('health')
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiResponse({ status: 200, description: 'Service is up' })
  health() {
    return { status: 'ok' };
  }

  @Get('metrics')
  @ApiOperation({ summary: 'Reservation metrics snapshot' })
  @ApiResponse({ status: 200, description: 'Metrics retrieved' })
  getMetrics() {
    return this.metricsService.getMetrics();
  }
}
