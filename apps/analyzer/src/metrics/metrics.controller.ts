import { Controller, Get, Header, HttpCode, HttpStatus } from '@nestjs/common';
import { register } from 'prom-client';
import { MetricsService } from './metrics.service';

/**
 * Prometheus scrape endpoint for the analyzer.
 *
 * - GET /metrics - analysis runs, pipeline latency, anomalies per city, live-reading outcomes.
 */
@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', register.contentType)
  async getMetrics(): Promise<string> {
    return this.metricsService.getMetrics();
  }
}
