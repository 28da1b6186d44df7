import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  HealthCheckService,
  HealthCheck,
  HealthCheckResult,
  HealthIndicatorFunction,
  MemoryHealthIndicator,
} from '@nestjs/terminus';
import { WeatherProviderHealthIndicator } from './indicators/weather-provider.health';

/** Start time for uptime calculation */
const startTime = Date.now();

/** Heap ceiling for the readiness check */
const HEAP_LIMIT_BYTES = 512 * 1024 * 1024;

/**
 * Health endpoints for container probes.
 *
 * - GET /health  - Weather provider and heap checks. 503 if any fails.
 * - GET /ready   - Heap check only; the analysis endpoints work without the provider.
 * - GET /live    - Process is up.
 * - GET /status  - Uptime, memory and full checks.
 */
@Controller()
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly weatherProvider: WeatherProviderHealthIndicator,
  ) {}

  @Get('health')
  @HealthCheck()
  @HttpCode(HttpStatus.OK)
  async check(): Promise<HealthCheckResult> {
    return this.runChecks([
      () => this.weatherProvider.isHealthy('weatherProvider'),
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
    ]);
  }

  @Get('ready')
  @HealthCheck()
  @HttpCode(HttpStatus.OK)
  async ready(): Promise<HealthCheckResult> {
    return this.runChecks([() => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES)]);
  }

  @Get('live')
  @HttpCode(HttpStatus.OK)
  live(): { status: string } {
    return { status: 'ok' };
  }

  @Get('status')
  @HttpCode(HttpStatus.OK)
  async status(): Promise<{
    status: string;
    uptimeSeconds: number;
    timestamp: number;
    version: string;
    memory: NodeJS.MemoryUsage;
    checks: HealthCheckResult;
  }> {
    const checks = await this.health.check([
      () => this.weatherProvider.isHealthy('weatherProvider'),
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
    ]);
    return {
      status: checks.status,
      uptimeSeconds: (Date.now() - startTime) / 1000,
      timestamp: Date.now(),
      version: process.env.npm_package_version ?? '0.0.0',
      memory: process.memoryUsage(),
      checks,
    };
  }

  private async runChecks(indicators: HealthIndicatorFunction[]): Promise<HealthCheckResult> {
    const result = await this.health.check(indicators);
    if (result.status === 'ok') {
      return result;
    }
    throw new ServiceUnavailableException(result);
  }
}
