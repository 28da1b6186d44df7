import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom, timeout } from 'rxjs';
import { DEFAULT_WEATHER_API_URL } from '../../config/analysis.config';

/**
 * Reports whether the live-weather provider answers. Any HTTP status below 500
 * counts as reachable: the probe carries no city, so 4xx answers are expected.
 * Skipped when no WEATHER_API_KEY is configured.
 */
@Injectable()
export class WeatherProviderHealthIndicator extends HealthIndicator {
  private static readonly TIMEOUT_MS = 5000;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const apiKey = this.configService.get<string>('WEATHER_API_KEY');
    if (!apiKey) {
      return { [key]: { status: 'up', message: 'Weather provider not configured (skipped)' } };
    }

    const url = this.configService.get<string>('WEATHER_API_URL') ?? DEFAULT_WEATHER_API_URL;
    try {
      const response = await firstValueFrom(
        this.httpService
          .get<unknown>(url, {
            params: { appid: apiKey },
            timeout: WeatherProviderHealthIndicator.TIMEOUT_MS,
            validateStatus: () => true,
          })
          .pipe(timeout(WeatherProviderHealthIndicator.TIMEOUT_MS)),
      );
      if (response.status < 500) {
        return { [key]: { status: 'up', message: 'Weather provider is reachable' } };
      }
      throw new HealthCheckError('Weather provider check failed', {
        [key]: { status: 'down', message: `HTTP ${response.status}` },
      });
    } catch (err) {
      if (err instanceof HealthCheckError) {
        throw err;
      }
      const message = err instanceof Error ? err.message : 'Unknown error';
      throw new HealthCheckError('Weather provider check failed', {
        [key]: { status: 'down', message },
      });
    }
  }
}
