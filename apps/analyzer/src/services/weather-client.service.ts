import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { firstValueFrom } from 'rxjs';
import { LiveFetchError, LiveReadingResult } from '@thermo-baseline/shared';
import { WeatherResponseDto } from '../dto/weather-response.dto';
import {
  DEFAULT_WEATHER_API_URL,
  DEFAULT_WEATHER_TIMEOUT_MS,
} from '../config/analysis.config';

export interface FetchOptions {
  /** Overrides WEATHER_TIMEOUT_MS for this request */
  timeoutMs?: number;

  /** Cancels the request; the result is then a LiveFetchError */
  signal?: AbortSignal;
}

/**
 * Fetches the current temperature of a city from an OpenWeatherMap-compatible
 * endpoint. Failures are returned as LiveFetchError values, never thrown.
 */
@Injectable()
export class WeatherClientService {
  private readonly logger = new Logger(WeatherClientService.name);
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly defaultApiKey: string | undefined;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    this.apiUrl = this.configService.get<string>('WEATHER_API_URL', DEFAULT_WEATHER_API_URL);
    this.timeoutMs = Number(
      this.configService.get<number>('WEATHER_TIMEOUT_MS', DEFAULT_WEATHER_TIMEOUT_MS),
    );
    this.defaultApiKey = this.configService.get<string>('WEATHER_API_KEY');
  }

  /**
   * GET <WEATHER_API_URL>?q=<city>&appid=<apiKey>&units=metric
   *
   * @param apiKey Falls back to WEATHER_API_KEY when omitted
   */
  async fetchCurrentTemperature(
    city: string,
    apiKey?: string,
    options: FetchOptions = {},
  ): Promise<LiveReadingResult> {
    const appid = apiKey || this.defaultApiKey;
    if (!appid) {
      return this.failure(city, 'Weather API key is not configured');
    }

    try {
      const response = await firstValueFrom(
        this.httpService.get<unknown>(this.apiUrl, {
          params: { q: city, appid, units: 'metric' },
          timeout: options.timeoutMs ?? this.timeoutMs,
          signal: options.signal,
          validateStatus: () => true,
        }),
      );

      if (response.status !== 200) {
        return this.failure(
          city,
          extractProviderMessage(response.data) ?? `HTTP ${response.status}`,
          response.status,
        );
      }

      if (typeof response.data !== 'object' || response.data === null) {
        return this.failure(city, 'Invalid response from weather provider: body is not an object');
      }

      const body = plainToInstance(WeatherResponseDto, response.data);
      const errors = await validate(body);
      if (errors.length > 0) {
        return this.failure(city, 'Invalid response from weather provider: main.temp is missing');
      }

      this.logger.debug(`Live temperature for ${city}: ${body.main.temp}°C`);
      return { ok: true, city, temperature: body.main.temp };
    } catch (error) {
      return this.failure(city, error instanceof Error ? error.message : 'Unknown error');
    }
  }

  private failure(city: string, message: string, status?: number): LiveReadingResult {
    this.logger.warn(`Live fetch for ${city} failed: ${message}`);
    const error: LiveFetchError = { kind: 'live-fetch-error', message };
    if (status !== undefined) {
      error.status = status;
    }
    return { ok: false, error };
  }
}

/**
 * Provider error bodies look like { "cod": "404", "message": "city not found" }
 */
function extractProviderMessage(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'message' in data) {
    return typeof data.message === 'string' ? data.message : undefined;
  }
  return undefined;
}
