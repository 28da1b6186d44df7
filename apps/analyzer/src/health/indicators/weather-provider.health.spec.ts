import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { AxiosHeaders } from 'axios';
import { of, throwError } from 'rxjs';
import { HealthCheckError } from '@nestjs/terminus';
import { WeatherProviderHealthIndicator } from './weather-provider.health';

describe('WeatherProviderHealthIndicator', () => {
  let indicator: WeatherProviderHealthIndicator;
  let configService: ConfigService;
  let httpService: HttpService;

  const respondWith = (status: number) =>
    of({
      status,
      data: null,
      statusText: '',
      headers: {},
      config: { headers: new AxiosHeaders() },
    });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WeatherProviderHealthIndicator,
        {
          provide: ConfigService,
          useValue: { get: jest.fn() },
        },
        {
          provide: HttpService,
          useValue: { get: jest.fn() },
        },
      ],
    }).compile();

    indicator = module.get<WeatherProviderHealthIndicator>(WeatherProviderHealthIndicator);
    configService = module.get<ConfigService>(ConfigService);
    httpService = module.get<HttpService>(HttpService);
  });

  it('should be defined', () => {
    expect(indicator).toBeDefined();
  });

  it('should return up with "not configured" when WEATHER_API_KEY is not set', async () => {
    jest.mocked(configService.get).mockReturnValue(undefined);
    const result = await indicator.isHealthy('weatherProvider');
    expect(result).toEqual({
      weatherProvider: { status: 'up', message: 'Weather provider not configured (skipped)' },
    });
    expect(httpService.get).not.toHaveBeenCalled();
  });

  it('should return up when the provider answers below 500', async () => {
    jest
      .mocked(configService.get)
      .mockReturnValueOnce('test-secret')
      .mockReturnValueOnce('http://weather.test/current');
    jest.mocked(httpService.get).mockReturnValue(respondWith(400));
    const result = await indicator.isHealthy('weatherProvider');
    expect(result).toEqual({
      weatherProvider: { status: 'up', message: 'Weather provider is reachable' },
    });
    expect(httpService.get).toHaveBeenCalledWith(
      'http://weather.test/current',
      expect.objectContaining({
        params: { appid: 'test-secret' },
        timeout: 5000,
        validateStatus: expect.any(Function),
      }),
    );
  });

  it('should throw HealthCheckError when the provider returns 5xx', async () => {
    jest.mocked(configService.get).mockReturnValue('test-secret');
    jest.mocked(httpService.get).mockReturnValue(respondWith(503));
    await expect(indicator.isHealthy('weatherProvider')).rejects.toThrow(HealthCheckError);
  });

  it('should throw HealthCheckError when the HTTP request fails', async () => {
    jest.mocked(configService.get).mockReturnValue('test-secret');
    jest.mocked(httpService.get).mockReturnValue(throwError(() => new Error('ECONNREFUSED')));
    await expect(indicator.isHealthy('weatherProvider')).rejects.toMatchObject({
      causes: { weatherProvider: { status: 'down', message: 'ECONNREFUSED' } },
    });
  });
});
