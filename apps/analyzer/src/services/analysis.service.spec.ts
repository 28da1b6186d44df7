import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AnalysisService } from './analysis.service';
import { IngestionService } from './ingestion.service';
import { SmoothingService } from './smoothing.service';
import { SeasonalStatsService } from './seasonal-stats.service';
import { AnomalyDetectionService } from './anomaly-detection.service';
import { LiveClassifierService } from './live-classifier.service';
import { WeatherClientService } from './weather-client.service';
import { TrailingMeanSmoother } from '../strategies/smoothers/trailing-mean.smoother';
import { MetricsService } from '../metrics/metrics.service';
import { IngestionException, InvalidWindowException } from '../exceptions';
import { SPIKE_DAY_INDEX, dailyRows, spikeRows } from '../__mocks__/temperature-row.fixtures';

describe('AnalysisService', () => {
  let service: AnalysisService;
  let weatherClient: WeatherClientService;
  let metricsService: MetricsService;

  async function createService(smoothingWindow?: string): Promise<void> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AnalysisService,
        IngestionService,
        SmoothingService,
        TrailingMeanSmoother,
        SeasonalStatsService,
        AnomalyDetectionService,
        LiveClassifierService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn().mockReturnValue(smoothingWindow) },
        },
        {
          provide: WeatherClientService,
          useValue: { fetchCurrentTemperature: jest.fn() },
        },
        {
          provide: MetricsService,
          useValue: {
            recordAnalysis: jest.fn(),
            recordLiveClassification: jest.fn(),
            recordLiveFetchError: jest.fn(),
            recordError: jest.fn(),
          },
        },
      ],
    }).compile();

    service = module.get<AnalysisService>(AnalysisService);
    weatherClient = module.get<WeatherClientService>(WeatherClientService);
    metricsService = module.get<MetricsService>(MetricsService);
  }

  beforeEach(async () => {
    await createService();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('analyze', () => {
    it('should report the spike and the windows that contain it', () => {
      const report = service.analyze(spikeRows, { window: 3 });

      expect(report.window).toBe(3);
      expect(report.cities).toEqual(['A']);
      expect(report.records).toHaveLength(35);
      expect(report.anomalies.map((r) => r.timestamp)).toEqual([
        spikeRows[SPIKE_DAY_INDEX].timestamp,
        spikeRows[SPIKE_DAY_INDEX + 1].timestamp,
        spikeRows[SPIKE_DAY_INDEX + 2].timestamp,
      ]);
      expect(report.seasonalStats).toHaveLength(1);
      expect(report.seasonalStats[0]).toMatchObject({
        city: 'A',
        season: 'winter',
        sampleCount: 33,
        recordCount: 35,
      });
      expect(report.seasonalStats[0].mean).toBeCloseTo(50 / 33, 10);
    });

    it('should summarize the smoothed column without insufficient-history records', () => {
      const report = service.analyze(spikeRows, { window: 3 });

      expect(report.summary.count).toBe(33);
      expect(report.summary.min).toBe(0);
      expect(report.summary.p50).toBe(0);
      expect(report.summary.max).toBeCloseTo(50 / 3, 10);
    });

    it('should use the default window of 30', () => {
      const report = service.analyze(spikeRows);

      expect(report.window).toBe(30);
      expect(report.summary.count).toBe(6);
      expect(report.anomalies).toEqual([]);
    });

    it('should use SMOOTHING_WINDOW when configured', async () => {
      await createService('1');

      const report = service.analyze(spikeRows);

      expect(report.window).toBe(1);
      expect(report.anomalies).toHaveLength(1);
    });

    it('should restrict the tables to one city', () => {
      const rows = [...spikeRows, ...dailyRows('B', [10, 11, 12, 13])];

      const report = service.analyze(rows, { window: 1, city: 'B' });

      expect(report.cities).toEqual(['B']);
      expect(report.records.every((r) => r.city === 'B')).toBe(true);
      expect(report.seasonalStats).toEqual([
        expect.objectContaining({ city: 'B', season: 'winter', mean: 11.5, sampleCount: 4 }),
      ]);
      expect(report.anomalies).toEqual([]);
    });

    it('should give the same result for the same rows', () => {
      const first = service.analyze(spikeRows, { window: 3 });
      const second = service.analyze([...spikeRows].reverse(), { window: 3 });

      expect({ ...second, computedAt: 0 }).toEqual({ ...first, computedAt: 0 });
    });

    it('should record metrics for a completed run', () => {
      service.analyze(spikeRows, { window: 1 });

      expect(metricsService.recordAnalysis).toHaveBeenCalledWith(
        expect.any(Number),
        new Map([['A', 1]]),
      );
    });

    it('should reject an empty dataset and record the failed stage', () => {
      expect(() => service.analyze([])).toThrow(IngestionException);
      expect(metricsService.recordError).toHaveBeenCalledWith('ingestion');
      expect(metricsService.recordAnalysis).not.toHaveBeenCalled();
    });

    it('should reject an invalid window and record the failed stage', () => {
      expect(() => service.analyze(spikeRows, { window: 0 })).toThrow(InvalidWindowException);
      expect(metricsService.recordError).toHaveBeenCalledWith('smoothing');
    });
  });

  describe('analyzeWithLiveReading', () => {
    it('should classify the fetched reading against the current season', async () => {
      jest
        .mocked(weatherClient.fetchCurrentTemperature)
        .mockResolvedValue({ ok: true, city: 'A', temperature: 50 });

      const result = await service.analyzeWithLiveReading(spikeRows, {
        city: 'A',
        window: 1,
        apiKey: 'test-secret',
      });

      expect(result.live).toMatchObject({ city: 'A', season: 'winter', status: 'anomalous' });
      expect(result.report.anomalies).toHaveLength(1);
      expect(weatherClient.fetchCurrentTemperature).toHaveBeenCalledWith('A', 'test-secret', {
        signal: undefined,
      });
      expect(metricsService.recordLiveClassification).toHaveBeenCalledWith('anomalous');
    });

    it('should classify a typical reading as normal', async () => {
      jest
        .mocked(weatherClient.fetchCurrentTemperature)
        .mockResolvedValue({ ok: true, city: 'A', temperature: 0 });

      const result = await service.analyzeWithLiveReading(spikeRows, { city: 'A', window: 1 });

      expect(result.live.status).toBe('normal');
    });

    it('should report a failed fetch without losing the historical report', async () => {
      const error = { kind: 'live-fetch-error' as const, message: 'city not found', status: 404 };
      jest.mocked(weatherClient.fetchCurrentTemperature).mockResolvedValue({ ok: false, error });

      const result = await service.analyzeWithLiveReading(spikeRows, { city: 'A', window: 1 });

      expect(result.live).toEqual({ city: 'A', status: 'indeterminate', error });
      expect(result.report.anomalies).toHaveLength(1);
      expect(metricsService.recordLiveFetchError).toHaveBeenCalled();
      expect(metricsService.recordLiveClassification).not.toHaveBeenCalled();
    });

    it('should reject a malformed dataset before fetching', async () => {
      await expect(
        service.analyzeWithLiveReading([], { city: 'A' }),
      ).rejects.toThrow(IngestionException);
      expect(weatherClient.fetchCurrentTemperature).not.toHaveBeenCalled();
    });
  });

  describe('classifyReading', () => {
    it('should classify a supplied reading', () => {
      const result = service.classifyReading(spikeRows, 'A', 50, { window: 1 });

      expect(result.status).toBe('anomalous');
      expect(result.baseline?.sampleCount).toBe(35);
    });

    it('should be indeterminate for a city missing from the dataset', () => {
      const result = service.classifyReading(spikeRows, 'B', 10, { window: 1 });

      expect(result).toMatchObject({ status: 'indeterminate', reason: 'no-baseline-for-season' });
    });
  });
});
