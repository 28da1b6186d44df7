import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RawTemperatureRow } from '@thermo-baseline/shared';
import { AnalysisReport, LiveAnalysisReport } from '../interfaces/analysis-report.interface';
import { AnalysisOptions, LiveAnalysisOptions } from '../interfaces/analysis-config.interface';
import { LiveClassification } from '../interfaces/live-classification.interface';
import { AnomalyRecord, TemperatureRecord } from '../interfaces/temperature-record.interface';
import { resolveWindow } from '../config/analysis.config';
import { describeSeries } from '../utils/statistics';
import { MetricsService } from '../metrics/metrics.service';
import { IngestionService } from './ingestion.service';
import { SmoothingService } from './smoothing.service';
import { SeasonalStatsService } from './seasonal-stats.service';
import { SeasonalBaselines } from './seasonal-baselines';
import { AnomalyDetectionService } from './anomaly-detection.service';
import { LiveClassifierService } from './live-classifier.service';
import { WeatherClientService } from './weather-client.service';

/**
 * Everything one batch run produces, before filtering for presentation
 */
interface PipelineResult {
  window: number;
  records: TemperatureRecord[];
  baselines: SeasonalBaselines;
  anomalies: AnomalyRecord[];
}

/**
 * Analysis Service
 *
 * Runs the batch pipeline (ingest → smooth → seasonal baselines → anomalies)
 * once per dataset and the live flow once per live request. Each call is an
 * independent transform of the rows it receives; nothing is kept between calls.
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);
  private readonly defaultWindow: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly ingestionService: IngestionService,
    private readonly smoothingService: SmoothingService,
    private readonly seasonalStatsService: SeasonalStatsService,
    private readonly anomalyDetectionService: AnomalyDetectionService,
    private readonly liveClassifierService: LiveClassifierService,
    private readonly weatherClientService: WeatherClientService,
    @Optional() private readonly metricsService?: MetricsService,
  ) {
    this.defaultWindow = resolveWindow(this.configService.get<string | number>('SMOOTHING_WINDOW'));
  }

  /**
   * Historical analysis of a dataset
   *
   * @throws IngestionException if the dataset is empty or malformed
   * @throws InvalidWindowException if the window is not a positive integer
   */
  analyze(rows: RawTemperatureRow[], options: AnalysisOptions = {}): AnalysisReport {
    return this.toReport(this.runPipeline(rows, options), options.city);
  }

  /**
   * Historical analysis plus classification of a freshly fetched reading.
   * A failed fetch is reported in `live` and leaves `report` intact.
   */
  async analyzeWithLiveReading(
    rows: RawTemperatureRow[],
    options: LiveAnalysisOptions,
  ): Promise<LiveAnalysisReport> {
    const result = this.runPipeline(rows, options);
    const report = this.toReport(result, options.city);

    const reading = await this.weatherClientService.fetchCurrentTemperature(
      options.city,
      options.apiKey,
      { signal: options.signal },
    );

    if (!reading.ok) {
      this.metricsService?.recordLiveFetchError();
      return {
        report,
        live: { city: options.city, status: 'indeterminate', error: reading.error },
      };
    }

    return {
      report,
      live: this.classifyAgainst(result, options.city, reading.temperature),
    };
  }

  /**
   * Classify a reading supplied by the caller against the dataset's baselines
   */
  classifyReading(
    rows: RawTemperatureRow[],
    city: string,
    temperature: number,
    options: AnalysisOptions = {},
  ): LiveClassification {
    return this.classifyAgainst(this.runPipeline(rows, options), city, temperature);
  }

  private classifyAgainst(
    result: PipelineResult,
    city: string,
    temperature: number,
  ): LiveClassification {
    const classification = this.liveClassifierService.classify(
      city,
      temperature,
      result.records,
      result.baselines,
    );
    this.metricsService?.recordLiveClassification(classification.status);
    return classification;
  }

  private runPipeline(rows: RawTemperatureRow[], options: AnalysisOptions): PipelineResult {
    const startTime = Date.now();
    const window = options.window ?? this.defaultWindow;
    let stage = 'ingestion';

    try {
      const store = this.ingestionService.ingest(rows);

      stage = 'smoothing';
      const records = this.smoothingService.smooth(store.all(), window);

      stage = 'baselines';
      const baselines = this.seasonalStatsService.calculate(records);

      stage = 'anomalies';
      const anomalies = this.anomalyDetectionService.detect(records, baselines);

      const anomaliesByCity = new Map<string, number>();
      for (const anomaly of anomalies) {
        anomaliesByCity.set(anomaly.city, (anomaliesByCity.get(anomaly.city) ?? 0) + 1);
      }

      this.logger.log(
        `Analyzed ${records.length} records: ${baselines.size} baselines, ` +
          `${anomalies.length} anomalies (window ${window})`,
      );
      this.metricsService?.recordAnalysis((Date.now() - startTime) / 1000, anomaliesByCity);

      return { window, records, baselines, anomalies };
    } catch (err) {
      this.logger.error(
        `Analysis aborted during ${stage}: ${err instanceof Error ? err.message : String(err)}`,
      );
      this.metricsService?.recordError(stage);
      throw err;
    }
  }

  private toReport(result: PipelineResult, city?: string): AnalysisReport {
    const matches = (record: { city: string }) => city === undefined || record.city === city;
    const records = result.records.filter(matches);
    const smoothedValues = records
      .map((r) => r.temperatureSmoothed)
      .filter((v): v is number => typeof v === 'number');

    return {
      window: result.window,
      cities: [...new Set(records.map((r) => r.city))],
      summary: describeSeries(smoothedValues),
      seasonalStats: city === undefined ? result.baselines.list() : result.baselines.forCity(city),
      anomalies: result.anomalies.filter(matches),
      records,
      computedAt: Date.now(),
    };
  }
}
