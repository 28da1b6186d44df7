import { Injectable } from '@nestjs/common';
import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from 'prom-client';
import { LiveReadingStatus } from '@thermo-baseline/shared';

/**
 * Service that registers and updates Prometheus metrics for the analyzer.
 * Exposes analysis count, latency, anomaly counts and live-reading outcomes.
 */
@Injectable()
export class MetricsService {
  private readonly register: Registry;

  /** Total number of completed analysis runs */
  readonly analysisCount: Counter<string>;

  /** Duration of the batch pipeline in seconds */
  readonly analysisLatency: Histogram<string>;

  /** Anomalies flagged, per city */
  readonly anomaliesDetected: Counter<string>;

  /** Live classifications, per status */
  readonly liveClassifications: Counter<string>;

  /** Failed live-reading fetches */
  readonly liveFetchErrors: Counter<string>;

  /** Aborted runs, per pipeline stage */
  readonly analysisErrors: Counter<string>;

  constructor() {
    this.register = new Registry();
    this.analysisCount = new Counter({
      name: 'analyzer_analyses_total',
      help: 'Total number of completed analysis runs',
      registers: [this.register],
    });
    this.analysisLatency = new Histogram({
      name: 'analyzer_analysis_duration_seconds',
      help: 'Analysis pipeline duration in seconds',
      buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
      registers: [this.register],
    });
    this.anomaliesDetected = new Counter({
      name: 'analyzer_anomalies_detected_total',
      help: 'Total anomalies flagged by the detector',
      labelNames: ['city'],
      registers: [this.register],
    });
    this.liveClassifications = new Counter({
      name: 'analyzer_live_classifications_total',
      help: 'Total live readings classified',
      labelNames: ['status'],
      registers: [this.register],
    });
    this.liveFetchErrors = new Counter({
      name: 'analyzer_live_fetch_errors_total',
      help: 'Total failed live-reading fetches',
      registers: [this.register],
    });
    this.analysisErrors = new Counter({
      name: 'analyzer_errors_total',
      help: 'Total aborted analysis runs',
      labelNames: ['stage'],
      registers: [this.register],
    });
    collectDefaultMetrics({ register: this.register, prefix: 'analyzer_' });
  }

  /**
   * Record a completed analysis with its duration and anomaly counts per city.
   */
  recordAnalysis(durationSeconds: number, anomaliesByCity: Map<string, number>): void {
    this.analysisCount.inc(1);
    this.analysisLatency.observe(durationSeconds);
    for (const [city, count] of anomaliesByCity) {
      this.anomaliesDetected.inc({ city }, count);
    }
  }

  recordLiveClassification(status: LiveReadingStatus): void {
    this.liveClassifications.inc({ status }, 1);
  }

  recordLiveFetchError(): void {
    this.liveFetchErrors.inc(1);
  }

  /**
   * Record an aborted run.
   */
  recordError(stage: string): void {
    this.analysisErrors.inc({ stage }, 1);
  }

  /**
   * Get metrics in Prometheus text format.
   */
  async getMetrics(): Promise<string> {
    return this.register.metrics();
  }
}
