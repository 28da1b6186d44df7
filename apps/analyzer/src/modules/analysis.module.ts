import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { AnalysisController } from '../controllers/analysis.controller';
import { AnalysisService } from '../services/analysis.service';
import { IngestionService } from '../services/ingestion.service';
import { SmoothingService } from '../services/smoothing.service';
import { SeasonalStatsService } from '../services/seasonal-stats.service';
import { AnomalyDetectionService } from '../services/anomaly-detection.service';
import { LiveClassifierService } from '../services/live-classifier.service';
import { WeatherClientService } from '../services/weather-client.service';
import { TrailingMeanSmoother } from '../strategies/smoothers/trailing-mean.smoother';
import { MetricsModule } from '../metrics/metrics.module';

@Module({
  imports: [HttpModule, MetricsModule],
  controllers: [AnalysisController],
  providers: [
    AnalysisService,
    IngestionService,
    SmoothingService,
    SeasonalStatsService,
    AnomalyDetectionService,
    LiveClassifierService,
    WeatherClientService,
    TrailingMeanSmoother,
  ],
  exports: [AnalysisService],
})
export class AnalysisModule {}
