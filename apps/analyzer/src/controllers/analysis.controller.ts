import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Res,
} from '@nestjs/common';
import { AnalysisService } from '../services/analysis.service';
import { IngestionResult, IngestionService } from '../services/ingestion.service';
import { AnalysisReport, LiveAnalysisReport } from '../interfaces/analysis-report.interface';
import { LiveClassification } from '../interfaces/live-classification.interface';
import {
  AnalysisRequestDto,
  ClassifyReadingRequestDto,
  LiveAnalysisRequestDto,
  ValidateDatasetRequestDto,
} from '../dto/analysis-request.dto';
import { IngestionException, InvalidWindowException } from '../exceptions';

/**
 * Analysis endpoints. Every request carries its own dataset.
 *
 * - POST /analysis          - Smoothed series, seasonal baselines, anomalies, summary.
 * - POST /analysis/live     - Same report plus classification of a fetched live reading.
 * - POST /analysis/classify - Classify a caller-supplied reading against the dataset.
 * - POST /analysis/validate - Per-row ingestion diagnostics.
 */
@Controller('analysis')
export class AnalysisController {
  constructor(
    private readonly analysisService: AnalysisService,
    private readonly ingestionService: IngestionService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  analyze(@Body() body: AnalysisRequestDto): AnalysisReport {
    try {
      return this.analysisService.analyze(body.records, { window: body.window, city: body.city });
    } catch (error) {
      rethrowAsHttp(error);
    }
  }

  @Post('live')
  @HttpCode(HttpStatus.OK)
  async analyzeLive(
    @Body() body: LiveAnalysisRequestDto,
    @Res({ passthrough: true }) res: ClosableResponse,
  ): Promise<LiveAnalysisReport> {
    try {
      return await this.analysisService.analyzeWithLiveReading(body.records, {
        window: body.window,
        city: body.city,
        apiKey: body.apiKey,
        signal: abortOnDisconnect(res),
      });
    } catch (error) {
      rethrowAsHttp(error);
    }
  }

  @Post('classify')
  @HttpCode(HttpStatus.OK)
  classify(@Body() body: ClassifyReadingRequestDto): LiveClassification {
    try {
      return this.analysisService.classifyReading(body.records, body.city, body.temperature, {
        window: body.window,
      });
    } catch (error) {
      rethrowAsHttp(error);
    }
  }

  @Post('validate')
  @HttpCode(HttpStatus.OK)
  validate(@Body() body: ValidateDatasetRequestDto): IngestionResult {
    return this.ingestionService.ingestWithErrors(body.records);
  }
}

/**
 * The part of the HTTP response used to notice a client that went away
 */
export interface ClosableResponse {
  readonly writableFinished: boolean;
  once(event: 'close', listener: () => void): unknown;
}

/**
 * Signal that aborts when the connection closes before the response was sent
 */
export function abortOnDisconnect(res: ClosableResponse): AbortSignal {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

/**
 * Input errors become 400s; anything else propagates unchanged
 */
function rethrowAsHttp(error: unknown): never {
  if (error instanceof IngestionException || error instanceof InvalidWindowException) {
    throw new BadRequestException(error.message);
  }
  throw error;
}
