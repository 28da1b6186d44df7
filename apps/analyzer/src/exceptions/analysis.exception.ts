import { TemperatureRecord } from '../interfaces/temperature-record.interface';

/**
 * Base exception for analysis pipeline errors
 */
export class AnalysisException extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'AnalysisException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed or missing required field in the input dataset. Fatal to the run.
 */
export class IngestionException extends AnalysisException {
  constructor(
    message: string,
    public readonly row?: unknown,
    public readonly rowIndex?: number,
  ) {
    super(rowIndex === undefined ? message : `Row ${rowIndex}: ${message}`);
    this.name = 'IngestionException';
  }
}

/**
 * Smoothing window is not a positive integer
 */
export class InvalidWindowException extends AnalysisException {
  constructor(public readonly window: number) {
    super(`Smoothing window must be a positive integer, got ${window}`);
    this.name = 'InvalidWindowException';
  }
}

/**
 * A stage that needs smoothed values received a record that was never smoothed
 */
export class MissingSmoothedValueException extends AnalysisException {
  constructor(public readonly record: TemperatureRecord) {
    super(
      `Record for ${record.city} at ${record.timestamp} has no smoothed value; run smoothing first`,
    );
    this.name = 'MissingSmoothedValueException';
  }
}
