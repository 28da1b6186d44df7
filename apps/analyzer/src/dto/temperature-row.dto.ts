import { IsNotEmpty, IsString, Validate } from 'class-validator';
import { RawTemperatureRow } from '@thermo-baseline/shared';
import { IsTimestampConstraint } from './is-timestamp.constraint';
import { IsTemperatureConstraint } from './is-temperature.constraint';

export class TemperatureRowDto implements RawTemperatureRow {
  @Validate(IsTimestampConstraint)
  timestamp!: string | number;

  @IsString()
  @IsNotEmpty()
  city!: string;

  /** Parsed to a number during ingestion */
  @Validate(IsTemperatureConstraint)
  temperature!: number | string;

  @IsString()
  @IsNotEmpty()
  season!: string;
}
