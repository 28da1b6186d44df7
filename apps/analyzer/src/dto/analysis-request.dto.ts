import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import { RawTemperatureRow } from '@thermo-baseline/shared';
import { TemperatureRowDto } from './temperature-row.dto';

/**
 * Dataset plus smoothing window, shared by every analysis request
 */
export class DatasetRequestDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => TemperatureRowDto)
  records!: TemperatureRowDto[];

  @IsOptional()
  @IsInt()
  @Min(1)
  window?: number;
}

export class AnalysisRequestDto extends DatasetRequestDto {
  /** Restricts the report tables to one city */
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  city?: string;
}

export class LiveAnalysisRequestDto extends DatasetRequestDto {
  @IsString()
  @IsNotEmpty()
  city!: string;

  /** Provider key; WEATHER_API_KEY is used when omitted */
  @IsOptional()
  @IsString()
  apiKey?: string;
}

export class ClassifyReadingRequestDto extends DatasetRequestDto {
  @IsString()
  @IsNotEmpty()
  city!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  temperature!: number;
}

/**
 * Rows are checked by the ingestion normalizer, not by the validation pipe
 */
export class ValidateDatasetRequestDto {
  @IsArray()
  records!: RawTemperatureRow[];
}
