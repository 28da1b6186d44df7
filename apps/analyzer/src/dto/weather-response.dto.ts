import { Type } from 'class-transformer';
import { IsNumber, IsObject, ValidateNested } from 'class-validator';

export class WeatherMainDto {
  @IsNumber({ allowNaN: false, allowInfinity: false })
  temp!: number;
}

/**
 * The part of a current-weather response the analyzer reads
 */
export class WeatherResponseDto {
  @IsObject()
  @ValidateNested()
  @Type(() => WeatherMainDto)
  main!: WeatherMainDto;
}
