import {
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Min,
} from 'class-validator';
import { Type } from 'class-transformer';

export class ForecastQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  global_id_local?: number; // IPMA globalIdLocal; locality is required without it

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @Matches(/\S/, { message: 'locality must not be blank' })
  locality?: string; // Case-insensitive locality name

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  district_id?: number; // IPMA idDistrito, disambiguates repeated names
}

export class DayForecastQueryDto extends ForecastQueryDto {
  @Matches(/^\d{4}-\d{2}-\d{2}$/, {
    message: 'forecast_date must be in YYYY-MM-DD format',
  })
  @IsISO8601({ strict: true })
  forecast_date!: string;
}
