import { IsInt, IsOptional, IsString } from 'class-validator';
import { Type } from 'class-transformer';
import { Locality } from '../ipma/ipma.types';

export class LocalitiesQueryDto {
  @IsOptional()
  @IsString()
  q?: string; // Case-insensitive substring of the locality name

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  district_id?: number;
}

export interface LocalitiesListResponse {
  count: number;
  data: Locality[];
}
