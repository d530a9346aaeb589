import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { SERIES_FIELDS, type SeriesField } from '@routecast/alignment';

export class SeriesParamsDto {
  @IsString()
  @IsNotEmpty()
  athleteId!: string;

  @IsString()
  @IsNotEmpty()
  routeId!: string;

  @IsIn(SERIES_FIELDS)
  field!: SeriesField;
}

export const LABEL_FLAGS = ['true', 'false'] as const;

export class SeriesQueryDto {
  @IsOptional()
  @IsIn(LABEL_FLAGS)
  labels?: (typeof LABEL_FLAGS)[number];
}
