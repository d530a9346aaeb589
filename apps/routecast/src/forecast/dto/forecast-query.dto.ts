import { IsIn, IsInt, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, Max, Min } from 'class-validator';

export const DEPARTURE_DAYS = ['today', 'tomorrow'] as const;
export type DepartureDay = (typeof DEPARTURE_DAYS)[number];

export class ForecastQueryDto {
  @IsString()
  @IsNotEmpty()
  athleteId!: string;

  @IsString()
  @IsNotEmpty()
  routeId!: string;

  @IsNumber()
  @IsPositive()
  speedKmh!: number;

  @IsOptional()
  @IsIn(DEPARTURE_DAYS)
  day?: DepartureDay;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(23)
  hour?: number;
}
