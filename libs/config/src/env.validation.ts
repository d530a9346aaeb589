import { plainToInstance, Type } from 'class-transformer';
import { IsIn, IsInt, IsNumber, IsOptional, IsString, IsUrl, Max, Min, validateSync } from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  PORT?: number;

  @IsOptional()
  @IsString()
  NODE_ENV?: string;

  @IsOptional()
  @IsString()
  API_SECRET_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  STRAVA_API_URL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  STRAVA_TOKEN_URL?: string;

  @IsOptional()
  @IsString()
  STRAVA_CLIENT_ID?: string;

  @IsOptional()
  @IsString()
  STRAVA_CLIENT_SECRET?: string;

  @IsOptional()
  @IsString()
  STRAVA_REFRESH_TOKEN?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  YR_API_URL?: string;

  @IsOptional()
  @IsString()
  YR_USER_AGENT?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(10)
  HTTP_RETRY_ATTEMPTS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  HTTP_RETRY_DELAY_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  HTTP_TIMEOUT_MS?: number;

  @IsOptional()
  @IsString()
  FORECAST_TIMEZONE?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  FORECAST_MATCH_TOLERANCE_SECONDS?: number;

  @IsOptional()
  @IsIn(['error', 'warn', 'log', 'debug', 'verbose'])
  LOG_LEVEL?: string;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validatedConfig;
}
