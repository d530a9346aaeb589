import { registerAs } from '@nestjs/config';
import { DEFAULT_MATCH_TOLERANCE_SECONDS } from '@routecast/common';

export interface ForecastConfig {
  timeZone: string | undefined;
  matchToleranceSeconds: number;
}

export const forecastConfig = registerAs('forecast', (): ForecastConfig => ({
  timeZone: process.env.FORECAST_TIMEZONE || undefined,
  matchToleranceSeconds: process.env.FORECAST_MATCH_TOLERANCE_SECONDS
    ? parseFloat(process.env.FORECAST_MATCH_TOLERANCE_SECONDS)
    : DEFAULT_MATCH_TOLERANCE_SECONDS,
}));
