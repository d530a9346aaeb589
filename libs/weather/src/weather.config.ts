import { registerAs } from '@nestjs/config';

export interface WeatherConfig {
  yrApiUrl: string;
  userAgent: string;
}

export const weatherConfig = registerAs('weather', (): WeatherConfig => ({
  yrApiUrl: process.env.YR_API_URL || 'https://api.met.no/weatherapi/locationforecast/2.0',
  userAgent: process.env.YR_USER_AGENT || 'routecast/0.1 (route weather along cycling routes)',
}));
