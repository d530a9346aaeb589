import { registerAs } from '@nestjs/config';

export interface StravaConfig {
  apiUrl: string;
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export const stravaConfig = registerAs('strava', (): StravaConfig => ({
  apiUrl: process.env.STRAVA_API_URL || 'https://www.strava.com/api/v3',
  tokenUrl: process.env.STRAVA_TOKEN_URL || 'https://www.strava.com/oauth/token',
  clientId: process.env.STRAVA_CLIENT_ID || '',
  clientSecret: process.env.STRAVA_CLIENT_SECRET || '',
  refreshToken: process.env.STRAVA_REFRESH_TOKEN || '',
}));
