export * from './strava.types';
export * from './strava-client.interface';
export * from './strava-http.client';
export * from './strava.module';
