export * from './env.validation';
export * from './strava.config';
export * from './http.config';
export * from './forecast.config';
