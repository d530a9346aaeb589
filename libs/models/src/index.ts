export * from './route.model';
export * from './forecast.model';
