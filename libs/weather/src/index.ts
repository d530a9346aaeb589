export * from './weather.types';
export * from './weather.config';
export * from './weather-provider.interface';
export * from './providers';
export * from './route-sampler';
export * from './weather.module';
