import type { ForecastSet, HourlySample, Route } from '@routecast/models';
import type { RouteForecastPair } from '../alignment.types';

/** 2024-06-01T08:00:00Z */
export const ISSUED_AT = 1717228800;

export const route: Route = {
  id: 'route-1',
  athleteId: 'athlete-1',
  name: 'Fjord Loop',
  distance: 42000,
};

export function sampleAt(unixTimestamp: number, overrides: Partial<HourlySample> = {}): HourlySample {
  return {
    unixTimestamp,
    temperature: 14.2,
    precipitationProbability: 0.1,
    cloudiness: 40,
    uvIndex: 2.1,
    windSpeed: 3.5,
    windGust: 6.2,
    windDirection: 180,
    symbolCode: 'partlycloudy_day',
    ...overrides,
  };
}

export function forecastSet(samples: HourlySample[]): ForecastSet {
  return { location: { lat: 59.9, lon: 10.7 }, samples };
}

export function pair(samples: HourlySample[]): RouteForecastPair {
  return { route, forecast: forecastSet(samples) };
}
