import type { Coordinates, ForecastSet } from '@routecast/models';

export interface WeatherProvider {
  fetchForecastSet(location: Coordinates): Promise<ForecastSet>;
}

export const WEATHER_PROVIDER = Symbol('WEATHER_PROVIDER');
