export interface Coordinates {
  lat: number;
  lon: number;
}

/**
 * One forecast hour. Units: °C, probability as a 0–1 fraction,
 * cloudiness in %, m/s for wind, degrees for the "from" direction.
 */
export interface HourlySample {
  unixTimestamp: number;
  temperature: number;
  precipitationProbability: number;
  cloudiness: number;
  uvIndex: number;
  windSpeed: number;
  windGust: number;
  windDirection: number;
  /** Yr symbol code, e.g. "partlycloudy_day". */
  symbolCode: string;
}

/**
 * Hourly samples for one location along a route, in time order.
 * Not assumed contiguous or free of duplicates.
 */
export interface ForecastSet {
  location: Coordinates;
  samples: readonly HourlySample[];
}

export function issuedAtOf(forecastSet: ForecastSet): number | null {
  return forecastSet.samples.length > 0 ? forecastSet.samples[0].unixTimestamp : null;
}
