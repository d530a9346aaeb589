import { Logger } from '@nestjs/common';
import type { Coordinates, ForecastSet, HourlySample } from '@routecast/models';
import { DEFAULT_RETRY_OPTIONS, FetchError, RetryOptions, dateToUnixTimestamp, fetchWithRetry } from '@routecast/common';
import { WeatherProvider } from '../weather-provider.interface';

interface YrInstantDetails {
  air_temperature?: number;
  cloud_area_fraction?: number;
  ultraviolet_index_clear_sky?: number;
  wind_speed?: number;
  wind_speed_of_gust?: number;
  wind_from_direction?: number;
}

interface YrPeriod {
  summary?: { symbol_code?: string };
  details?: { probability_of_precipitation?: number };
}

interface YrTimeseriesEntry {
  time: string;
  data: {
    instant: { details: YrInstantDetails };
    next_1_hours?: YrPeriod;
    next_6_hours?: YrPeriod;
  };
}

interface YrResponse {
  properties: {
    timeseries: YrTimeseriesEntry[];
  };
}

export interface YrProviderOptions {
  apiUrl: string;
  userAgent: string;
  retry?: RetryOptions;
}

function isYrResponse(value: unknown): value is YrResponse {
  if (typeof value !== 'object' || value === null || !('properties' in value)) {
    return false;
  }
  const { properties } = value;
  return (
    typeof properties === 'object' &&
    properties !== null &&
    'timeseries' in properties &&
    Array.isArray(properties.timeseries)
  );
}

/**
 * MET Norway Locationforecast 2.0 ("complete" variant, which carries UV
 * and precipitation probability).
 */
export class YrProvider implements WeatherProvider {
  private readonly logger = new Logger(YrProvider.name);

  constructor(private readonly options: YrProviderOptions) {}

  async fetchForecastSet(location: Coordinates): Promise<ForecastSet> {
    // met.no rejects more than 4 decimals.
    const lat = Number(location.lat.toFixed(4));
    const lon = Number(location.lon.toFixed(4));

    const url = new URL(`${this.options.apiUrl}/complete`);
    url.searchParams.set('lat', String(lat));
    url.searchParams.set('lon', String(lon));

    const response = await fetchWithRetry(
      url.toString(),
      {
        headers: {
          Accept: 'application/json',
          'User-Agent': this.options.userAgent,
        },
      },
      this.options.retry ?? DEFAULT_RETRY_OPTIONS,
    );

    if (response.status === 404) {
      this.logger.debug(`No Yr forecast for ${lat},${lon}`);
      return { location: { lat, lon }, samples: [] };
    }

    const data: unknown = await response.json();
    if (!isYrResponse(data)) {
      throw new FetchError('Unexpected Yr response shape', url.toString(), response.status);
    }

    return {
      location: { lat, lon },
      samples: data.properties.timeseries.map((entry) => this.toHourlySample(entry)),
    };
  }

  private toHourlySample(entry: YrTimeseriesEntry): HourlySample {
    const details = entry.data.instant.details;
    const period = entry.data.next_1_hours ?? entry.data.next_6_hours;
    const windSpeed = details.wind_speed ?? 0;

    return {
      unixTimestamp: dateToUnixTimestamp(new Date(entry.time)),
      temperature: details.air_temperature ?? 0,
      precipitationProbability: (period?.details?.probability_of_precipitation ?? 0) / 100,
      cloudiness: details.cloud_area_fraction ?? 0,
      uvIndex: details.ultraviolet_index_clear_sky ?? 0,
      windSpeed,
      windGust: details.wind_speed_of_gust ?? windSpeed,
      windDirection: details.wind_from_direction ?? 0,
      symbolCode: period?.summary?.symbol_code ?? '',
    };
  }
}
