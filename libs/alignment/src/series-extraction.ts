import type { HourlySample } from '@routecast/models';
import { formatClock, roundTo, unixTimestampToDate } from '@routecast/common';
import { ChartEntry, ChartSeries, ForecastCharts, LocationForecast, SeriesField } from './alignment.types';

const PRIMARY_COLOR = '#FC4C02';
const SECONDARY_COLOR = '#4dc9fe';

interface SeriesDefinition {
  name: string;
  value: (sample: HourlySample) => number;
}

const SERIES_DEFINITIONS: Record<SeriesField, SeriesDefinition> = {
  temperature: {
    name: 'Temp °C',
    value: (sample) => roundTo(sample.temperature, 1),
  },
  rainChance: {
    name: 'Chance of Rain %',
    value: (sample) => roundTo(sample.precipitationProbability * 100),
  },
  cloudiness: {
    name: 'Cloudiness %',
    value: (sample) => sample.cloudiness,
  },
  uv: {
    name: 'UVI 0 (low) to 11+ (extreme)',
    value: (sample) => sample.uvIndex,
  },
  windSpeed: {
    name: 'Wind Speed m/s',
    value: (sample) => sample.windSpeed,
  },
  windGust: {
    name: 'Wind Gust m/s',
    value: (sample) => sample.windGust,
  },
};

/**
 * One chart entry per location forecast, in the same order. Labels are
 * the matched sample's own clock time, not the projected arrival.
 */
export function extractSeries(
  locationForecasts: readonly LocationForecast[],
  field: SeriesField,
  withLabels = true,
  timeZone?: string,
  color: string = PRIMARY_COLOR,
): ChartSeries {
  const definition = SERIES_DEFINITIONS[field];

  const entries = locationForecasts.map(({ sample }): ChartEntry => {
    const value = definition.value(sample);
    return {
      value,
      valueLabel: String(value),
      label: withLabels ? formatClock(unixTimestampToDate(sample.unixTimestamp), timeZone) : null,
    };
  });

  return { field, name: definition.name, color, entries };
}

/**
 * Series grouped per chart. Secondary series share the primary's x-axis
 * and are left unlabelled.
 */
export function buildForecastCharts(
  locationForecasts: readonly LocationForecast[],
  timeZone?: string,
): ForecastCharts {
  return {
    temperature: [extractSeries(locationForecasts, 'temperature', true, timeZone)],
    rainChance: [extractSeries(locationForecasts, 'rainChance', true, timeZone)],
    uv: [
      extractSeries(locationForecasts, 'uv', true, timeZone),
      extractSeries(locationForecasts, 'cloudiness', false, timeZone, SECONDARY_COLOR),
    ],
    wind: [
      extractSeries(locationForecasts, 'windSpeed', true, timeZone),
      extractSeries(locationForecasts, 'windGust', false, timeZone, SECONDARY_COLOR),
    ],
  };
}
