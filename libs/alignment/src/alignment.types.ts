import type { ForecastSet, HourlySample, Route } from '@routecast/models';

export interface RouteForecastPair {
  route: Route;
  forecast: ForecastSet;
}

export interface SegmentProjection {
  index: number;
  distanceKm: number;
  arrivalUnixTimestamp: number;
}

export interface LocationForecast {
  distanceKm: number;
  /** Shared with the source ForecastSet, never copied. */
  sample: HourlySample;
  arrivalTime: Date;
  weatherIcon: string;
  windSector: number;
  windIcon: string;
}

export interface AlignOptions {
  segmentSizeKm?: number;
  toleranceSeconds?: number;
  onMiss?: (projection: SegmentProjection, pair: RouteForecastPair) => void;
}

export type SeriesField = 'temperature' | 'rainChance' | 'cloudiness' | 'uv' | 'windSpeed' | 'windGust';

export const SERIES_FIELDS: readonly SeriesField[] = [
  'temperature',
  'rainChance',
  'cloudiness',
  'uv',
  'windSpeed',
  'windGust',
];

export interface ChartEntry {
  value: number;
  valueLabel: string;
  label: string | null;
}

export interface ChartSeries {
  field: SeriesField;
  name: string;
  color: string;
  entries: ChartEntry[];
}

export interface ForecastCharts {
  temperature: ChartSeries[];
  rainChance: ChartSeries[];
  uv: ChartSeries[];
  wind: ChartSeries[];
}
