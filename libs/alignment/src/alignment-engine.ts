import { SEGMENT_SIZE_KM, DEFAULT_MATCH_TOLERANCE_SECONDS, windSector } from '@routecast/common';
import { AlignOptions, LocationForecast, RouteForecastPair } from './alignment.types';
import { assertValidSpeed, projectSegment } from './segment-projector';
import { findNearest } from './forecast-index';

/**
 * Aligns each route location's forecast to the time the rider is
 * expected to get there.
 *
 * Pair i is the location (i + 1) * segmentSizeKm from the start. Each
 * location's forecast set is searched for the sample at the projected
 * arrival time; locations without one are skipped (reported through
 * `onMiss`), never treated as errors.
 *
 * Throws InvalidSpeedError before looking at any pair.
 */
export function align(
  pairs: readonly RouteForecastPair[],
  issuedAtUnixTimestamp: number,
  speedKmh: number,
  options: AlignOptions = {},
): readonly LocationForecast[] {
  assertValidSpeed(speedKmh);

  const segmentSizeKm = options.segmentSizeKm ?? SEGMENT_SIZE_KM;
  const toleranceSeconds = options.toleranceSeconds ?? DEFAULT_MATCH_TOLERANCE_SECONDS;
  const locationForecasts: LocationForecast[] = [];

  pairs.forEach((pair, index) => {
    const projection = projectSegment(index, speedKmh, issuedAtUnixTimestamp, segmentSizeKm);
    const sample = findNearest(pair.forecast.samples, projection.arrivalUnixTimestamp, toleranceSeconds);

    if (!sample) {
      options.onMiss?.(projection, pair);
      return;
    }

    const sector = windSector(sample.windDirection);

    locationForecasts.push(
      Object.freeze({
        distanceKm: projection.distanceKm,
        sample,
        arrivalTime: new Date(projection.arrivalUnixTimestamp * 1000),
        weatherIcon: sample.symbolCode,
        windSector: sector.id,
        windIcon: sector.icon,
      }),
    );
  });

  return Object.freeze(locationForecasts);
}
