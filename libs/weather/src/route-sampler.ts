import { haversine } from '@routecast/gpx';
import type { Coordinates } from '@routecast/models';
import { SEGMENT_SIZE_METERS } from '@routecast/common';
import { RouteLocation } from './weather.types';

/**
 * Picks the forecast locations along a track: the first point at or past
 * every full `segmentSize` meters (10 km, 20 km, ...).
 *
 * The start point is not a location; a 25 km track yields two. When a
 * single track step spans several segment boundaries, the same point is
 * emitted for each of them so that list position keeps matching distance.
 */
export function sampleRouteLocations(
  points: Coordinates[],
  segmentSize: number = SEGMENT_SIZE_METERS,
): RouteLocation[] {
  if (points.length < 2 || segmentSize <= 0) return [];

  const locations: RouteLocation[] = [];
  let travelled = 0;
  let nextBoundary = segmentSize;

  for (let i = 1; i < points.length; i++) {
    travelled += haversine(points[i - 1], points[i]);

    while (travelled >= nextBoundary) {
      locations.push({
        lat: points[i].lat,
        lon: points[i].lon,
        distanceFromStart: travelled,
      });
      nextBoundary += segmentSize;
    }
  }

  return locations;
}
