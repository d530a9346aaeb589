import type { Coordinates } from '@routecast/models';

const EARTH_RADIUS_METERS = 6371000;

export const toRad = (deg: number): number => (deg * Math.PI) / 180;

/**
 * Great-circle distance on a sphere of Earth's mean radius.
 *
 * @returns Distance in meters
 */
export function haversine(p1: Coordinates, p2: Coordinates): number {
  const dLat = toRad(p2.lat - p1.lat);
  const dLon = toRad(p2.lon - p1.lon);

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(p1.lat)) * Math.cos(toRad(p2.lat)) * Math.sin(dLon / 2) ** 2;

  return EARTH_RADIUS_METERS * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

export function trackLength(points: Coordinates[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += haversine(points[i - 1], points[i]);
  }
  return total;
}
