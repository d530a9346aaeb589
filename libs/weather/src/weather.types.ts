import type { Coordinates } from '@routecast/models';

/**
 * A point on the route where a forecast is fetched, `distanceFromStart`
 * meters along the track.
 */
export interface RouteLocation extends Coordinates {
  distanceFromStart: number;
}

export function coordsKey(coords: Coordinates): string {
  return `${coords.lat.toFixed(4)},${coords.lon.toFixed(4)}`;
}
