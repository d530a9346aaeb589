import type { Coordinates } from '@routecast/models';

export interface RoutePoint extends Coordinates {
  ele?: number;
}

export interface ParsedRoute {
  name: string;
  points: RoutePoint[];
  /** Meters along the track. */
  distance: number;
}

export interface GpxParser {
  parse(gpxContent: string): ParsedRoute;
}

export const GPX_PARSER = Symbol('GPX_PARSER');
