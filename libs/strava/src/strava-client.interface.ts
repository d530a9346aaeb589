import type { Route } from '@routecast/models';

export interface StravaClient {
  getRoutes(athleteId: string): Promise<Route[]>;
  getRoute(routeId: string): Promise<Route | null>;
  exportGpx(routeId: string): Promise<string | null>;
}

export const STRAVA_CLIENT = Symbol('STRAVA_CLIENT');
