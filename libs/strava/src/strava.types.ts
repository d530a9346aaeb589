/**
 * The subset of Strava's route representation that is read here.
 */
export interface StravaRouteResponse {
  id: number;
  id_str?: string;
  name: string;
  distance: number;
  athlete: { id: number };
}

export interface StravaTokenResponse {
  access_token: string;
  refresh_token: string;
  expires_at: number;
}

export function isStravaRouteResponse(value: unknown): value is StravaRouteResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'distance' in value &&
    typeof value.distance === 'number' &&
    'athlete' in value &&
    typeof value.athlete === 'object' &&
    value.athlete !== null &&
    'id' in value.athlete &&
    typeof value.athlete.id === 'number'
  );
}

export function isStravaTokenResponse(value: unknown): value is StravaTokenResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'access_token' in value &&
    typeof value.access_token === 'string' &&
    'expires_at' in value &&
    typeof value.expires_at === 'number'
  );
}
