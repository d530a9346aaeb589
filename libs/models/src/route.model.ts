export interface Route {
  id: string;
  athleteId: string;
  name: string;
  /** Meters, as reported by Strava. */
  distance: number;
}
