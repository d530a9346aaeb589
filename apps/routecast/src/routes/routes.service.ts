import { Inject, Injectable } from '@nestjs/common';
import type { Route } from '@routecast/models';
import { STRAVA_CLIENT, type StravaClient } from '@routecast/strava';

@Injectable()
export class RoutesService {
  constructor(
    @Inject(STRAVA_CLIENT)
    private readonly stravaClient: StravaClient,
  ) {}

  async findByAthlete(athleteId: string): Promise<Route[]> {
    return this.stravaClient.getRoutes(athleteId);
  }

  async findById(routeId: string): Promise<Route | null> {
    return this.stravaClient.getRoute(routeId);
  }
}
