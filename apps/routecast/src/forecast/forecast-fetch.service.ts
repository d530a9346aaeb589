import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ForecastSet } from '@routecast/models';
import type { RouteForecastPair } from '@routecast/alignment';
import { GPX_PARSER, type GpxParser } from '@routecast/gpx';
import { STRAVA_CLIENT, type StravaClient } from '@routecast/strava';
import { WEATHER_PROVIDER, coordsKey, sampleRouteLocations, type WeatherProvider } from '@routecast/weather';

@Injectable()
export class ForecastFetchService {
  private readonly logger = new Logger(ForecastFetchService.name);

  constructor(
    @Inject(STRAVA_CLIENT)
    private readonly stravaClient: StravaClient,
    @Inject(WEATHER_PROVIDER)
    private readonly weatherProvider: WeatherProvider,
    @Inject(GPX_PARSER)
    private readonly gpxParser: GpxParser,
  ) {}

  /**
   * One (route, forecast set) pair per 10 km location along the route, in
   * route order. Empty when the route, its GPX or its locations are missing.
   *
   * Locations that round to the same coordinates (loops, out-and-back
   * routes) share one forecast request.
   */
  async fetchForecasts(routeId: string, athleteId: string): Promise<RouteForecastPair[]> {
    const route = await this.stravaClient.getRoute(routeId);
    if (!route) {
      this.logger.debug(`Route ${routeId} not found`);
      return [];
    }

    if (route.athleteId !== athleteId) {
      this.logger.warn(`Route ${routeId} does not belong to athlete ${athleteId}`);
      return [];
    }

    const gpx = await this.stravaClient.exportGpx(routeId);
    if (!gpx) {
      this.logger.debug(`No GPX export for route ${routeId}`);
      return [];
    }

    const parsed = this.gpxParser.parse(gpx);
    const locations = sampleRouteLocations(parsed.points);

    const forecasts = new Map<string, ForecastSet>();
    const pairs: RouteForecastPair[] = [];

    for (const location of locations) {
      const key = coordsKey(location);
      let forecast = forecasts.get(key);
      if (!forecast) {
        forecast = await this.weatherProvider.fetchForecastSet(location);
        forecasts.set(key, forecast);
      }
      pairs.push({ route, forecast });
    }

    this.logger.debug(
      `Fetched ${forecasts.size} forecasts for ${pairs.length} locations on route ${route.name}`,
    );
    return pairs;
  }
}
