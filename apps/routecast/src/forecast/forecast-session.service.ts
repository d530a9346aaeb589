import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { issuedAtOf, type Route } from '@routecast/models';
import {
  DEFAULT_MATCH_TOLERANCE_SECONDS,
  FetchError,
  dateToUnixTimestamp,
  departureAt,
  unixTimestampToDate,
} from '@routecast/common';
import {
  InvalidSpeedError,
  align,
  assertValidSpeed,
  buildForecastCharts,
  extractSeries,
  type ChartSeries,
  type ForecastCharts,
  type LocationForecast,
  type SeriesField,
} from '@routecast/alignment';
import { GpxParseError } from '@routecast/gpx';
import { ForecastFetchService } from './forecast-fetch.service';
import type { DepartureDay } from './dto/forecast-query.dto';

export const MAX_STORED_RESULTS = 500;

export interface ForecastQuery {
  athleteId: string;
  routeId: string;
  speedKmh: number;
  day?: DepartureDay;
  hour?: number;
}

export interface ForecastResult {
  generation: number;
  athleteId: string;
  routeId: string;
  route: Route | null;
  /** Time of the first forecast hour Yr returned. */
  issuedAt: Date | null;
  /** Time origin of the arrival projection. */
  departure: Date | null;
  locationForecasts: readonly LocationForecast[];
  charts: ForecastCharts;
  /** A newer request for the same route started before this one finished. */
  stale: boolean;
}

/**
 * Runs forecast passes and keeps the latest result per athlete and route.
 *
 * Every request takes a new generation, becomes the latest pass for its
 * key and clears the stored result. A pass that finishes after a newer
 * one has started is returned to its caller marked stale and never stored.
 * At most MAX_STORED_RESULTS results are kept; the oldest goes first.
 */
@Injectable()
export class ForecastSessionService {
  private readonly logger = new Logger(ForecastSessionService.name);
  private lastGeneration = 0;
  private readonly latestPasses = new Map<string, number>();
  private readonly results = new Map<string, ForecastResult>();
  private readonly timeZone: string | undefined;
  private readonly toleranceSeconds: number;

  constructor(
    private readonly forecastFetchService: ForecastFetchService,
    configService: ConfigService,
  ) {
    this.timeZone = configService.get<string>('forecast.timeZone');
    this.toleranceSeconds = configService.get<number>(
      'forecast.matchToleranceSeconds',
      DEFAULT_MATCH_TOLERANCE_SECONDS,
    );
  }

  async requestForecast(query: ForecastQuery, now: Date = new Date()): Promise<ForecastResult> {
    assertValidSpeed(query.speedKmh);

    const key = this.sessionKey(query.athleteId, query.routeId);
    const generation = ++this.lastGeneration;
    this.latestPasses.set(key, generation);
    this.results.delete(key);

    let result: ForecastResult;
    try {
      result = await this.runPass(query, generation, now);
    } catch (error) {
      if (
        error instanceof InvalidSpeedError ||
        error instanceof FetchError ||
        error instanceof GpxParseError
      ) {
        this.finishPass(key, generation);
        throw error;
      }
      this.logger.error(
        `Forecast pass failed for route ${query.routeId}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        error instanceof Error ? error.stack : undefined,
      );
      result = this.emptyResult(query, generation);
    }

    if (!this.finishPass(key, generation)) {
      this.logger.debug(`Discarding stale forecast pass ${generation} for ${key}`);
      return { ...result, stale: true };
    }

    this.store(key, result);
    return result;
  }

  getLatest(athleteId: string, routeId: string): ForecastResult | null {
    return this.results.get(this.sessionKey(athleteId, routeId)) ?? null;
  }

  getSeries(
    athleteId: string,
    routeId: string,
    field: SeriesField,
    withLabels: boolean,
  ): ChartSeries | null {
    const latest = this.getLatest(athleteId, routeId);
    if (!latest) {
      return null;
    }
    return extractSeries(latest.locationForecasts, field, withLabels, this.timeZone);
  }

  private async runPass(query: ForecastQuery, generation: number, now: Date): Promise<ForecastResult> {
    const pairs = await this.forecastFetchService.fetchForecasts(query.routeId, query.athleteId);
    if (pairs.length === 0) {
      return this.emptyResult(query, generation);
    }

    const issuedAt = issuedAtOf(pairs[0].forecast);
    const departure = this.resolveDeparture(query, issuedAt, now);
    if (departure === null) {
      return { ...this.emptyResult(query, generation), route: pairs[0].route };
    }

    const locationForecasts = align(pairs, dateToUnixTimestamp(departure), query.speedKmh, {
      toleranceSeconds: this.toleranceSeconds,
      onMiss: (projection) =>
        this.logger.debug(`No forecast hour at ${projection.distanceKm} km on route ${query.routeId}`),
    });

    this.logger.log(
      `Aligned ${locationForecasts.length}/${pairs.length} locations on route ${pairs[0].route.name}`,
    );

    return {
      generation,
      athleteId: query.athleteId,
      routeId: query.routeId,
      route: pairs[0].route,
      issuedAt: issuedAt === null ? null : unixTimestampToDate(issuedAt),
      departure,
      locationForecasts,
      charts: buildForecastCharts(locationForecasts, this.timeZone),
      stale: false,
    };
  }

  /**
   * The requested departure hour wins; without one the projection starts
   * at the forecast's issue time.
   */
  private resolveDeparture(query: ForecastQuery, issuedAt: number | null, now: Date): Date | null {
    if (query.hour !== undefined) {
      return departureAt(query.hour, query.day === 'tomorrow' ? 1 : 0, now);
    }
    return issuedAt === null ? null : unixTimestampToDate(issuedAt);
  }

  private emptyResult(query: ForecastQuery, generation: number): ForecastResult {
    return {
      generation,
      athleteId: query.athleteId,
      routeId: query.routeId,
      route: null,
      issuedAt: null,
      departure: null,
      locationForecasts: [],
      charts: buildForecastCharts([], this.timeZone),
      stale: false,
    };
  }

  /**
   * Returns whether the pass is still the latest for its key, and forgets
   * the key's in-flight marker if so.
   */
  private finishPass(key: string, generation: number): boolean {
    if (this.latestPasses.get(key) !== generation) {
      return false;
    }
    this.latestPasses.delete(key);
    return true;
  }

  private store(key: string, result: ForecastResult): void {
    this.results.set(key, result);
    while (this.results.size > MAX_STORED_RESULTS) {
      const oldest = this.results.keys().next();
      if (oldest.done) break;
      this.results.delete(oldest.value);
    }
  }

  private sessionKey(athleteId: string, routeId: string): string {
    return JSON.stringify([athleteId, routeId]);
  }
}
