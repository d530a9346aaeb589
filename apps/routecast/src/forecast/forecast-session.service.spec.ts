import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { FetchError } from '@routecast/common';
import { InvalidSpeedError, type RouteForecastPair } from '@routecast/alignment';
import { GpxParseError } from '@routecast/gpx';
import type { HourlySample, Route } from '@routecast/models';
import { ForecastFetchService } from './forecast-fetch.service';
import { ForecastSessionService, MAX_STORED_RESULTS, type ForecastQuery } from './forecast-session.service';

/** 2024-06-01T08:00:00Z */
const ISSUED_AT = 1717228800;

const route: Route = { id: 'route-1', athleteId: 'athlete-1', name: 'Fjord Loop', distance: 25000 };

const query: ForecastQuery = { athleteId: 'athlete-1', routeId: 'route-1', speedKmh: 10 };

function sampleAt(unixTimestamp: number, temperature = 14.26): HourlySample {
  return {
    unixTimestamp,
    temperature,
    precipitationProbability: 0.35,
    cloudiness: 40,
    uvIndex: 2.1,
    windSpeed: 3.5,
    windGust: 6.2,
    windDirection: 90,
    symbolCode: 'cloudy',
  };
}

function pairs(...timestamps: number[]): RouteForecastPair[] {
  const samples = timestamps.map((ts) => sampleAt(ts));
  return [
    { route, forecast: { location: { lat: 59.9, lon: 10.7 }, samples } },
    { route, forecast: { location: { lat: 60, lon: 10.7 }, samples } },
  ];
}

describe('ForecastSessionService', () => {
  let service: ForecastSessionService;
  let fetchForecasts: jest.Mock<Promise<RouteForecastPair[]>, [string, string]>;

  beforeEach(async () => {
    fetchForecasts = jest.fn();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ForecastSessionService,
        { provide: ForecastFetchService, useValue: { fetchForecasts } },
        {
          provide: ConfigService,
          useValue: new ConfigService({ forecast: { timeZone: 'UTC', matchToleranceSeconds: 1e-9 } }),
        },
      ],
    }).compile();

    service = module.get(ForecastSessionService);
  });

  it('projects arrivals from the forecast issue time when no departure is given', async () => {
    fetchForecasts.mockResolvedValue(pairs(ISSUED_AT, ISSUED_AT + 3600, ISSUED_AT + 7200));

    const result = await service.requestForecast(query);

    expect(fetchForecasts).toHaveBeenCalledWith('route-1', 'athlete-1');
    expect(result.stale).toBe(false);
    expect(result.route).toBe(route);
    expect(result.issuedAt).toEqual(new Date('2024-06-01T08:00:00Z'));
    expect(result.departure).toEqual(new Date('2024-06-01T08:00:00Z'));
    expect(result.locationForecasts.map((lf) => lf.distanceKm)).toEqual([10, 20]);
    expect(result.locationForecasts.map((lf) => lf.windIcon)).toEqual(['wind_e', 'wind_e']);
    expect(result.charts.temperature[0].entries).toEqual([
      { value: 14.3, valueLabel: '14.3', label: '09:00' },
      { value: 14.3, valueLabel: '14.3', label: '10:00' },
    ]);
    expect(service.getLatest('athlete-1', 'route-1')).toBe(result);
  });

  it('projects arrivals from the requested departure hour', async () => {
    const now = new Date(2024, 5, 1, 6, 30);
    const departure = new Date(2024, 5, 2, 9, 0, 0, 0);
    const departureTs = departure.getTime() / 1000;
    fetchForecasts.mockResolvedValue(pairs(ISSUED_AT, departureTs + 3600, departureTs + 7200));

    const result = await service.requestForecast({ ...query, day: 'tomorrow', hour: 9 }, now);

    expect(result.departure).toEqual(departure);
    expect(result.issuedAt).toEqual(new Date('2024-06-01T08:00:00Z'));
    expect(result.locationForecasts.map((lf) => lf.sample.unixTimestamp)).toEqual([
      departureTs + 3600,
      departureTs + 7200,
    ]);
  });

  it('skips locations without a forecast for the arrival hour', async () => {
    fetchForecasts.mockResolvedValue(pairs(ISSUED_AT, ISSUED_AT + 7200));

    const result = await service.requestForecast(query);

    expect(result.locationForecasts.map((lf) => lf.distanceKm)).toEqual([20]);
  });

  it('marks an overtaken pass as stale and keeps the newer result', async () => {
    let releaseFirst: (value: RouteForecastPair[]) => void = () => undefined;
    fetchForecasts
      .mockReturnValueOnce(
        new Promise((resolve) => {
          releaseFirst = resolve;
        }),
      )
      .mockResolvedValueOnce(pairs(ISSUED_AT, ISSUED_AT + 3600, ISSUED_AT + 7200));

    const first = service.requestForecast(query);
    const second = await service.requestForecast(query);
    releaseFirst(pairs(ISSUED_AT, ISSUED_AT + 3600));
    const overtaken = await first;

    expect(overtaken.stale).toBe(true);
    expect(overtaken.generation).toBe(1);
    expect(second.stale).toBe(false);
    expect(second.generation).toBe(2);
    expect(service.getLatest('athlete-1', 'route-1')).toBe(second);
  });

  it('clears the stored result when a new pass starts', async () => {
    fetchForecasts.mockResolvedValueOnce(pairs(ISSUED_AT, ISSUED_AT + 3600));
    await service.requestForecast(query);

    fetchForecasts.mockReturnValueOnce(new Promise(() => undefined));
    void service.requestForecast(query);

    expect(service.getLatest('athlete-1', 'route-1')).toBeNull();
  });

  it('propagates upstream failures', async () => {
    fetchForecasts.mockRejectedValue(new FetchError('HTTP 503 Service Unavailable', 'https://strava.test', 503));

    await expect(service.requestForecast(query)).rejects.toBeInstanceOf(FetchError);
    expect(service.getLatest('athlete-1', 'route-1')).toBeNull();
  });

  it('propagates unreadable GPX exports', async () => {
    fetchForecasts.mockRejectedValue(new GpxParseError('GPX file contains no track points'));

    await expect(service.requestForecast(query)).rejects.toBeInstanceOf(GpxParseError);
    expect(service.getLatest('athlete-1', 'route-1')).toBeNull();
  });

  it('turns unexpected failures into an empty result', async () => {
    fetchForecasts.mockRejectedValue(new Error('boom'));

    const result = await service.requestForecast(query);

    expect(result.route).toBeNull();
    expect(result.locationForecasts).toEqual([]);
    expect(result.charts.temperature[0].entries).toEqual([]);
    expect(service.getLatest('athlete-1', 'route-1')).toBe(result);
  });

  it('rejects a non-positive speed before fetching', async () => {
    await expect(service.requestForecast({ ...query, speedKmh: 0 })).rejects.toBeInstanceOf(InvalidSpeedError);
    expect(fetchForecasts).not.toHaveBeenCalled();
  });

  it('returns an empty result for a route without locations', async () => {
    fetchForecasts.mockResolvedValue([]);

    const result = await service.requestForecast(query);

    expect(result.locationForecasts).toEqual([]);
    expect(result.departure).toBeNull();
  });

  it('keeps the route but aligns nothing when the first forecast set is empty', async () => {
    fetchForecasts.mockResolvedValue([
      { route, forecast: { location: { lat: 59.9, lon: 10.7 }, samples: [] } },
      { route, forecast: { location: { lat: 60, lon: 10.7 }, samples: [sampleAt(ISSUED_AT + 7200)] } },
    ]);

    const result = await service.requestForecast(query);

    expect(result.route).toBe(route);
    expect(result.issuedAt).toBeNull();
    expect(result.departure).toBeNull();
    expect(result.locationForecasts).toEqual([]);
    expect(result.stale).toBe(false);
  });

  it('keeps sessions apart when ids contain separators', async () => {
    fetchForecasts.mockResolvedValue(pairs(ISSUED_AT, ISSUED_AT + 3600, ISSUED_AT + 7200));

    const first = await service.requestForecast({ ...query, athleteId: 'a:b', routeId: 'c' });
    const second = await service.requestForecast({ ...query, athleteId: 'a', routeId: 'b:c' });

    expect(first.stale).toBe(false);
    expect(service.getLatest('a:b', 'c')).toBe(first);
    expect(service.getLatest('a', 'b:c')).toBe(second);
  });

  it('drops the oldest stored result once the limit is reached', async () => {
    fetchForecasts.mockResolvedValue([]);

    for (let i = 0; i <= MAX_STORED_RESULTS; i++) {
      await service.requestForecast({ ...query, routeId: `route-${i}` });
    }

    expect(service.getLatest('athlete-1', 'route-0')).toBeNull();
    expect(service.getLatest('athlete-1', 'route-1')).not.toBeNull();
    expect(service.getLatest('athlete-1', `route-${MAX_STORED_RESULTS}`)).not.toBeNull();
  });

  it('does not mistake an old pass for a newer one after a pass completes', async () => {
    let releaseFirst: (value: RouteForecastPair[]) => void = () => undefined;
    fetchForecasts
      .mockReturnValueOnce(
        new Promise((resolve) => {
          releaseFirst = resolve;
        }),
      )
      .mockResolvedValueOnce(pairs(ISSUED_AT, ISSUED_AT + 3600))
      .mockReturnValueOnce(new Promise(() => undefined));

    const first = service.requestForecast(query);
    await service.requestForecast(query);
    void service.requestForecast(query);
    releaseFirst(pairs(ISSUED_AT, ISSUED_AT + 3600));

    expect((await first).stale).toBe(true);
    expect(service.getLatest('athlete-1', 'route-1')).toBeNull();
  });

  describe('getSeries', () => {
    it('extracts one series from the latest result', async () => {
      fetchForecasts.mockResolvedValue(pairs(ISSUED_AT, ISSUED_AT + 3600, ISSUED_AT + 7200));
      await service.requestForecast(query);

      const series = service.getSeries('athlete-1', 'route-1', 'rainChance', false);

      expect(series).toEqual({
        field: 'rainChance',
        name: 'Chance of Rain %',
        color: '#FC4C02',
        entries: [
          { value: 35, valueLabel: '35', label: null },
          { value: 35, valueLabel: '35', label: null },
        ],
      });
    });

    it('returns null before any pass', () => {
      expect(service.getSeries('athlete-1', 'route-1', 'uv', true)).toBeNull();
    });
  });
});
