import { issuedAtOf } from './forecast.model';

describe('issuedAtOf', () => {
  it('is the first sample time', () => {
    const sample = {
      temperature: 10,
      precipitationProbability: 0,
      cloudiness: 0,
      uvIndex: 0,
      windSpeed: 1,
      windGust: 1,
      windDirection: 0,
      symbolCode: 'clearsky_day',
    };

    expect(
      issuedAtOf({
        location: { lat: 59.9, lon: 10.7 },
        samples: [
          { ...sample, unixTimestamp: 1717232400 },
          { ...sample, unixTimestamp: 1717228800 },
        ],
      }),
    ).toBe(1717232400);
  });

  it('is null for an empty forecast set', () => {
    expect(issuedAtOf({ location: { lat: 59.9, lon: 10.7 }, samples: [] })).toBeNull();
  });
});
