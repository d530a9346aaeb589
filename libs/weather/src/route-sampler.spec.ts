import { sampleRouteLocations } from './route-sampler';

/** Along the prime meridian 0.05° of latitude is about 5.56 km. */
function meridian(...lats: number[]) {
  return lats.map((lat) => ({ lat, lon: 0 }));
}

describe('sampleRouteLocations', () => {
  it('picks the first point past every 10 km', () => {
    const locations = sampleRouteLocations(meridian(0, 0.05, 0.1, 0.15, 0.2, 0.25));

    expect(locations.map((l) => l.lat)).toEqual([0.1, 0.2]);
    expect(locations[0].distanceFromStart).toBeCloseTo(11119.49, 1);
    expect(locations[1].distanceFromStart).toBeCloseTo(22238.99, 1);
  });

  it('repeats a point that spans several boundaries', () => {
    const locations = sampleRouteLocations(meridian(0, 0.25));

    expect(locations.map((l) => l.lat)).toEqual([0.25, 0.25]);
  });

  it('uses a custom segment size', () => {
    expect(sampleRouteLocations(meridian(0, 0.05, 0.1), 5000).map((l) => l.lat)).toEqual([0.05, 0.1]);
  });

  it('returns nothing for routes shorter than one segment', () => {
    expect(sampleRouteLocations(meridian(0, 0.05))).toEqual([]);
  });

  it('returns nothing for fewer than two points', () => {
    expect(sampleRouteLocations(meridian(0))).toEqual([]);
    expect(sampleRouteLocations([])).toEqual([]);
  });
});
