import { SEGMENT_SIZE_KM, hoursToSeconds } from '@routecast/common';
import { InvalidSpeedError } from './alignment.errors';
import { SegmentProjection } from './alignment.types';

export function assertValidSpeed(speedKmh: number): void {
  if (!Number.isFinite(speedKmh) || speedKmh <= 0) {
    throw new InvalidSpeedError(speedKmh);
  }
}

/**
 * Projects the arrival time at the end of segment `index`.
 *
 * Distance is taken from the position in the list ((index + 1) * segment
 * size), not from the route geometry.
 */
export function projectSegment(
  index: number,
  speedKmh: number,
  issuedAtUnixTimestamp: number,
  segmentSizeKm: number = SEGMENT_SIZE_KM,
): SegmentProjection {
  assertValidSpeed(speedKmh);

  const distanceKm = (index + 1) * segmentSizeKm;
  const travelTimeHours = distanceKm / speedKmh;

  return {
    index,
    distanceKm,
    arrivalUnixTimestamp: issuedAtUnixTimestamp + hoursToSeconds(travelTimeHours),
  };
}

export function projectSegments(
  count: number,
  speedKmh: number,
  issuedAtUnixTimestamp: number,
  segmentSizeKm: number = SEGMENT_SIZE_KM,
): SegmentProjection[] {
  assertValidSpeed(speedKmh);

  const projections: SegmentProjection[] = [];
  for (let i = 0; i < count; i++) {
    projections.push(projectSegment(i, speedKmh, issuedAtUnixTimestamp, segmentSizeKm));
  }
  return projections;
}
