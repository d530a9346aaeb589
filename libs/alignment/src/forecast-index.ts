import type { HourlySample } from '@routecast/models';
import { DEFAULT_MATCH_TOLERANCE_SECONDS } from '@routecast/common';

/**
 * First sample whose timestamp is within `toleranceSeconds` of the target.
 *
 * With the default tolerance this is an exact-match lookup, not a
 * nearest-neighbour search: a target between two forecast hours finds
 * nothing.
 */
export function findNearest(
  samples: readonly HourlySample[],
  targetUnixTimestamp: number,
  toleranceSeconds: number = DEFAULT_MATCH_TOLERANCE_SECONDS,
): HourlySample | null {
  for (const sample of samples) {
    if (Math.abs(sample.unixTimestamp - targetUnixTimestamp) < toleranceSeconds) {
      return sample;
    }
  }
  return null;
}
