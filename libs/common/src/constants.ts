export const SEGMENT_SIZE_KM = 10;
export const SEGMENT_SIZE_METERS = SEGMENT_SIZE_KM * 1000;

/**
 * Arrival and sample timestamps must agree to within this many seconds.
 * Effectively an exact match on whole-second timestamps.
 */
export const DEFAULT_MATCH_TOLERANCE_SECONDS = 1e-9;

export const FETCH_TIMEOUT_MS = 10000;
export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 2000;

export const SECONDS_PER_HOUR = 3600;
