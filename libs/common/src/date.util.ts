import { SECONDS_PER_HOUR } from './constants';

export function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setDate(result.getDate() + days);
  return result;
}

export function dateToUnixTimestamp(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function unixTimestampToDate(unixTimestamp: number): Date {
  return new Date(unixTimestamp * 1000);
}

export function hoursToSeconds(hours: number): number {
  return hours * SECONDS_PER_HOUR;
}

/**
 * Local wall-clock time as "HH:MM" (24h). Without a time zone the
 * process zone is used.
 */
export function formatClock(date: Date, timeZone?: string): string {
  return date.toLocaleTimeString('en-GB', {
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
    timeZone,
  });
}

/**
 * Departure on the given day offset (0 = today) at a whole hour, in the
 * process time zone.
 */
export function departureAt(hour: number, dayOffset: number, now: Date = new Date()): Date {
  const departure = addDays(now, dayOffset);
  departure.setHours(hour, 0, 0, 0);
  return departure;
}
