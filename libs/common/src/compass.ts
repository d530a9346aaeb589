import { roundHalfEven } from './number.util';

export const SECTOR_DEGREES = 22.5;

export interface WindSector {
  id: number;
  label: string;
  icon: string;
}

const LABELS = [
  'N', 'NNE', 'NE', 'ENE',
  'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW',
  'W', 'WNW', 'NW', 'NNW',
] as const;

export const WIND_SECTORS: readonly WindSector[] = LABELS.map((label, id) => ({
  id,
  label,
  icon: `wind_${label.toLowerCase()}`,
}));

/**
 * Maps a "from" wind direction in degrees to one of 16 compass sectors.
 * Ties go to the even sector, so 56.25° is NE and 348.75° rounds to 16
 * and wraps to 0 (N).
 */
export function windSectorFromDegrees(degrees: number): number {
  const sector = roundHalfEven(degrees / SECTOR_DEGREES) % WIND_SECTORS.length;
  return (sector + WIND_SECTORS.length) % WIND_SECTORS.length;
}

export function windSector(degrees: number): WindSector {
  return WIND_SECTORS[windSectorFromDegrees(degrees)];
}
