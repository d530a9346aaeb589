/**
 * Half-up rounding: ties go towards +∞, as with Math.round.
 *
 * The scaled value is trimmed to 12 significant digits first so that
 * binary representation error (0.285 * 100 = 28.499999999999996) does
 * not move it off a tie.
 */
export function roundTo(value: number, decimals = 0): number {
  const factor = 10 ** decimals;
  return Math.round(Number((value * factor).toPrecision(12))) / factor;
}

/**
 * Rounds to the nearest integer, ties to the even neighbour
 * (2.5 → 2, 3.5 → 4).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  if (value - floor !== 0.5) {
    return Math.round(value);
  }
  return floor % 2 === 0 ? floor : floor + 1;
}
