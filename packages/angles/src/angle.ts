/** Full turn in radians. */
export const TWO_PI = 2 * Math.PI;

const DEG_PER_RAD = 180 / Math.PI;

export function degreesToRadians(degrees: number): number {
  return degrees / DEG_PER_RAD;
}

export function radiansToDegrees(radians: number): number {
  return radians * DEG_PER_RAD;
}

/** Hours of right ascension (or hour angle) to radians; 24h = 2π. */
export function hoursToRadians(hours: number): number {
  return degreesToRadians(hours * 15);
}

function wrap(value: number, period: number): number {
  if (!Number.isFinite(value)) return value;
  const r = ((value % period) + period) % period;
  // `(-tiny % p) + p` rounds up to exactly `p`.
  return r === period ? 0 : r;
}

/** Reduce an angle in degrees into `[0, 360)`. */
export function normalizeTo360Degrees(degrees: number): number {
  return wrap(degrees, 360);
}

/** Reduce an angle in radians into `[0, 2π)`. */
export function normalizeToTwoPi(radians: number): number {
  return wrap(radians, TWO_PI);
}

/** Reduce an angle in radians into `[-π, π)`. */
export function normalizeToMinusPiPi(radians: number): number {
  if (!Number.isFinite(radians)) return radians;
  return wrap(radians + Math.PI, TWO_PI) - Math.PI;
}

function signOfFirstNonZero(parts: readonly number[]): 1 | -1 {
  for (const p of parts) {
    if (p !== 0) return p < 0 ? -1 : 1;
  }
  return 1;
}

/**
 * Sexagesimal degrees/arcminutes/arcseconds to decimal degrees.
 *
 * The sign of the first non-zero component applies to the whole value, so both
 * `(-23, 26, 21)` and `(0, -4, 30)` describe negative angles.
 */
export function degreesMinutesArcsecondsToDecimalDegrees(
  degrees: number,
  arcminutes: number,
  arcseconds: number,
): number {
  const sign = signOfFirstNonZero([degrees, arcminutes, arcseconds]);
  return sign * (Math.abs(degrees) + Math.abs(arcminutes) / 60 + Math.abs(arcseconds) / 3600);
}

/** Hours/minutes/seconds to decimal hours, with the same sign rule as the degree form. */
export function hoursMinutesSecondsToDecimalHours(hours: number, minutes: number, seconds: number): number {
  return degreesMinutesArcsecondsToDecimalDegrees(hours, minutes, seconds);
}
