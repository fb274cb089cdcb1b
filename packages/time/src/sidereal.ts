import { degreesToRadians, normalizeTo360Degrees } from "@skyframe/angles";

import { J2000, julianCentury } from "./timeScale.js";
import type { ApparentSiderealTime, MeanSiderealTime } from "./types.js";

/** Mean sidereal rate, degrees per day. */
export const SIDEREAL_DEGREES_PER_DAY = 360.98564736629;

/**
 * Mean sidereal time at Greenwich for a Julian day (UT), radians in `[0, 2π)`.
 *
 * Cubic in Julian centuries; reduced to `[0°, 360°)` before conversion.
 */
export function meanSiderealTime(jd: number): MeanSiderealTime {
  const t = julianCentury(jd);
  const degrees =
    280.46061837 + SIDEREAL_DEGREES_PER_DAY * (jd - J2000) + t * t * (0.000387933 - t / 38710000);
  return degreesToRadians(normalizeTo360Degrees(degrees)) as MeanSiderealTime;
}

/**
 * Apparent sidereal time at Greenwich, radians.
 *
 * Adds the equation of the equinoxes `Δψ cos ε` to the mean sidereal time. Not
 * re-normalized, so the result can sit marginally outside `[0, 2π)`.
 */
export function apparentSiderealTime(
  meanSidereal: number,
  nutationInLongitude: number,
  trueObliquity: number,
): ApparentSiderealTime {
  return (meanSidereal + nutationInLongitude * Math.cos(trueObliquity)) as ApparentSiderealTime;
}
