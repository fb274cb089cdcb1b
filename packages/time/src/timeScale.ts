import { monthOrdinal } from "./month.js";
import { horner } from "./polynomial.js";
import type { Month } from "./types.js";

/** Julian day of the J2000.0 epoch (2000-01-01 12:00 TT). */
export const J2000 = 2451545.0;

export const DAYS_PER_JULIAN_CENTURY = 36525.0;
export const DAYS_PER_JULIAN_MILLENNIUM = 365250.0;
export const SECONDS_PER_DAY = 86400.0;

/** Julian centuries since J2000.0. */
export function julianCentury(jd: number): number {
  return (jd - J2000) / DAYS_PER_JULIAN_CENTURY;
}

/** Julian millennia since J2000.0. */
export function julianMillennium(jd: number): number {
  return (jd - J2000) / DAYS_PER_JULIAN_MILLENNIUM;
}

/** Julian Ephemeris Day (TT) from a Julian day (UT) and ΔT in seconds. */
export function julianEphemerisDay(jd: number, deltaT: number): number {
  return jd + deltaT / SECONDS_PER_DAY;
}

/**
 * Lower bounds of the ΔT polynomial eras, in decimal years.
 *
 * Each era uses its own empirical fit; values jump at these boundaries and are
 * not meant to join up.
 */
export const DELTA_T_ERA_BOUNDARIES = [
  -500, 500, 1600, 1700, 1800, 1860, 1900, 1920, 1941, 1961, 1986, 2005, 2050, 2150,
] as const;

/** Decimal year used to select and evaluate the ΔT polynomial: middle of the month. */
export function deltaTDecimalYear(year: number, month: Month | number): number {
  const m = typeof month === "number" ? month : monthOrdinal(month);
  return year + (m - 0.5) / 12;
}

/**
 * Approximate ΔT = TT − UT in seconds.
 *
 * Piecewise polynomials by historical era (Espenak & Meeus), evaluated at the
 * middle of the given month. `month` is a {@link Month} or its 1..12 ordinal.
 */
export function deltaT(year: number, month: Month | number): number {
  return deltaTAtDecimalYear(deltaTDecimalYear(year, month));
}

/** {@link deltaT} evaluated directly at a decimal year. */
export function deltaTAtDecimalYear(y: number): number {
  if (y < -500) {
    return longTermParabola(y);
  }
  if (y < 500) {
    return horner(y / 100, [10583.6, -1014.41, 33.78311, -5.952053, -0.1798452, 0.022174192, 0.0090316521]);
  }
  if (y < 1600) {
    return horner((y - 1000) / 100, [1574.2, -556.01, 71.23472, 0.319781, -0.8503463, -0.005050998, 0.0083572073]);
  }
  if (y < 1700) {
    return horner(y - 1600, [120, -0.9808, -0.01532, 1 / 7129]);
  }
  if (y < 1800) {
    return horner(y - 1700, [8.83, 0.1603, -0.0059285, 0.00013336, -1 / 1174000]);
  }
  if (y < 1860) {
    return horner(y - 1800, [
      13.72, -0.332447, 0.0068612, 0.0041116, -0.00037436, 0.0000121272, -0.0000001699, 0.000000000875,
    ]);
  }
  if (y < 1900) {
    return horner(y - 1860, [7.62, 0.5737, -0.251754, 0.01680668, -0.0004473624, 1 / 233174]);
  }
  if (y < 1920) {
    return horner(y - 1900, [-2.79, 1.494119, -0.0598939, 0.0061966, -0.000197]);
  }
  if (y < 1941) {
    return horner(y - 1920, [21.2, 0.84493, -0.0761, 0.0020936]);
  }
  if (y < 1961) {
    return horner(y - 1950, [29.07, 0.407, -1 / 233, 1 / 2547]);
  }
  if (y < 1986) {
    return horner(y - 1975, [45.45, 1.067, -1 / 260, -1 / 718]);
  }
  if (y < 2005) {
    return horner(y - 2000, [63.86, 0.3345, -0.060374, 0.0017275, 0.000651814, 0.00002373599]);
  }
  if (y < 2050) {
    return horner(y - 2000, [62.92, 0.32217, 0.005589]);
  }
  if (y <= 2150) {
    return longTermParabola(y) - 0.5628 * (2150 - y);
  }
  if (y > 2150) {
    return longTermParabola(y);
  }

  // Only NaN gets here.
  return Number.NaN;
}

// Morrison & Stephenson long-term parabola, used outside the fitted eras.
function longTermParabola(y: number): number {
  const u = (y - 1820) / 100;
  return 32 * u * u - 20;
}
