import { degreesToRadians } from "@skyframe/angles";

import { julianCentury } from "./timeScale.js";
import type { Nutation } from "./types.js";

const ARCSEC_RAD = Math.PI / (180 * 3600);

/**
 * Low-precision nutation from the four largest terms.
 *
 * Accurate to about 0.5" in Δψ and 0.1" in Δε, enough for apparent sidereal
 * time to ~0.03s. Callers needing more supply their own `NutationProvider`.
 *
 * @param jd - Julian Ephemeris Day
 */
export function lowPrecisionNutation(jd: number): Nutation {
  const t = julianCentury(jd);

  // Longitude of the Moon's ascending node, mean longitudes of Sun and Moon.
  const omega = degreesToRadians(125.04452 - 1934.136261 * t);
  const sunL = degreesToRadians(280.4665 + 36000.7698 * t);
  const moonL = degreesToRadians(218.3165 + 481267.8813 * t);

  const dpsi =
    -17.2 * Math.sin(omega) -
    1.32 * Math.sin(2 * sunL) -
    0.23 * Math.sin(2 * moonL) +
    0.21 * Math.sin(2 * omega);

  const deps =
    9.2 * Math.cos(omega) +
    0.57 * Math.cos(2 * sunL) +
    0.1 * Math.cos(2 * moonL) -
    0.09 * Math.cos(2 * omega);

  return {
    nutationInLongitude: dpsi * ARCSEC_RAD,
    nutationInObliquity: deps * ARCSEC_RAD,
  };
}
