import { degreesMinutesArcsecondsToDecimalDegrees, degreesToRadians } from "@skyframe/angles";

import { horner } from "./polynomial.js";
import { julianCentury } from "./timeScale.js";
import type { MeanObliquity, TrueObliquity } from "./types.js";

const arcsec = (s: number): number => s / 3600;

const EPSILON_0_DEG = degreesMinutesArcsecondsToDecimalDegrees(23, 26, 21.448);

// Laskar (1986), in powers of U = T / 100.
const LASKAR_COEFFICIENTS_DEG = [
  EPSILON_0_DEG,
  -arcsec(4680.93),
  -arcsec(1.55),
  arcsec(1999.25),
  -arcsec(51.38),
  -arcsec(249.67),
  -arcsec(39.05),
  arcsec(7.12),
  arcsec(27.87),
  arcsec(5.79),
  arcsec(2.45),
] as const;

// IAU 1980, in powers of T.
const IAU_COEFFICIENTS_DEG = [EPSILON_0_DEG, -arcsec(46.815), -arcsec(0.00059), arcsec(0.001813)] as const;

/**
 * Mean obliquity of the ecliptic using J. Laskar's formula.
 *
 * About 0.01" over 1000 years either side of J2000.0 and a few arcseconds over
 * 10000 years. Outside |T| < 100 centuries the polynomial is meaningless.
 */
export function meanObliquityLaskar(jd: number): MeanObliquity {
  const u = julianCentury(jd) / 100;
  return degreesToRadians(horner(u, LASKAR_COEFFICIENTS_DEG)) as MeanObliquity;
}

/**
 * Mean obliquity of the ecliptic using the IAU 1980 polynomial.
 *
 * Error reaches 1" over 2000 years from J2000.0 and about 10" over 4000 years.
 */
export function meanObliquityIau(jd: number): MeanObliquity {
  const t = julianCentury(jd);
  return degreesToRadians(horner(t, IAU_COEFFICIENTS_DEG)) as MeanObliquity;
}

/** True obliquity: mean obliquity plus nutation in obliquity (radians). */
export function trueObliquity(meanObliquity: number, nutationInObliquity: number): TrueObliquity {
  return (meanObliquity + nutationInObliquity) as TrueObliquity;
}
