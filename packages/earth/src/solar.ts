import { normalizeTo360Degrees, normalizeToMinusPiPi, radiansToDegrees, degreesToRadians } from "@skyframe/angles";
import { horner, julianMillennium } from "@skyframe/time";

// Sun's mean longitude, degrees, in powers of Julian millennia.
const SUN_MEAN_LONGITUDE = [280.4664567, 360007.6982779, 0.03032028, 1 / 49931, -1 / 15300, -1 / 2000000] as const;

/**
 * Equation of time (apparent minus mean solar time), radians in `[-π, π)`.
 *
 * @param jd - Julian Ephemeris Day
 * @param sunRightAscension - apparent right ascension of the Sun, radians
 * @param nutationInLongitude - radians
 * @param trueObliquity - radians
 */
export function equationOfTime(
  jd: number,
  sunRightAscension: number,
  nutationInLongitude: number,
  trueObliquity: number,
): number {
  const meanLongitude = normalizeTo360Degrees(horner(julianMillennium(jd), SUN_MEAN_LONGITUDE));
  const degrees =
    meanLongitude -
    0.0057183 -
    radiansToDegrees(sunRightAscension) +
    radiansToDegrees(nutationInLongitude) * Math.cos(trueObliquity);

  return normalizeToMinusPiPi(degreesToRadians(degrees));
}

/**
 * Angle between the diurnal path of a body and the horizon at rising or
 * setting, radians. `NaN` for circumpolar or never-rising bodies.
 */
export function angleBetweenDiurnalPathAndHorizon(declination: number, observerLatitude: number): number {
  const b = Math.tan(declination) * Math.tan(observerLatitude);
  const c = Math.sqrt(1 - b * b);
  return Math.atan2(c * Math.cos(declination), Math.tan(observerLatitude));
}
