import { TWO_PI, normalizeToTwoPi } from "@skyframe/angles";

// Times are years with decimals (e.g. 1987.62), periods in mean solar years,
// angles in radians.

/** Mean annual motion of the companion, radians per year. */
export function meanAnnualMotion(period: number): number {
  return TWO_PI / period;
}

/** Mean anomaly at `time` given the time of periastron passage. */
export function meanAnomaly(meanMotion: number, time: number, periastronTime: number): number {
  return meanMotion * (time - periastronTime);
}

/** Radius vector, in the units of `semiMajorAxis`. */
export function radiusVector(semiMajorAxis: number, eccentricity: number, eccentricAnomaly: number): number {
  return semiMajorAxis * (1 - eccentricity * Math.cos(eccentricAnomaly));
}

export function trueAnomaly(eccentricity: number, eccentricAnomaly: number): number {
  return 2 * Math.atan(Math.sqrt((1 + eccentricity) / (1 - eccentricity)) * Math.tan(eccentricAnomaly / 2));
}

/**
 * Apparent position angle of the companion, radians in `[0, 2π)`.
 *
 * @param ascendingNode - position angle of the ascending node
 * @param periastronLongitude - longitude of periastron (ω)
 */
export function apparentPositionAngle(
  ascendingNode: number,
  trueAnomaly: number,
  periastronLongitude: number,
  inclination: number,
): number {
  const u = trueAnomaly + periastronLongitude;
  return normalizeToTwoPi(Math.atan2(Math.sin(u) * Math.cos(inclination), Math.cos(u)) + ascendingNode);
}

/** Apparent separation of the pair, in the units of `radiusVector`. */
export function apparentSeparation(
  radiusVector: number,
  trueAnomaly: number,
  periastronLongitude: number,
  inclination: number,
): number {
  const u = trueAnomaly + periastronLongitude;
  const y = Math.sin(u) * Math.cos(inclination);
  const x = Math.cos(u);
  return radiusVector * Math.sqrt(y * y + x * x);
}

/** Eccentricity of the orbit as projected on the sky. */
export function eccentricityOfApparentOrbit(
  eccentricity: number,
  periastronLongitude: number,
  inclination: number,
): number {
  const e2 = eccentricity * eccentricity;
  const cosW = Math.cos(periastronLongitude);
  const sinW = Math.sin(periastronLongitude);
  const cosI = Math.cos(inclination);

  const a = (1 - e2 * cosW * cosW) * cosI * cosI;
  const b = e2 * sinW * cosW * cosI;
  const c = 1 - e2 * sinW * sinW;
  const d = Math.sqrt((a - c) * (a - c) + 4 * b * b);

  return Math.sqrt((2 * d) / (a + c + d));
}
