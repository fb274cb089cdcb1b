import { EclipticPoint, EquatorialPoint } from "./points.js";

// `obliquity` is the true obliquity when the input is corrected for nutation,
// the mean obliquity otherwise.

export function eclipticLongitudeFromEquatorial(
  rightAscension: number,
  declination: number,
  obliquity: number,
): number {
  return Math.atan2(
    Math.sin(rightAscension) * Math.cos(obliquity) + Math.tan(declination) * Math.sin(obliquity),
    Math.cos(rightAscension),
  );
}

export function eclipticLatitudeFromEquatorial(
  rightAscension: number,
  declination: number,
  obliquity: number,
): number {
  return Math.asin(
    Math.sin(declination) * Math.cos(obliquity) -
      Math.cos(declination) * Math.sin(obliquity) * Math.sin(rightAscension),
  );
}

/**
 * Ecliptic coordinates of an equatorial direction.
 *
 * Longitude comes from `atan2` and lies in `(-π, π]`; it is not normalized.
 */
export function eclipticFromEquatorial(
  rightAscension: number,
  declination: number,
  obliquity: number,
): EclipticPoint {
  return new EclipticPoint(
    eclipticLongitudeFromEquatorial(rightAscension, declination, obliquity),
    eclipticLatitudeFromEquatorial(rightAscension, declination, obliquity),
  );
}

export function rightAscensionFromEcliptic(longitude: number, latitude: number, obliquity: number): number {
  return Math.atan2(
    Math.sin(longitude) * Math.cos(obliquity) - Math.tan(latitude) * Math.sin(obliquity),
    Math.cos(longitude),
  );
}

export function declinationFromEcliptic(longitude: number, latitude: number, obliquity: number): number {
  return Math.asin(
    Math.sin(latitude) * Math.cos(obliquity) + Math.cos(latitude) * Math.sin(obliquity) * Math.sin(longitude),
  );
}

/** Inverse of {@link eclipticFromEquatorial}. Right ascension lies in `(-π, π]`. */
export function equatorialFromEcliptic(longitude: number, latitude: number, obliquity: number): EquatorialPoint {
  return new EquatorialPoint(
    rightAscensionFromEcliptic(longitude, latitude, obliquity),
    declinationFromEcliptic(longitude, latitude, obliquity),
  );
}
