import { degreesMinutesArcsecondsToDecimalDegrees, degreesToRadians } from "@skyframe/angles";

// WGS 84.

export const FLATTENING = 1 / 298.257223563;

/** Kilometers. */
export const EQUATORIAL_RADIUS_KM = 6378.137;

/** Kilometers. */
export const POLAR_RADIUS_KM = EQUATORIAL_RADIUS_KM * (1 - FLATTENING);

/** Radians per second. */
export const ROTATIONAL_ANGULAR_VELOCITY = 0.00007292114992;

/** Eccentricity of the meridian ellipse, `sqrt(f(2 − f))`. */
export function eccentricityOfMeridian(): number {
  return Math.sqrt(FLATTENING * (2 - FLATTENING));
}

export type RhoSinCosPhi = {
  /** `ρ sin φ'`, in equatorial radii. */
  readonly rhoSinPhi: number;
  /** `ρ cos φ'`, in equatorial radii. */
  readonly rhoCosPhi: number;
};

/**
 * Geocentric position of an observer as `ρ sin φ'` and `ρ cos φ'`, where ρ is
 * the distance from the Earth's center and φ' the geocentric latitude.
 *
 * @param latitude - geographic latitude, radians
 * @param heightMeters - height above the ellipsoid
 */
export function rhoSinCosPhi(latitude: number, heightMeters: number): RhoSinCosPhi {
  const axisRatio = POLAR_RADIUS_KM / EQUATORIAL_RADIUS_KM;
  const u = Math.atan(Math.tan(latitude) * axisRatio);
  const h = heightMeters / (EQUATORIAL_RADIUS_KM * 1000);

  return {
    rhoSinPhi: Math.sin(u) * axisRatio + Math.sin(latitude) * h,
    rhoCosPhi: Math.cos(u) + Math.cos(latitude) * h,
  };
}

/** Distance from the Earth's center to the ellipsoid at a geographic latitude, in equatorial radii. */
export function distanceFromCenter(latitude: number): number {
  return 0.9983271 + 0.0016764 * Math.cos(2 * latitude) - 0.0000035 * Math.cos(4 * latitude);
}

/** Radius of the parallel at a geographic latitude, kilometers. */
export function radiusOfParallel(latitude: number): number {
  const e = eccentricityOfMeridian();
  const es = e * Math.sin(latitude);
  return (EQUATORIAL_RADIUS_KM * Math.cos(latitude)) / Math.sqrt(1 - es * es);
}

/** Speed of a point on the ellipsoid due to the Earth's rotation, kilometers per second. */
export function linearVelocityAtLatitude(latitude: number): number {
  return ROTATIONAL_ANGULAR_VELOCITY * radiusOfParallel(latitude);
}

/** Radius of curvature of the meridian at a geographic latitude, kilometers. */
export function radiusOfCurvature(latitude: number): number {
  const e = eccentricityOfMeridian();
  const es = e * Math.sin(latitude);
  return (EQUATORIAL_RADIUS_KM * (1 - e * e)) / Math.pow(1 - es * es, 1.5);
}

const LAT_DIFF_2PHI = degreesToRadians(degreesMinutesArcsecondsToDecimalDegrees(0, 0, 692.73));
const LAT_DIFF_4PHI = degreesToRadians(degreesMinutesArcsecondsToDecimalDegrees(0, 0, 1.16));

/** Geographic minus geocentric latitude `φ − φ'`, radians. */
export function geographicGeocentricLatitudeDifference(latitude: number): number {
  return LAT_DIFF_2PHI * Math.sin(2 * latitude) - LAT_DIFF_4PHI * Math.sin(4 * latitude);
}
