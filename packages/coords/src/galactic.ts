import { degreesToRadians } from "@skyframe/angles";

import { EquatorialPoint, type GalacticCoordinates } from "./points.js";

// Galactic frame in B1950.0 equatorial coordinates.
const POLE_RIGHT_ASCENSION = degreesToRadians(192.25);
const POLE_DECLINATION = degreesToRadians(27.4);
const ORIGIN_LONGITUDE_OFFSET = degreesToRadians(303);
const ASCENDING_NODE_LONGITUDE = degreesToRadians(123);
const RIGHT_ASCENSION_OFFSET = degreesToRadians(12.25);

export function galacticLongitudeFromEquatorial(rightAscension: number, declination: number): number {
  const x = POLE_RIGHT_ASCENSION - rightAscension;
  return (
    ORIGIN_LONGITUDE_OFFSET -
    Math.atan2(
      Math.sin(x),
      Math.sin(POLE_DECLINATION) * Math.cos(x) - Math.cos(POLE_DECLINATION) * Math.tan(declination),
    )
  );
}

export function galacticLatitudeFromEquatorial(rightAscension: number, declination: number): number {
  return Math.asin(
    Math.sin(declination) * Math.sin(POLE_DECLINATION) +
      Math.cos(declination) * Math.cos(POLE_DECLINATION) * Math.cos(POLE_RIGHT_ASCENSION - rightAscension),
  );
}

/**
 * Galactic coordinates of a B1950.0 equatorial direction.
 *
 * Longitude is `303° − atan2(…)` and is not normalized.
 */
export function galacticFromEquatorial(rightAscension: number, declination: number): GalacticCoordinates {
  return {
    longitude: galacticLongitudeFromEquatorial(rightAscension, declination),
    latitude: galacticLatitudeFromEquatorial(rightAscension, declination),
  };
}

export function rightAscensionFromGalactic(longitude: number, latitude: number): number {
  const x = longitude - ASCENDING_NODE_LONGITUDE;
  return (
    RIGHT_ASCENSION_OFFSET +
    Math.atan2(
      Math.sin(x),
      Math.sin(POLE_DECLINATION) * Math.cos(x) - Math.cos(POLE_DECLINATION) * Math.tan(latitude),
    )
  );
}

export function declinationFromGalactic(longitude: number, latitude: number): number {
  return Math.asin(
    Math.sin(latitude) * Math.sin(POLE_DECLINATION) +
      Math.cos(latitude) * Math.cos(POLE_DECLINATION) * Math.cos(longitude - ASCENDING_NODE_LONGITUDE),
  );
}

/** B1950.0 equatorial direction of galactic coordinates. Right ascension is not normalized. */
export function equatorialFromGalactic(longitude: number, latitude: number): EquatorialPoint {
  return new EquatorialPoint(
    rightAscensionFromGalactic(longitude, latitude),
    declinationFromGalactic(longitude, latitude),
  );
}
