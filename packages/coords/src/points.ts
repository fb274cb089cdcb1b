import { angularSeparation, degreesToRadians } from "@skyframe/angles";

/**
 * A direction in the equatorial system (radians).
 *
 * Instances are immutable; transforms return new points.
 */
export class EquatorialPoint {
  constructor(
    readonly rightAscension: number,
    readonly declination: number,
  ) {}

  /** Build a point from right ascension and declination in degrees. */
  static fromDegrees(rightAscension: number, declination: number): EquatorialPoint {
    return new EquatorialPoint(degreesToRadians(rightAscension), degreesToRadians(declination));
  }

  /** Great-circle angle to `other`, radians. */
  angularSeparation(other: EquatorialPoint): number {
    return angularSeparation(this.rightAscension, this.declination, other.rightAscension, other.declination);
  }
}

/** A direction in the ecliptic system (radians). */
export class EclipticPoint {
  constructor(
    readonly longitude: number,
    readonly latitude: number,
  ) {}

  static fromDegrees(longitude: number, latitude: number): EclipticPoint {
    return new EclipticPoint(degreesToRadians(longitude), degreesToRadians(latitude));
  }

  angularSeparation(other: EclipticPoint): number {
    return angularSeparation(this.longitude, this.latitude, other.longitude, other.latitude);
  }
}

/**
 * A place on the Earth's surface (radians).
 *
 * Longitude is positive west of Greenwich, the convention the hour-angle
 * formulas expect.
 */
export class GeographicPoint {
  constructor(
    readonly longitude: number,
    readonly latitude: number,
  ) {}

  static fromDegrees(longitude: number, latitude: number): GeographicPoint {
    return new GeographicPoint(degreesToRadians(longitude), degreesToRadians(latitude));
  }

  angularSeparation(other: GeographicPoint): number {
    return angularSeparation(this.longitude, this.latitude, other.longitude, other.latitude);
  }
}

/** Local horizontal coordinates. Azimuth is measured westward from the south. */
export type HorizontalCoordinates = {
  readonly azimuth: number;
  readonly altitude: number;
};

/** Galactic coordinates, B1950.0 pole. */
export type GalacticCoordinates = {
  readonly longitude: number;
  readonly latitude: number;
};

export type HourAngleDeclination = {
  readonly hourAngle: number;
  readonly declination: number;
};
