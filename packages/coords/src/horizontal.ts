import { assertNever } from "@skyframe/core";

import type { HorizontalCoordinates, HourAngleDeclination } from "./points.js";

export const DECLINATION_FORMULAS = ["legacy", "spherical"] as const;

/**
 * How {@link equatorialFromHorizontal} computes declination.
 *
 * - `"legacy"`: `asin(sin φ sin h − cos φ cos²A)`. Kept for output parity with
 *   earlier releases; it is not the inverse of {@link horizontalFromEquatorial}.
 * - `"spherical"`: `asin(sin φ sin h − cos φ cos h cos A)`, the exact inverse.
 */
export type DeclinationFormula = (typeof DECLINATION_FORMULAS)[number];

export type EquatorialFromHorizontalOptions = {
  /** Defaults to `"legacy"`. */
  declinationFormula?: DeclinationFormula;
};

export function azimuthFromEquatorial(hourAngle: number, declination: number, observerLatitude: number): number {
  return Math.atan2(
    Math.sin(hourAngle),
    Math.cos(hourAngle) * Math.sin(observerLatitude) - Math.tan(declination) * Math.cos(observerLatitude),
  );
}

export function altitudeFromEquatorial(hourAngle: number, declination: number, observerLatitude: number): number {
  return Math.asin(
    Math.sin(observerLatitude) * Math.sin(declination) +
      Math.cos(observerLatitude) * Math.cos(declination) * Math.cos(hourAngle),
  );
}

/** Azimuth (westward from south) and altitude for an hour angle and declination. */
export function horizontalFromEquatorial(
  hourAngle: number,
  declination: number,
  observerLatitude: number,
): HorizontalCoordinates {
  return {
    azimuth: azimuthFromEquatorial(hourAngle, declination, observerLatitude),
    altitude: altitudeFromEquatorial(hourAngle, declination, observerLatitude),
  };
}

export function hourAngleFromHorizontal(azimuth: number, altitude: number, observerLatitude: number): number {
  return Math.atan2(
    Math.sin(azimuth),
    Math.cos(azimuth) * Math.sin(observerLatitude) + Math.tan(altitude) * Math.cos(observerLatitude),
  );
}

export function declinationFromHorizontal(
  azimuth: number,
  altitude: number,
  observerLatitude: number,
  options: EquatorialFromHorizontalOptions = {},
): number {
  const formula = options.declinationFormula ?? "legacy";
  switch (formula) {
    case "legacy":
      return Math.asin(
        Math.sin(observerLatitude) * Math.sin(altitude) -
          Math.cos(observerLatitude) * Math.cos(azimuth) * Math.cos(azimuth),
      );
    case "spherical":
      return Math.asin(
        Math.sin(observerLatitude) * Math.sin(altitude) -
          Math.cos(observerLatitude) * Math.cos(altitude) * Math.cos(azimuth),
      );
    default:
      return assertNever(formula, "Unknown declination formula");
  }
}

/** Hour angle and declination for a local horizontal direction. */
export function equatorialFromHorizontal(
  azimuth: number,
  altitude: number,
  observerLatitude: number,
  options: EquatorialFromHorizontalOptions = {},
): HourAngleDeclination {
  return {
    hourAngle: hourAngleFromHorizontal(azimuth, altitude, observerLatitude),
    declination: declinationFromHorizontal(azimuth, altitude, observerLatitude, options),
  };
}
