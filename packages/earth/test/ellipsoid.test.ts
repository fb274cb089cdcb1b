import { describe, expect, it } from "vitest";

import { degreesToRadians } from "@skyframe/angles";
import {
  EQUATORIAL_RADIUS_KM,
  FLATTENING,
  POLAR_RADIUS_KM,
  distanceFromCenter,
  eccentricityOfMeridian,
  geographicGeocentricLatitudeDifference,
  linearVelocityAtLatitude,
  radiusOfCurvature,
  radiusOfParallel,
  rhoSinCosPhi,
} from "@skyframe/earth";

const LAT_45 = degreesToRadians(45);

describe("WGS 84 ellipsoid", () => {
  it("derives the polar radius from the flattening", () => {
    expect(POLAR_RADIUS_KM).toBeCloseTo(6356.752314245179, 9);
    expect(1 - POLAR_RADIUS_KM / EQUATORIAL_RADIUS_KM).toBeCloseTo(FLATTENING, 15);
  });

  it("computes the meridian eccentricity as sqrt(f(2 − f))", () => {
    expect(eccentricityOfMeridian()).toBeCloseTo(0.08181919084262149, 15);
  });

  it("places an observer on the ellipsoid with rho sin/cos phi", () => {
    const atEquator = rhoSinCosPhi(0, 0);
    expect(atEquator.rhoSinPhi).toBe(0);
    expect(atEquator.rhoCosPhi).toBe(1);

    const elevated = rhoSinCosPhi(degreesToRadians(40), 500);
    expect(elevated.rhoSinPhi).toBeCloseTo(0.6394197813570357, 12);
    expect(elevated.rhoCosPhi).toBeCloseTo(0.767166121125064, 12);
  });

  it("gives the distance to the center in equatorial radii", () => {
    expect(distanceFromCenter(0)).toBeCloseTo(1, 6);
    expect(distanceFromCenter(LAT_45)).toBeCloseTo(0.9983306, 12);
  });

  it("computes the radius of a parallel and the rotation speed there", () => {
    expect(radiusOfParallel(0)).toBe(EQUATORIAL_RADIUS_KM);
    expect(radiusOfParallel(LAT_45)).toBeCloseTo(4517.590878848931, 9);
    expect(linearVelocityAtLatitude(LAT_45)).toBeCloseTo(0.3294279217537675, 12);
  });

  it("computes the meridian radius of curvature", () => {
    expect(radiusOfCurvature(0)).toBeCloseTo(6335.43932729282, 9);
    expect(radiusOfCurvature(Math.PI / 2)).toBeCloseTo(6399.5936257584935, 9);
  });

  it("returns the geographic minus geocentric latitude in radians", () => {
    expect(geographicGeocentricLatitudeDifference(0)).toBe(0);
    expect(geographicGeocentricLatitudeDifference(LAT_45)).toBeCloseTo(0.003358449813150089, 15);
    expect(geographicGeocentricLatitudeDifference(degreesToRadians(30))).toBeCloseTo(0.002903632468341338, 15);
  });
});
