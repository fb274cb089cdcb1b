import type { GeographicPoint } from "@skyframe/coords";

import { EQUATORIAL_RADIUS_KM, FLATTENING } from "./ellipsoid.js";

/** Mean Earth radius used by the spherical approximation, kilometers. */
export const MEAN_RADIUS_KM = 6371;

/** Great-circle distance on a sphere of radius {@link MEAN_RADIUS_KM}, kilometers. */
export function approximateGeodesicDistance(p1: GeographicPoint, p2: GeographicPoint): number {
  return MEAN_RADIUS_KM * p1.angularSeparation(p2);
}

/**
 * Distance along the ellipsoid between two points, kilometers (Andoyer–Lambert).
 *
 * Good to about 50 m at the scale of a few thousand kilometers. Coincident
 * points give `NaN`.
 */
export function geodesicDistance(p1: GeographicPoint, p2: GeographicPoint): number {
  const f = (p1.latitude + p2.latitude) / 2;
  const g = (p1.latitude - p2.latitude) / 2;
  const lambda = (p1.longitude - p2.longitude) / 2;

  const s = square(Math.sin(g) * Math.cos(lambda)) + square(Math.cos(f) * Math.sin(lambda));
  const c = square(Math.cos(g) * Math.cos(lambda)) + square(Math.sin(f) * Math.sin(lambda));
  const omega = Math.atan(Math.sqrt(s / c));
  const r = Math.sqrt(s * c) / omega;
  const d = 2 * omega * EQUATORIAL_RADIUS_KM;
  const h1 = (3 * r - 1) / (2 * c);
  const h2 = (3 * r + 1) / (2 * s);

  return (
    d *
    (1 +
      FLATTENING * h1 * square(Math.sin(f) * Math.cos(g)) -
      FLATTENING * h2 * square(Math.cos(f) * Math.sin(g)))
  );
}

function square(x: number): number {
  return x * x;
}
