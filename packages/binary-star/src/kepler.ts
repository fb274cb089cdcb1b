import { normalizeToMinusPiPi } from "@skyframe/angles";

export type EccentricAnomalyOptions = {
  /** Stop once a Newton step is smaller than this, radians. Defaults to 1e-12. */
  tolerance?: number;
  /** Defaults to 50. */
  maxIterations?: number;
};

/**
 * Solve Kepler's equation `E − e sin E = M` for the eccentric anomaly by
 * Newton iteration.
 *
 * Whole turns in `meanAnomaly` are carried over to the result. Elliptic orbits
 * only: `NaN` unless `0 <= e < 1`. When `maxIterations` runs out the last
 * estimate is returned.
 */
export function eccentricAnomaly(
  meanAnomaly: number,
  eccentricity: number,
  options: EccentricAnomalyOptions = {},
): number {
  if (!(eccentricity >= 0 && eccentricity < 1)) {
    return Number.NaN;
  }

  const tolerance = options.tolerance ?? 1e-12;
  const maxIterations = options.maxIterations ?? 50;

  const m = normalizeToMinusPiPi(meanAnomaly);
  let e = eccentricity < 0.8 ? m : m < 0 ? -Math.PI : Math.PI;
  for (let i = 0; i < maxIterations; i++) {
    const step = (e - eccentricity * Math.sin(e) - m) / (1 - eccentricity * Math.cos(e));
    e -= step;
    if (Math.abs(step) < tolerance) break;
  }

  return e + (meanAnomaly - m);
}
