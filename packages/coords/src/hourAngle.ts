/**
 * Local hour angle from Greenwich sidereal time.
 *
 * `observerLongitude` is positive west of Greenwich: `H = θ0 − L − α`.
 */
export function hourAngleFromLongitude(
  greenwichSidereal: number,
  observerLongitude: number,
  rightAscension: number,
): number {
  return greenwichSidereal - observerLongitude - rightAscension;
}

/** Local hour angle from local sidereal time: `H = θ − α`. */
export function hourAngleFromSidereal(localSidereal: number, rightAscension: number): number {
  return localSidereal - rightAscension;
}
