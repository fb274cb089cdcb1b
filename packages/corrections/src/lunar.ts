/** Equatorial radius used for the lunar parallax, kilometers. */
const EARTH_RADIUS_KM = 6378.14;

/** Ratio of the Moon's radius to the Earth's equatorial radius. */
const MOON_EARTH_RADIUS_RATIO = 0.272481;

/** Equatorial horizontal parallax of the Moon, radians. */
export function lunarHorizontalParallax(earthMoonDistanceKm: number): number {
  return Math.asin(EARTH_RADIUS_KM / earthMoonDistanceKm);
}

/** Geocentric semidiameter of the Moon, radians. */
export function lunarSemidiameter(earthMoonDistanceKm: number): number {
  return MOON_EARTH_RADIUS_RATIO * Math.sin(lunarHorizontalParallax(earthMoonDistanceKm));
}
