/**
 * Great-circle angle between two points given as (longitude, latitude) pairs in radians.
 *
 * Works for any spherical pair: ecliptic (λ, β), equatorial (α, δ) or geographic (L, φ).
 * Uses the haversine form, which keeps precision for small separations where the
 * plain cosine rule loses it.
 */
export function angularSeparation(long1: number, lat1: number, long2: number, lat2: number): number {
  const sinHalfLat = Math.sin((lat2 - lat1) / 2);
  const sinHalfLong = Math.sin((long2 - long1) / 2);
  const h = sinHalfLat * sinHalfLat + Math.cos(lat1) * Math.cos(lat2) * sinHalfLong * sinHalfLong;
  // Rounding can push `h` a hair past 1 for antipodal points.
  return 2 * Math.asin(Math.sqrt(Math.min(1, h)));
}
