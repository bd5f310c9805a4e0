/** Kilometres per degree used by the planar approximation */
export const KM_PER_DEGREE = 111.32;

/**
 * Planar distance between two points, treating a degree of latitude and a
 * degree of longitude as the same length. Only meaningful over short ranges.
 * Downstream outputs depend on this exact formula; it is not a geodesic.
 */
export function flatEarthDistanceKm(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
): number {
  return Math.sqrt((lat1 - lat2) ** 2 + (lon1 - lon2) ** 2) * KM_PER_DEGREE;
}
