import type { Coordinate, DistanceUnit } from '../types/geo';

// Mean radius of a spherical Earth
export const EARTH_RADIUS_KM = 6371;

export const KM_TO_MILES = 0.621371192;

export const toRadians = (degrees: number): number => degrees * Math.PI / 180;

export const kmToMiles = (km: number): number => km * KM_TO_MILES;

/**
 * Great-circle distance between two coordinates (haversine formula).
 */
export function distance(a: Coordinate, b: Coordinate, unit: DistanceUnit = 'km'): number {
  const phi1 = toRadians(a.lat);
  const phi2 = toRadians(b.lat);
  const deltaPhi = toRadians(a.lat - b.lat);
  const deltaLambda = toRadians(a.lng - b.lng);

  const h = Math.sin(deltaPhi / 2) ** 2 +
    Math.cos(phi1) * Math.cos(phi2) * Math.sin(deltaLambda / 2) ** 2;

  // Rounding can push h just outside [0, 1] for identical or antipodal points
  const clamped = Math.min(1, Math.max(0, h));
  const c = 2 * Math.atan2(Math.sqrt(clamped), Math.sqrt(1 - clamped));

  const km = EARTH_RADIUS_KM * c;
  return unit === 'miles' ? kmToMiles(km) : km;
}
