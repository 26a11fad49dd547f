export interface Coordinate {
  lat: number;
  lng: number;
}

export interface ResolvedLocation {
  readonly query: string;
  readonly address: string;
  readonly coordinate: Readonly<Coordinate>;
}

export const DISTANCE_UNITS = ['km', 'miles'] as const;

export type DistanceUnit = typeof DISTANCE_UNITS[number];

export const isDistanceUnit = (value: string): value is DistanceUnit =>
  DISTANCE_UNITS.some(unit => unit === value);

// Result of a single geocode lookup
export type LookupResult =
  | { kind: 'found'; location: ResolvedLocation }
  | { kind: 'not_found'; query: string; status: string };

// What the join sees for each of the two concurrent lookups
export type LookupOutcome =
  | LookupResult
  | { kind: 'failed'; query: string; error: Error };

export interface DistanceReport {
  from: ResolvedLocation;
  to: ResolvedLocation;
  unit: DistanceUnit;
  distance: number;
}

export interface Geocoder {
  resolve(query: string, signal?: AbortSignal): Promise<LookupResult>;
}
