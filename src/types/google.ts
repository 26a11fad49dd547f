import { z } from 'zod';

/**
 * Google Geocoding API response envelope
 *
 * Only the fields the distance lookup reads are validated; everything else
 * the provider sends (address_components, viewport, place_id...) passes through.
 */
export const zGoogleLatLng = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export const zGoogleGeocodeResult = z.object({
  formatted_address: z.string(),
  geometry: z.object({
    location: zGoogleLatLng,
    location_type: z.string().optional(),
  }),
  place_id: z.string().optional(),
  types: z.array(z.string()).optional(),
});

export const zGoogleGeocodeResponse = z.object({
  status: z.string(),
  results: z.array(zGoogleGeocodeResult),
  error_message: z.string().optional(),
});

export type GoogleGeocodeResult = z.infer<typeof zGoogleGeocodeResult>;
export type GoogleGeocodeResponse = z.infer<typeof zGoogleGeocodeResponse>;

// Statuses that mean the query itself was fine
export const GOOGLE_OK_STATUSES = ['OK', 'ZERO_RESULTS'];
