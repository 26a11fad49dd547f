export { DistanceService } from './services/distance-service';
export type { MeasureOptions } from './services/distance-service';
export { GoogleGeocoder } from './services/geocoder';
export type { GoogleGeocoderOptions } from './services/geocoder';
export { LookupGroup } from './core/LookupGroup';
export type { LookupGroupOptions } from './core/LookupGroup';
export { distance, kmToMiles, toRadians, EARTH_RADIUS_KM, KM_TO_MILES } from './utils/distance';
export { runCli, parseCliArgs, USAGE } from './cli';
export type { CliCommand, CliDeps } from './cli';
export * from './utils/errors';
export * from './types/geo';
export { getGeocoderConfig, GOOGLE_GEOCODE_URL } from './config';
export type { GeocoderConfig } from './config';
