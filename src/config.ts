import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export const GOOGLE_GEOCODE_URL = 'https://maps.googleapis.com/maps/api/geocode/json';

export const DEFAULT_TIMEOUT_MS = 10000;

// Largest delay setTimeout honours; anything above fires after 1ms
export const MAX_TIMEOUT_MS = 2147483647;

export const isValidTimeout = (ms: number): boolean =>
  Number.isInteger(ms) && ms >= 0 && ms <= MAX_TIMEOUT_MS;

export interface GeocoderConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  // Raw GEOCODER_TIMEOUT when it was rejected in favour of the default
  invalidTimeout?: string;
}

export function getGeocoderConfig(): GeocoderConfig {
  const rawTimeout = process.env.GEOCODER_TIMEOUT;
  const timeoutMs = rawTimeout && /^\d+$/.test(rawTimeout) ? Number(rawTimeout) : NaN;
  const timeoutOk = !rawTimeout || isValidTimeout(timeoutMs);

  return {
    baseUrl: process.env.GEOCODER_URL || GOOGLE_GEOCODE_URL,
    apiKey: process.env.GOOGLE_API_KEY || undefined,
    timeoutMs: rawTimeout && timeoutOk ? timeoutMs : DEFAULT_TIMEOUT_MS,
    invalidTimeout: timeoutOk ? undefined : rawTimeout
  };
}

export interface LoggerConfig {
  level: string;
  logFile?: string;
}

export function getLoggerConfig(): LoggerConfig {
  return {
    level: (process.env.LOG_LEVEL || 'WARNING').toUpperCase(),
    logFile: process.env.LOG_FILE || undefined
  };
}
