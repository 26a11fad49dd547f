import { getGeocoderConfig } from '../config';
import { LookupGroup } from '../core/LookupGroup';
import type { DistanceReport, DistanceUnit, Geocoder } from '../types/geo';
import { distance } from '../utils/distance';
import { LocationNotFoundError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { GoogleGeocoder } from './geocoder';

const logger = createLogger('DistanceService');

export interface MeasureOptions {
  // Overrides the configured deadline; 0 disables it
  timeoutMs?: number;
  signal?: AbortSignal;
}

export class DistanceService {
  private geocoder: Geocoder;
  private timeoutMs: number;

  constructor(geocoder: Geocoder = new GoogleGeocoder(), options: { timeoutMs?: number } = {}) {
    this.geocoder = geocoder;
    const config = getGeocoderConfig();
    if (config.invalidTimeout !== undefined) {
      logger.warning(
        `Ignoring GEOCODER_TIMEOUT=${config.invalidTimeout}, using ${config.timeoutMs}ms`
      );
    }
    this.timeoutMs = options.timeoutMs ?? config.timeoutMs;
  }

  /**
   * Geocode both places concurrently and measure the great-circle distance
   * between the first matches.
   *
   * Transport, decode, timeout and cancellation errors from either lookup
   * are rethrown as-is; a place with no match raises LocationNotFoundError.
   */
  async measure(
    queryA: string,
    queryB: string,
    unit: DistanceUnit = 'km',
    options: MeasureOptions = {}
  ): Promise<DistanceReport> {
    const group = new LookupGroup({
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal
    });

    logger.debug(`Looking up "${queryA}" and "${queryB}"`);

    const outcomes = await Promise.all([
      group.run(queryA, signal => this.geocoder.resolve(queryA, signal)),
      group.run(queryB, signal => this.geocoder.resolve(queryB, signal))
    ]).finally(() => group.close());
    const [from, to] = outcomes;

    for (const outcome of outcomes) {
      if (outcome.kind === 'failed') {
        throw group.reason ?? outcome.error;
      }
    }

    if (from.kind !== 'found' || to.kind !== 'found') {
      const missing = outcomes.flatMap(outcome => outcome.kind === 'not_found' ? [outcome.query] : []);
      logger.warning(`Could not resolve ${missing.join(', ')}`);
      throw new LocationNotFoundError(missing);
    }

    const result = distance(from.location.coordinate, to.location.coordinate, unit);
    logger.info(`${from.location.address} -> ${to.location.address}: ${result} ${unit}`);

    return {
      from: from.location,
      to: to.location,
      unit,
      distance: result
    };
  }

  async getDistance(
    queryA: string,
    queryB: string,
    unit: DistanceUnit = 'km',
    options: MeasureOptions = {}
  ): Promise<number> {
    const report = await this.measure(queryA, queryB, unit, options);
    return report.distance;
  }
}
