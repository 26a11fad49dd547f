import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { getGeocoderConfig } from '../config';
import type { Geocoder, LookupResult } from '../types/geo';
import { GOOGLE_OK_STATUSES, zGoogleGeocodeResponse } from '../types/google';
import type { GoogleGeocodeResponse } from '../types/google';
import {
  DecodeError,
  InvalidQueryError,
  LookupCancelledError,
  TransportError,
  toError
} from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('Geocoder');

export interface GoogleGeocoderOptions {
  baseUrl?: string;
  apiKey?: string;
  http?: AxiosInstance;
}

// Google Geocoding API client
export class GoogleGeocoder implements Geocoder {
  private baseUrl: string;
  private apiKey?: string;
  private http: AxiosInstance;

  constructor(options: GoogleGeocoderOptions = {}) {
    const config = getGeocoderConfig();
    this.baseUrl = options.baseUrl ?? config.baseUrl;
    this.apiKey = options.apiKey ?? config.apiKey;
    this.http = options.http ?? axios.create();

    if (!this.apiKey) {
      logger.debug('No Google API key configured, sending unauthenticated requests');
    }
  }

  /**
   * Resolve a free-text place name to the provider's best match.
   * An empty result list is a valid `not_found` outcome, not an error.
   */
  async resolve(query: string, signal?: AbortSignal): Promise<LookupResult> {
    if (!query || !query.trim()) {
      throw new InvalidQueryError();
    }
    if (signal?.aborted) {
      throw new LookupCancelledError(`Geocode lookup for "${query}" was cancelled`, signal.reason);
    }

    const params: Record<string, string> = {
      sensor: 'false',
      address: query
    };
    if (this.apiKey) {
      params.key = this.apiKey;
    }

    logger.info(`Geocoding "${query}"`);

    let body: unknown;
    try {
      const response = await this.http.get<string>(this.baseUrl, {
        params,
        signal,
        // Keep the raw text so a malformed body surfaces as a DecodeError
        responseType: 'text',
        transformResponse: (data: unknown) => data
      });
      logger.debug(`Geocoding response status for "${query}": ${response.status}`);
      body = response.data;
    } catch (error) {
      throw this.toLookupError(query, error, signal);
    }

    const envelope = this.decode(query, body);

    if (envelope.results.length === 0) {
      if (!GOOGLE_OK_STATUSES.includes(envelope.status)) {
        logger.warning(
          `Geocoding "${query}" returned ${envelope.status}` +
          (envelope.error_message ? `: ${envelope.error_message}` : '')
        );
      } else {
        logger.info(`No results for "${query}"`);
      }
      return { kind: 'not_found', query, status: envelope.status };
    }

    // Provider ranking is trusted: the first candidate wins
    const [best] = envelope.results;
    const { lat, lng } = best.geometry.location;
    logger.info(`Resolved "${query}" to ${best.formatted_address} (${lat}, ${lng})`);

    return {
      kind: 'found',
      location: {
        query,
        address: best.formatted_address,
        coordinate: { lat, lng }
      }
    };
  }

  private decode(query: string, body: unknown): GoogleGeocodeResponse {
    let json: unknown = body;
    if (typeof body === 'string') {
      try {
        json = JSON.parse(body);
      } catch (error) {
        throw new DecodeError(query, 'body is not valid JSON', error);
      }
    }

    const parsed = zGoogleGeocodeResponse.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new DecodeError(query, `unexpected shape${where}: ${issue?.message ?? 'invalid'}`, parsed.error);
    }
    return parsed.data;
  }

  private toLookupError(query: string, error: unknown, signal?: AbortSignal): Error {
    if (axios.isCancel(error) || signal?.aborted) {
      return new LookupCancelledError(
        `Geocode lookup for "${query}" was cancelled`,
        signal?.reason ?? error
      );
    }

    if (axios.isAxiosError(error)) {
      const httpStatus = error.response?.status;
      logger.warning(`Geocoding request for "${query}" failed: ${error.message}`);
      return new TransportError(query, httpStatus ? `HTTP ${httpStatus}` : error.message, {
        errorCode: error.code,
        httpStatus,
        cause: error
      });
    }

    return toError(error);
  }
}
