import { describe, it, expect } from 'vitest';
import {
  DecodeError,
  GeocodeTimeoutError,
  InvalidUsageError,
  LocationNotFoundError,
  TransportError,
  isGeocodeError,
  toError
} from './errors';

describe('GeocodeError', () => {
  it('names each error after its class', () => {
    expect(new DecodeError('Paris', 'bad').name).toBe('DecodeError');
    expect(new GeocodeTimeoutError(100).name).toBe('GeocodeTimeoutError');
    expect(new InvalidUsageError('nope').name).toBe('InvalidUsageError');
  });

  it('keeps the cause', () => {
    const cause = new Error('ECONNRESET');
    const error = new TransportError('Paris', 'socket hang up', { errorCode: 'ECONNRESET', cause });

    expect(error.cause).toBe(cause);
    expect(error.errorCode).toBe('ECONNRESET');
    expect(error.message).toBe('Geocoding request for "Paris" failed: socket hang up');
  });

  it('lists every missing query', () => {
    expect(new LocationNotFoundError(['Atlantis', 'Lemuria']).message)
      .toBe('No location found for "Atlantis" and "Lemuria"');
  });

  it('is recognized by isGeocodeError', () => {
    expect(isGeocodeError(new GeocodeTimeoutError(5))).toBe(true);
    expect(isGeocodeError(new Error('plain'))).toBe(false);
    expect(isGeocodeError('string')).toBe(false);
  });
});

describe('toError', () => {
  it('passes errors through and wraps anything else', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe('42');
  });
});
