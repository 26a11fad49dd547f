import { describe, it, expect, vi, afterEach } from 'vitest';
import { LookupGroup } from './LookupGroup';
import type { LookupResult } from '../types/geo';
import { GeocodeTimeoutError, LookupCancelledError } from '../utils/errors';

const paris: LookupResult = {
  kind: 'found',
  location: { query: 'Paris', address: 'Paris, France', coordinate: { lat: 48.8566, lng: 2.3522 } }
};

const never = () => new Promise<LookupResult>(() => undefined);

describe('LookupGroup', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes its signal to the task and returns the result', async () => {
    const group = new LookupGroup();
    const task = vi.fn(async () => paris);

    await expect(group.run('Paris', task)).resolves.toBe(paris);
    expect(task).toHaveBeenCalledWith(group.signal);
    expect(group.reason).toBeUndefined();
  });

  it('turns a thrown error into a failed outcome and aborts the group', async () => {
    const group = new LookupGroup();
    const boom = new Error('boom');

    const outcome = await group.run('Paris', async () => {
      throw boom;
    });

    expect(outcome).toEqual({ kind: 'failed', query: 'Paris', error: boom });
    expect(group.signal.aborted).toBe(true);
    expect(group.reason).toBe(boom);
  });

  it('wraps non-Error throws', async () => {
    const group = new LookupGroup();

    const outcome = await group.run('Paris', () => Promise.reject('nope'));

    expect(outcome.kind).toBe('failed');
    expect(group.reason?.message).toBe('nope');
  });

  it('keeps the first abort reason', () => {
    const group = new LookupGroup();
    const first = new Error('first');

    group.abort(first);
    group.abort(new Error('second'));

    expect(group.reason).toBe(first);
    expect(group.signal.reason).toBe(first);
  });

  it('settles a task that ignores the signal once the group aborts', async () => {
    const group = new LookupGroup();
    const pending = group.run('Paris', never);
    const reason = new Error('sibling failed');

    group.abort(reason);

    await expect(pending).resolves.toEqual({ kind: 'failed', query: 'Paris', error: reason });
  });

  it('does not start tasks after it has aborted', async () => {
    const group = new LookupGroup();
    group.abort(new Error('done'));
    const task = vi.fn(async () => paris);

    const outcome = await group.run('Paris', task);

    expect(outcome.kind).toBe('failed');
    expect(task).not.toHaveBeenCalled();
  });

  it('aborts with GeocodeTimeoutError when the deadline passes', async () => {
    vi.useFakeTimers();
    const group = new LookupGroup({ timeoutMs: 1000 });
    const pending = group.run('Paris', never);

    await vi.advanceTimersByTimeAsync(999);
    expect(group.signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    const outcome = await pending;

    expect(group.reason).toBeInstanceOf(GeocodeTimeoutError);
    expect(outcome).toMatchObject({ kind: 'failed', error: { timeoutMs: 1000 } });
  });

  it('accepts the largest delay setTimeout can hold', async () => {
    vi.useFakeTimers();
    const group = new LookupGroup({ timeoutMs: 2147483647 });
    expect(vi.getTimerCount()).toBe(1);

    await vi.advanceTimersByTimeAsync(2147483646);
    expect(group.signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(group.reason).toBeInstanceOf(GeocodeTimeoutError);
  });

  it.each([2147483648, 3_000_000_000, -1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])(
    'rejects a timeout of %s',
    timeoutMs => {
      vi.useFakeTimers();

      expect(() => new LookupGroup({ timeoutMs })).toThrow(RangeError);
      expect(vi.getTimerCount()).toBe(0);
    }
  );

  it('arms no deadline for a zero timeout', () => {
    vi.useFakeTimers();
    const group = new LookupGroup({ timeoutMs: 0 });

    expect(vi.getTimerCount()).toBe(0);
    group.close();
  });

  it('follows the caller signal until closed', () => {
    const controller = new AbortController();
    const group = new LookupGroup({ signal: controller.signal });

    controller.abort('user quit');

    expect(group.reason).toBeInstanceOf(LookupCancelledError);
    expect(group.reason?.cause).toBe('user quit');
  });

  it('ignores the caller signal after close', () => {
    const controller = new AbortController();
    const group = new LookupGroup({ signal: controller.signal });

    group.close();
    controller.abort();

    expect(group.signal.aborted).toBe(false);
  });

  it('clears the deadline on close', () => {
    vi.useFakeTimers();
    const group = new LookupGroup({ timeoutMs: 1000 });
    expect(vi.getTimerCount()).toBe(1);

    group.close();

    expect(vi.getTimerCount()).toBe(0);
    vi.advanceTimersByTime(2000);
    expect(group.signal.aborted).toBe(false);
  });
});
