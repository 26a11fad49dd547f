import { MAX_TIMEOUT_MS, isValidTimeout } from '../config';
import type { LookupOutcome, LookupResult } from '../types/geo';
import { GeocodeTimeoutError, LookupCancelledError, toError } from '../utils/errors';

export interface LookupGroupOptions {
  // Deadline for every lookup in the group, 0 or undefined for none;
  // at most MAX_TIMEOUT_MS
  timeoutMs?: number;
  // Caller cancellation
  signal?: AbortSignal;
}

/**
 * Runs concurrent geocode lookups under one shared AbortController.
 *
 * The first failure, the deadline or the caller's signal aborts the whole
 * group; `reason` keeps whichever came first. Every `run` settles to a typed
 * outcome once the group aborts, even if its task ignores the signal.
 */
export class LookupGroup {
  private controller = new AbortController();
  private firstError?: Error;
  private timer?: NodeJS.Timeout;
  private externalSignal?: AbortSignal;
  private whenAborted: Promise<Error>;

  constructor(options: LookupGroupOptions = {}) {
    this.whenAborted = new Promise<Error>(resolve => {
      this.controller.signal.addEventListener(
        'abort',
        () => resolve(this.firstError ?? new LookupCancelledError()),
        { once: true }
      );
    });

    const { timeoutMs, signal } = options;
    if (timeoutMs !== undefined && !isValidTimeout(timeoutMs)) {
      throw new RangeError(`Lookup timeout must be a whole number of milliseconds up to ${MAX_TIMEOUT_MS}, got ${timeoutMs}`);
    }
    if (timeoutMs) {
      this.timer = setTimeout(() => this.abort(new GeocodeTimeoutError(timeoutMs)), timeoutMs);
    }

    if (signal) {
      if (signal.aborted) {
        this.abort(new LookupCancelledError('Distance lookup was cancelled', signal.reason));
      } else {
        this.externalSignal = signal;
        signal.addEventListener('abort', this.onExternalAbort, { once: true });
      }
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get reason(): Error | undefined {
    return this.firstError;
  }

  abort(reason: Error): void {
    if (this.controller.signal.aborted) return;
    this.firstError = reason;
    this.controller.abort(reason);
  }

  run(query: string, task: (signal: AbortSignal) => Promise<LookupResult>): Promise<LookupOutcome> {
    if (this.firstError) {
      return Promise.resolve<LookupOutcome>({ kind: 'failed', query, error: this.firstError });
    }
    const cancelled = this.whenAborted.then(
      (error): LookupOutcome => ({ kind: 'failed', query, error })
    );
    return Promise.race([this.settle(query, task), cancelled]);
  }

  // Stops the deadline and detaches from the caller's signal
  close(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.externalSignal?.removeEventListener('abort', this.onExternalAbort);
    this.externalSignal = undefined;
  }

  private async settle(
    query: string,
    task: (signal: AbortSignal) => Promise<LookupResult>
  ): Promise<LookupOutcome> {
    try {
      return await task(this.signal);
    } catch (error) {
      const failure = toError(error);
      this.abort(failure);
      return { kind: 'failed', query, error: failure };
    }
  }

  private onExternalAbort = (): void => {
    this.abort(new LookupCancelledError('Distance lookup was cancelled', this.externalSignal?.reason));
  };
}
