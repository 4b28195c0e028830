/**
 * Pending-call registry.
 *
 * Maps an in-flight request id to the caller waiting on it. The registry is
 * the single source of truth for call lifetime: a call is pending from
 * `register()` until exactly one of `resolve()`, `fail()`, `cancel()` or
 * `abandonAll()` completes it, after which the id is forgotten.
 *
 * All of these run on the event loop, so each operation is atomic with
 * respect to the others; callers and the receive loop never see a
 * half-updated map.
 */

import { DuplicateRequestError } from './errors.js';
import { type Logger, consoleLogger } from './logger.js';

/**
 * Handle for one outstanding call.
 */
export interface PendingCall {
  readonly id: number;
  /** Method name, kept for diagnostics */
  readonly method: string;
  /** `Date.now()` at registration */
  readonly createdAt: number;
  /** Settles when the call is resolved, failed, cancelled or abandoned */
  readonly promise: Promise<unknown>;
}

interface PendingEntry {
  id: number;
  method: string;
  createdAt: number;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
}

export interface PendingCallRegistryOptions {
  logger?: Logger;
  /** Clock used for `createdAt`; defaults to `Date.now` */
  now?: () => number;
}

export class PendingCallRegistry {
  #entries = new Map<number, PendingEntry>();
  #logger: Logger;
  #now: () => number;

  constructor(options: PendingCallRegistryOptions = {}) {
    this.#logger = options.logger ?? consoleLogger;
    this.#now = options.now ?? Date.now;
  }

  /**
   * Number of calls currently pending.
   */
  get size(): number {
    return this.#entries.size;
  }

  has(id: number): boolean {
    return this.#entries.has(id);
  }

  /**
   * Ids of all pending calls, in registration order.
   */
  ids(): number[] {
    return [...this.#entries.keys()];
  }

  /**
   * Method name and age of a pending call, for diagnostics.
   */
  describe(id: number): { method: string; ageMs: number } | undefined {
    const entry = this.#entries.get(id);
    if (!entry) return undefined;
    return { method: entry.method, ageMs: this.#now() - entry.createdAt };
  }

  /**
   * Creates the pending slot for `id`.
   *
   * @throws DuplicateRequestError if `id` is already pending
   */
  register(id: number, method: string): PendingCall {
    if (this.#entries.has(id)) {
      throw new DuplicateRequestError(id);
    }

    const createdAt = this.#now();
    const promise = new Promise<unknown>((resolve, reject) => {
      this.#entries.set(id, { id, method, createdAt, resolve, reject });
    });
    // A call can be abandoned before anyone awaits it (the link drops while
    // its send is still queued). Awaiters still see the rejection.
    promise.catch(() => {});

    return { id, method, createdAt, promise };
  }

  /**
   * Completes the call with a result.
   * @returns false if `id` was not pending (logged as a protocol anomaly)
   */
  resolve(id: number, result: unknown): boolean {
    const entry = this.#take(id, 'result');
    if (!entry) return false;
    entry.resolve(result);
    return true;
  }

  /**
   * Completes the call with an error.
   * @returns false if `id` was not pending (logged as a protocol anomaly)
   */
  fail(id: number, error: Error): boolean {
    const entry = this.#take(id, 'error');
    if (!entry) return false;
    entry.reject(error);
    return true;
  }

  /**
   * Fails a call on behalf of the local side (timeout, abort, failed send).
   * Unlike `fail()`, a missing id is expected here and is not logged.
   */
  cancel(id: number, error: Error): boolean {
    const entry = this.#entries.get(id);
    if (!entry) return false;
    this.#entries.delete(id);
    entry.reject(error);
    return true;
  }

  /**
   * Fails every pending call with `error` and clears the registry.
   * @returns the number of calls abandoned
   */
  abandonAll(error: Error): number {
    const entries = [...this.#entries.values()];
    this.#entries.clear();
    for (const entry of entries) {
      entry.reject(error);
    }
    return entries.length;
  }

  #take(id: number, kind: 'result' | 'error'): PendingEntry | undefined {
    const entry = this.#entries.get(id);
    if (!entry) {
      this.#logger.warn(`Dropping ${kind} for request ${id}: no call with that id is pending`);
      return undefined;
    }
    this.#entries.delete(id);
    return entry;
  }
}
