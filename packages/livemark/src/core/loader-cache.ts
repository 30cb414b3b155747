/**
 * livemark - Loader Cache
 *
 * Deduplicating, cache-backed one-shot loads. At most one fetch is
 * outstanding per key: concurrent callers attach to the in-flight marker of
 * the fetch that is already running instead of starting their own.
 */

import { z } from 'zod';
import type { FeedRecord } from '../types';
import type { LoaderKey } from './loader-key';
import { FetchTimeoutError, FetchTransportError, type LivemarkError } from './errors';
import { now, timeout } from '../utils/time';

export const LoaderCacheOptionsSchema = z.object({
  /** Default timeout for a fetch in ms */
  timeout: z.number().int().positive().default(5000),
  /** Enable debug logging */
  debug: z.boolean().default(false),
});

export type LoaderCacheOptions = z.input<typeof LoaderCacheOptionsSchema>;

export interface Timestamped {
  created_at: number;
}

export interface CacheEntry<T> {
  key: LoaderKey;
  record: T;
  fetchedAt: number;
}

export type FetchOne<T> = (key: LoaderKey) => Promise<T | null | undefined>;
export type FetchMany<T> = (keys: LoaderKey[]) => Promise<ReadonlyMap<LoaderKey, T>>;

export interface LoadOptions {
  /** Overrides the cache's default timeout for this call */
  timeout?: number;
}

export interface LoaderStats {
  /** Fetch functions invoked (a batch counts once) */
  fetches: number;
  hits: number;
  /** Callers that attached to an in-flight fetch */
  joins: number;
  timeouts: number;
  failures: number;
  size: number;
  inFlight: number;
}

/**
 * Completion handle shared by every caller attached to a key. It never
 * rejects; callers unwrap it.
 */
type Settled<T> = { ok: true; value: T | null } | { ok: false; error: LivemarkError };

type FetchOutcome<T> =
  | { ok: true; records: ReadonlyMap<LoaderKey, T>; timedOut: boolean }
  | { ok: false; error: LivemarkError };

export class LoaderCache<T extends Timestamped = FeedRecord> {
  private cache: Map<LoaderKey, CacheEntry<T>> = new Map();
  private inFlight: Map<LoaderKey, Promise<Settled<T>>> = new Map();
  private timeoutMs: number;
  private debug: boolean;
  private stats = { fetches: 0, hits: 0, joins: 0, timeouts: 0, failures: 0 };

  constructor(options: LoaderCacheOptions = {}) {
    const parsed = LoaderCacheOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new Error(`Invalid Livemark options: ${parsed.error.message}`);
    }
    this.timeoutMs = parsed.data.timeout;
    this.debug = parsed.data.debug;
  }

  /**
   * Load one record. Returns the cached record without a fetch, joins the
   * fetch already running for `key`, or starts one. Resolves `null` when the
   * source has nothing for `key` before the timeout.
   */
  load(key: LoaderKey, fetchFn: FetchOne<T>, options: LoadOptions = {}): Promise<T | null> {
    const cached = this.cache.get(key);
    if (cached) {
      this.stats.hits++;
      return Promise.resolve(cached.record);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.stats.joins++;
      return pending.then(unwrap);
    }

    const outcome = this.start(
      [key],
      async () => {
        const record = await fetchFn(key);
        const records = new Map<LoaderKey, T>();
        if (record) records.set(key, record);
        return records;
      },
      options.timeout ?? this.timeoutMs,
      key
    );

    return outcome.then((result) => {
      if (!result.ok) throw result.error;
      return result.records.get(key) ?? null;
    });
  }

  /**
   * Load many records with at most one fetch. Cached keys are answered from
   * the cache, in-flight keys wait for their fetch, and the remaining keys
   * go out together in a single `fetchMany` call. Keys nobody found are
   * absent from the result.
   *
   * A failure of this call's own fetch rejects; a failure of a fetch this
   * call merely attached to leaves that key out of the result.
   */
  async loadBatch(
    keys: Iterable<LoaderKey>,
    fetchMany: FetchMany<T>,
    options: LoadOptions = {}
  ): Promise<Map<LoaderKey, T>> {
    const result = new Map<LoaderKey, T>();
    const attached: Array<[LoaderKey, Promise<Settled<T>>]> = [];
    const novel: LoaderKey[] = [];

    for (const key of new Set(keys)) {
      const cached = this.cache.get(key);
      if (cached) {
        this.stats.hits++;
        result.set(key, cached.record);
        continue;
      }
      const pending = this.inFlight.get(key);
      if (pending) {
        this.stats.joins++;
        attached.push([key, pending]);
        continue;
      }
      novel.push(key);
    }

    // Markers for the novel keys must exist before the first await
    const own =
      novel.length > 0
        ? this.start(novel, () => fetchMany(novel), options.timeout ?? this.timeoutMs, batchLabel(novel))
        : null;

    for (const [key, pending] of attached) {
      const settled = await pending;
      if (settled.ok && settled.value) {
        result.set(key, settled.value);
      }
    }

    if (own) {
      const outcome = await own;
      if (!outcome.ok) throw outcome.error;
      for (const key of novel) {
        const record = outcome.records.get(key);
        if (record) result.set(key, record);
      }
    }

    return result;
  }

  /**
   * Drop the cached record for `key` so the next load fetches again.
   * A fetch already in flight is not affected.
   */
  invalidate(key: LoaderKey): boolean {
    return this.cache.delete(key);
  }

  /**
   * Cached record for `key`, without fetching
   */
  peek(key: LoaderKey): T | undefined {
    return this.cache.get(key)?.record;
  }

  has(key: LoaderKey): boolean {
    return this.cache.has(key);
  }

  isInFlight(key: LoaderKey): boolean {
    return this.inFlight.has(key);
  }

  entries(): CacheEntry<T>[] {
    return Array.from(this.cache.values());
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): LoaderStats {
    return {
      ...this.stats,
      size: this.cache.size,
      inFlight: this.inFlight.size,
    };
  }

  /**
   * Drop every cached record. In-flight fetches still complete.
   */
  clear(): void {
    this.cache.clear();
  }

  /**
   * Run one fetch for `keys`, installing an in-flight marker per key.
   * Bookkeeping (cache writes, marker removal) happens before any attached
   * caller resumes.
   */
  private start(
    keys: LoaderKey[],
    run: () => Promise<ReadonlyMap<LoaderKey, T>>,
    timeoutMs: number,
    label: string
  ): Promise<FetchOutcome<T>> {
    this.stats.fetches++;

    let request: Promise<ReadonlyMap<LoaderKey, T>>;
    try {
      request = run();
    } catch (error) {
      request = Promise.reject(error);
    }

    const outcome: Promise<FetchOutcome<T>> = timeout(request, timeoutMs, label).then(
      (records): FetchOutcome<T> => ({ ok: true, records, timedOut: false }),
      (error: unknown): FetchOutcome<T> => {
        if (error instanceof FetchTimeoutError) {
          return { ok: true, records: new Map(), timedOut: true };
        }
        return { ok: false, error: new FetchTransportError(label, error) };
      }
    );

    const markers = new Map<LoaderKey, Promise<Settled<T>>>();
    const settledOutcome = outcome.then((result) => {
      this.settle(keys, markers, result);
      return result;
    });

    for (const key of keys) {
      const marker = settledOutcome.then(
        (result): Settled<T> =>
          result.ok ? { ok: true, value: result.records.get(key) ?? null } : { ok: false, error: result.error }
      );
      markers.set(key, marker);
      this.inFlight.set(key, marker);
    }

    return settledOutcome;
  }

  private settle(
    keys: LoaderKey[],
    markers: ReadonlyMap<LoaderKey, Promise<Settled<T>>>,
    result: FetchOutcome<T>
  ): void {
    for (const key of keys) {
      if (this.inFlight.get(key) === markers.get(key)) {
        this.inFlight.delete(key);
      }
    }

    if (!result.ok) {
      this.stats.failures++;
      if (this.debug) {
        console.warn(`[Livemark] ${result.error.message}`);
      }
      return;
    }

    if (result.timedOut) {
      this.stats.timeouts++;
      if (this.debug) {
        console.warn(`[Livemark] Load of ${keys.length} key(s) timed out; nothing cached`);
      }
      return;
    }

    for (const key of keys) {
      const record = result.records.get(key);
      if (record) this.commit(key, record);
    }
  }

  /**
   * Store `record` unless an entry at least as recent is already cached
   */
  private commit(key: LoaderKey, record: T): void {
    const existing = this.cache.get(key);
    if (existing && existing.record.created_at >= record.created_at) {
      return;
    }
    this.cache.set(key, { key, record, fetchedAt: now() });
  }
}

function unwrap<T>(settled: Settled<T>): T | null {
  if (!settled.ok) throw settled.error;
  return settled.value;
}

function batchLabel(keys: LoaderKey[]): string {
  return keys.length === 1 ? keys[0] : `${keys[0]} (+${keys.length - 1} more)`;
}
