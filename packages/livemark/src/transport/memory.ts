/**
 * livemark - Memory Data Source
 *
 * In-process data source for embedding, demos and tests. Holds a record
 * set, answers one-shot fetches from it and pushes new records to open
 * subscriptions. No network involved.
 */

import { nanoid } from 'nanoid';
import type { CompiledFilter, DataSource, EventTemplate, FeedRecord, FetchOnceOptions } from '../types';
import { matchFilter } from '../core/filter';
import { compareRecords } from '../core/query-store';
import { sleep } from '../utils/time';

export interface MemoryDataSourceOptions {
  /** Initial record set */
  records?: readonly FeedRecord[];
  /** Delay before a one-shot fetch answers, in ms */
  latency?: number;
  /** Author for published templates; when set they become records */
  publishAs?: string;
}

interface Subscriber {
  filter: CompiledFilter;
  deliver: (batch: FeedRecord[]) => void;
}

export class MemoryDataSource implements DataSource {
  /** Templates handed to `publish`, in order */
  readonly published: EventTemplate[] = [];
  /** Filters passed to `fetchOnce`, in order */
  readonly fetches: CompiledFilter[] = [];

  private records: Map<string, FeedRecord> = new Map();
  private subscribers: Set<Subscriber> = new Set();
  private latency: number;
  private publishAs?: string;
  private fetchFailure: Error | null = null;
  private subscribeFailures = 0;

  constructor(options: MemoryDataSourceOptions = {}) {
    this.latency = options.latency ?? 0;
    this.publishAs = options.publishAs;
    for (const record of options.records ?? []) {
      this.records.set(record.id, record);
    }
  }

  /**
   * Add records and deliver them to every open subscription they match
   */
  push(records: readonly FeedRecord[]): void {
    for (const record of records) {
      this.records.set(record.id, record);
    }
    for (const subscriber of this.subscribers) {
      const batch = records.filter((record) => matchFilter(subscriber.filter, record));
      if (batch.length > 0) subscriber.deliver(batch);
    }
  }

  /**
   * Stored records matching `filter`, newest first, capped at its limit
   */
  query(filter: CompiledFilter): FeedRecord[] {
    const matched = Array.from(this.records.values())
      .filter((record) => matchFilter(filter, record))
      .sort(compareRecords);
    return filter.limit !== undefined ? matched.slice(0, filter.limit) : matched;
  }

  /**
   * Make one-shot fetches reject until cleared with `null`
   */
  failFetches(error: Error | null): void {
    this.fetchFailure = error;
  }

  /**
   * Make the next `count` subscriptions fail before delivering anything
   */
  failSubscriptions(count: number): void {
    this.subscribeFailures = count;
  }

  get fetchCount(): number {
    return this.fetches.length;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Yields the stored matches first (possibly empty), then every pushed
   * batch that matches, until `signal` aborts
   */
  async *subscribe(filter: CompiledFilter, signal: AbortSignal): AsyncIterable<readonly FeedRecord[]> {
    if (this.subscribeFailures > 0) {
      this.subscribeFailures--;
      throw new Error('Subscription refused');
    }

    const queue: FeedRecord[][] = [];
    let wake: (() => void) | null = null;
    const subscriber: Subscriber = {
      filter,
      deliver: (batch) => {
        queue.push(batch);
        wake?.();
      },
    };
    const onAbort = () => wake?.();

    signal.addEventListener('abort', onAbort);
    this.subscribers.add(subscriber);
    try {
      yield this.query(filter);
      while (!signal.aborted) {
        const batch = queue.shift();
        if (batch) {
          yield batch;
          continue;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = null;
      }
    } finally {
      this.subscribers.delete(subscriber);
      signal.removeEventListener('abort', onAbort);
    }
  }

  async fetchOnce(filter: CompiledFilter, options: FetchOnceOptions): Promise<readonly FeedRecord[]> {
    this.fetches.push(filter);
    if (this.latency > 0) {
      await sleep(this.latency, options.signal);
    }
    if (this.fetchFailure) {
      throw this.fetchFailure;
    }
    return this.query(filter);
  }

  async publish(template: EventTemplate): Promise<void> {
    this.published.push(template);
    if (this.publishAs) {
      this.push([{ id: nanoid(), pubkey: this.publishAs, ...template }]);
    }
  }
}
