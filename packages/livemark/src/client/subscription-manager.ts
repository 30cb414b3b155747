/**
 * livemark - Subscription Manager
 *
 * Owns the lifecycle of continuous filter subscriptions and of one-shot
 * load dependencies, and feeds what they receive into the query store.
 */

import EventEmitter from 'eventemitter3';
import { nanoid } from 'nanoid';
import { isFeedRecord } from '../types';
import type { CompiledFilter, DataSource, FeedRecord, LoadDependency, QueryChange } from '../types';
import type { QueryStore } from '../core/query-store';
import type { LoaderCache } from '../core/loader-cache';
import { loaderKey, parseLoaderKey, recordLoaderKey, type LoaderKey } from '../core/loader-key';
import { FetchTimeoutError, FetchTransportError, LivemarkError } from '../core/errors';
import { backoffDelay, sleep, timeout } from '../utils/time';

export type SubscriptionState = 'opening' | 'active' | 'closing' | 'closed';

export type LoadState = 'requested' | 'inflight' | 'cached' | 'resolved' | 'failed';

export interface SubscriptionStatus {
  /** Query the subscription feeds */
  id: string;
  /** Unique per opened subscription; a reopened filter gets a new handle */
  handle: string;
  state: SubscriptionState;
  filter: CompiledFilter;
  batches: number;
  retries: number;
  error?: LivemarkError;
}

export interface SubscriptionManagerEvents {
  state: (status: SubscriptionStatus) => void;
  load: (id: string, key: LoaderKey, state: LoadState) => void;
  error: (error: LivemarkError) => void;
}

export interface SubscriptionManagerOptions {
  source: DataSource;
  store: QueryStore;
  cache: LoaderCache<FeedRecord>;
  loadTimeout: number;
  maxRetries: number;
  retryBaseDelay: number;
  debug?: boolean;
}

interface FilterTask {
  id: string;
  handle: string;
  filter: CompiledFilter;
  controller: AbortController;
  state: SubscriptionState;
  batches: number;
  retries: number;
  error?: LivemarkError;
  done: Promise<void>;
}

interface LoadTask {
  id: string;
  dependency: LoadDependency;
  /** Keys handed to the cache and not failed */
  requested: Set<LoaderKey>;
  states: Map<LoaderKey, LoadState>;
  pending: Set<Promise<void>>;
  cancelled: boolean;
  detach: () => void;
}

export class SubscriptionManager extends EventEmitter<SubscriptionManagerEvents> {
  private filters: Map<string, FilterTask> = new Map();
  private loads: Map<string, LoadTask> = new Map();
  private source: DataSource;
  private store: QueryStore;
  private cache: LoaderCache<FeedRecord>;
  private options: SubscriptionManagerOptions;

  constructor(options: SubscriptionManagerOptions) {
    super();
    this.options = options;
    this.source = options.source;
    this.store = options.store;
    this.cache = options.cache;
  }

  // ==========================================================================
  // Continuous subscriptions
  // ==========================================================================

  /**
   * Open a continuous subscription feeding raw query `id`. A subscription
   * already open for `id` is closed first.
   */
  openFilter(id: string, filter: CompiledFilter): SubscriptionStatus {
    const previous = this.filters.get(id);
    if (previous) this.stop(previous);

    this.store.declare(id, 'raw');

    const task: FilterTask = {
      id,
      handle: nanoid(),
      filter,
      controller: new AbortController(),
      state: 'opening',
      batches: 0,
      retries: 0,
      done: Promise.resolve(),
    };
    this.filters.set(id, task);
    this.emit('state', this.statusOf(task));

    task.done = this.runFilter(task);
    return this.statusOf(task);
  }

  /**
   * Close the subscription (or load dependency) feeding `id`. Resolves once
   * the subscription's task has stopped.
   */
  async close(id: string): Promise<boolean> {
    const task = this.filters.get(id);
    if (task) {
      this.filters.delete(id);
      this.stop(task);
      await task.done;
      return true;
    }
    return this.removeLoadDependency(id);
  }

  /**
   * Close every subscription and cancel every load dependency
   */
  async closeAll(): Promise<void> {
    const tasks = Array.from(this.filters.values());
    this.filters.clear();
    for (const task of tasks) this.stop(task);

    for (const id of Array.from(this.loads.keys())) {
      this.removeLoadDependency(id);
    }

    await Promise.all(tasks.map((task) => task.done));
  }

  getStatus(id: string): SubscriptionStatus | undefined {
    const task = this.filters.get(id);
    return task ? this.statusOf(task) : undefined;
  }

  getStatuses(): SubscriptionStatus[] {
    return Array.from(this.filters.values(), (task) => this.statusOf(task));
  }

  private stop(task: FilterTask): void {
    if (task.state === 'closing' || task.state === 'closed') return;
    this.setState(task, 'closing');
    task.controller.abort();
  }

  private async runFilter(task: FilterTask): Promise<void> {
    const { signal } = task.controller;

    while (!signal.aborted) {
      try {
        for await (const batch of this.source.subscribe(task.filter, signal)) {
          if (signal.aborted) break;
          if (task.state === 'opening') this.setState(task, 'active');
          task.batches++;
          task.retries = 0;
          this.store.upsertRaw(task.id, batch);
        }
        break;
      } catch (error) {
        if (signal.aborted) break;

        const failure = new FetchTransportError(task.id, error);
        task.error = failure;
        this.emit('error', failure);

        if (task.retries >= this.options.maxRetries) {
          if (this.options.debug) {
            console.error(`[Livemark] Subscription '${task.id}' gave up after ${task.retries} retries`);
          }
          break;
        }

        const delay = backoffDelay(task.retries, this.options.retryBaseDelay);
        task.retries++;
        if (this.options.debug) {
          console.warn(`[Livemark] Subscription '${task.id}' failed, retry ${task.retries} in ${delay}ms`);
        }
        await sleep(delay, signal);
      }
    }

    this.setState(task, 'closed');
  }

  private setState(task: FilterTask, state: SubscriptionState): void {
    if (task.state === state) return;
    task.state = state;
    if (this.options.debug) {
      console.log(`[Livemark] Subscription '${task.id}' ${state}`);
    }
    this.emit('state', this.statusOf(task));
  }

  private statusOf(task: FilterTask): SubscriptionStatus {
    const status: SubscriptionStatus = {
      id: task.id,
      handle: task.handle,
      state: task.state,
      filter: task.filter,
      batches: task.batches,
      retries: task.retries,
    };
    if (task.error) status.error = task.error;
    return status;
  }

  // ==========================================================================
  // Load dependencies
  // ==========================================================================

  /**
   * Keep raw query `id` filled with one record per key implied by the
   * records of `dependency.from`. Each time the source query changes, only
   * keys this dependency has not requested yet go to the loader cache.
   */
  addLoadDependency(id: string, dependency: LoadDependency): void {
    this.removeLoadDependency(id);
    this.store.declare(id, 'raw');

    const task: LoadTask = {
      id,
      dependency,
      requested: new Set(),
      states: new Map(),
      pending: new Set(),
      cancelled: false,
      detach: () => {},
    };

    const onChange = (change: QueryChange) => {
      if (change.id === dependency.from) this.refreshLoad(task);
    };
    this.store.on('change', onChange);
    task.detach = () => this.store.off('change', onChange);

    this.loads.set(id, task);
    this.refreshLoad(task);
  }

  /**
   * Stop following the source query. Loads already in flight still fill
   * the cache; their records are not merged into the query.
   */
  removeLoadDependency(id: string): boolean {
    const task = this.loads.get(id);
    if (!task) return false;
    task.cancelled = true;
    task.detach();
    this.loads.delete(id);
    return true;
  }

  getLoadStates(id: string): ReadonlyMap<LoaderKey, LoadState> | undefined {
    return this.loads.get(id)?.states;
  }

  /**
   * Resolves once every one-shot load started so far has settled
   */
  async idle(): Promise<void> {
    const pending = Array.from(this.loads.values(), (task) => Array.from(task.pending)).flat();
    await Promise.all(pending);
    if (Array.from(this.loads.values()).some((task) => task.pending.size > 0)) {
      await this.idle();
    }
  }

  private refreshLoad(task: LoadTask): void {
    const query = this.store.get(task.dependency.from);
    if (!query) return;

    const keys: LoaderKey[] = [];
    for (const key of dependencyKeys(query.items, task.dependency)) {
      if (task.requested.has(key)) continue;
      task.requested.add(key);
      keys.push(key);
      this.setLoadState(task, key, 'requested');
      this.setLoadState(task, key, this.cache.has(key) ? 'cached' : 'inflight');
    }
    if (keys.length === 0) return;

    const pending: Promise<void> = this.cache
      .loadBatch(keys, (novel) => this.fetchKeys(novel), { timeout: this.options.loadTimeout })
      .then(
        (records) => {
          task.pending.delete(pending);
          for (const key of keys) {
            if (records.has(key)) {
              this.setLoadState(task, key, 'resolved');
            } else {
              task.requested.delete(key);
              this.setLoadState(task, key, 'failed');
            }
          }
          if (!task.cancelled && records.size > 0) {
            this.store.upsertRaw(task.id, Array.from(records.values()));
          }
        },
        (error: unknown) => {
          task.pending.delete(pending);
          for (const key of keys) {
            task.requested.delete(key);
            this.setLoadState(task, key, 'failed');
          }
          if (!task.cancelled) {
            this.emit('error', error instanceof LivemarkError ? error : new FetchTransportError(task.id, error));
          }
        }
      );
    task.pending.add(pending);
  }

  private setLoadState(task: LoadTask, key: LoaderKey, state: LoadState): void {
    task.states.set(key, state);
    this.emit('load', task.id, key, state);
  }

  /**
   * One `fetchOnce` per (kind, identifier) group, answering each key with
   * its newest record
   */
  private async fetchKeys(keys: LoaderKey[]): Promise<Map<LoaderKey, FeedRecord>> {
    const groups = new Map<string, { kind: number; identifier: string; authors: string[] }>();
    for (const key of keys) {
      const address = parseLoaderKey(key);
      if (!address) continue;
      const identifier = address.identifier ?? '';
      const groupKey = `${address.kind}:${identifier}`;
      const group = groups.get(groupKey) ?? { kind: address.kind, identifier, authors: [] };
      group.authors.push(address.pubkey);
      groups.set(groupKey, group);
    }

    const wanted = new Set(keys);
    const found = new Map<LoaderKey, FeedRecord>();
    const batches = await Promise.all(
      Array.from(groups.values(), (group) =>
        this.source.fetchOnce(
          {
            kinds: [group.kind],
            authors: group.authors,
            tags: group.identifier ? { d: [group.identifier] } : {},
          },
          { timeout: this.options.loadTimeout }
        )
      )
    );

    for (const record of batches.flat()) {
      const key = recordLoaderKey(record);
      if (!wanted.has(key)) continue;
      const existing = found.get(key);
      if (!existing || record.created_at > existing.created_at) {
        found.set(key, record);
      }
    }
    return found;
  }

  // ==========================================================================
  // One-shot fetches
  // ==========================================================================

  /**
   * Fetch whatever the source holds for `filter`. A source that does not
   * answer within the load timeout yields no records.
   */
  async fetchOnce(filter: CompiledFilter, options: { timeout?: number } = {}): Promise<readonly FeedRecord[]> {
    const ms = options.timeout ?? this.options.loadTimeout;
    const controller = new AbortController();
    try {
      return await timeout(this.source.fetchOnce(filter, { timeout: ms, signal: controller.signal }), ms, 'fetchOnce');
    } catch (error) {
      if (error instanceof FetchTimeoutError) {
        controller.abort();
        return [];
      }
      throw new FetchTransportError('fetchOnce', error);
    }
  }
}

/**
 * Loader keys implied by the records of a source query
 */
export function dependencyKeys(items: readonly unknown[], dependency: LoadDependency): LoaderKey[] {
  const keys = new Set<LoaderKey>();
  for (const item of items) {
    if (!isFeedRecord(item)) continue;
    for (const pubkey of fieldValues(item, dependency.field)) {
      keys.add(loaderKey({ kind: dependency.kind, pubkey, identifier: dependency.identifier }));
    }
  }
  return Array.from(keys);
}

/**
 * `pubkey` reads the author; `#p` reads every `p` tag value
 */
function fieldValues(record: FeedRecord, field: string): string[] {
  if (field.startsWith('#')) {
    const letter = field.slice(1);
    return record.tags.filter((tag) => tag[0] === letter && tag[1]).map((tag) => tag[1]);
  }
  switch (field) {
    case 'pubkey':
      return [record.pubkey];
    case 'id':
      return [record.id];
    default:
      return [];
  }
}
