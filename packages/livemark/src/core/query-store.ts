/**
 * livemark - Query Store
 *
 * Named, versioned result sets. Raw queries hold records merged from
 * subscriptions and loads; derived queries hold pipe results. A query's
 * version moves only when what it holds changes.
 */

import EventEmitter from 'eventemitter3';
import { isFeedRecord } from '../types';
import type { EvalResult, FeedRecord, Query, QueryChange, QueryKind, QuerySnapshot } from '../types';
import { EvalError, MergeConflictError, toError, type LivemarkError } from './errors';
import { stableStringify } from '../utils/hash';

export interface QueryStoreEvents {
  change: (change: QueryChange) => void;
  error: (error: LivemarkError) => void;
}

export interface QueryStoreOptions {
  debug?: boolean;
}

export interface UpsertOptions {
  /** `merge` unions with what is stored; `replace` starts from nothing */
  mode?: 'merge' | 'replace';
}

export interface UpdateResult {
  changed: boolean;
  version: number;
  error?: LivemarkError;
}

/**
 * Transform for a derived query. Receives `{ [queryId]: value }` for every
 * query in the input snapshot.
 */
export type DerivedTransform = (input: Record<string, unknown>) => EvalResult;

interface StoredQuery extends Query {
  /** Key-sorted serialization of what the query holds; a write that leaves it equal is not observable */
  content: string;
}

/**
 * Feed order: newest first, ties broken by id ascending
 */
export function compareRecords(a: FeedRecord, b: FeedRecord): number {
  if (a.created_at !== b.created_at) {
    return b.created_at - a.created_at;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class QueryStore extends EventEmitter<QueryStoreEvents> {
  private queries: Map<string, StoredQuery> = new Map();
  private currentRevision = 0;
  private debug: boolean;

  constructor(options: QueryStoreOptions = {}) {
    super();
    this.debug = options.debug ?? false;
  }

  /**
   * Store-wide counter, bumped together with any query version
   */
  get revision(): number {
    return this.currentRevision;
  }

  /**
   * Create an empty query at version 0 if it does not exist yet
   */
  declare(id: string, kind: QueryKind): StoredQuery {
    const existing = this.queries.get(id);
    if (existing) {
      if (existing.kind !== kind) {
        throw new Error(`Query '${id}' is already declared as ${existing.kind}`);
      }
      return existing;
    }
    const query = freezeQuery({ id, kind, items: [], value: [], version: 0, content: stableStringify([]) });
    this.queries.set(id, query);
    return query;
  }

  /**
   * Merge records into a raw query. Records are unioned by id; on conflict
   * the most recent `created_at` wins. The result is kept in feed order and
   * the version is bumped only if that ordered sequence changed.
   */
  upsertRaw(id: string, records: readonly FeedRecord[], options: UpsertOptions = {}): UpdateResult {
    const existing = this.queries.get(id) ?? this.declare(id, 'raw');
    if (existing.kind !== 'raw') {
      throw new Error(`Cannot write records into derived query '${id}'`);
    }

    const byId = new Map<string, FeedRecord>();
    if (options.mode !== 'replace') {
      for (const item of existing.items) {
        if (isFeedRecord(item)) byId.set(item.id, item);
      }
    }

    for (const record of records) {
      const current = byId.get(record.id);
      byId.set(record.id, current ? this.pickNewer(id, current, record) : record);
    }

    const items = Array.from(byId.values()).sort(compareRecords);
    return this.write(existing, items, items, stableStringify(items));
  }

  /**
   * Recompute a derived query from a snapshot of its inputs. On failure the
   * previous value stays in place and the error is reported, never thrown.
   */
  recomputeDerived(
    id: string,
    transform: DerivedTransform,
    inputs: QuerySnapshot = this.snapshot()
  ): UpdateResult {
    const existing = this.queries.get(id) ?? this.declare(id, 'derived');
    if (existing.kind !== 'derived') {
      throw new Error(`Cannot recompute raw query '${id}'`);
    }

    let result: EvalResult;
    try {
      result = transform(QueryStore.toJSON(inputs));
    } catch (error) {
      result = { ok: false, error: new EvalError(id, toError(error).message) };
    }

    if (!result.ok) {
      if (this.debug) {
        console.warn(`[Livemark] Pipe '${id}' failed, keeping previous value:`, result.error.message);
      }
      this.emit('error', result.error);
      return { changed: false, version: existing.version, error: result.error };
    }

    const value = result.value;
    const items = Array.isArray(value) ? value : [value];
    return this.write(existing, items, value, stableStringify(value));
  }

  /**
   * Consistent read-only view for one render pass
   */
  snapshot(): QuerySnapshot {
    return new Map<string, Query>(this.queries);
  }

  get(id: string): Query | undefined {
    return this.queries.get(id);
  }

  has(id: string): boolean {
    return this.queries.has(id);
  }

  ids(): string[] {
    return Array.from(this.queries.keys());
  }

  /**
   * Forget a query that is no longer declared
   */
  remove(id: string): boolean {
    return this.queries.delete(id);
  }

  /**
   * `{ [queryId]: value }` view of a snapshot, as expressions see it
   */
  static toJSON(snapshot: QuerySnapshot): Record<string, unknown> {
    const json: Record<string, unknown> = {};
    for (const [id, query] of snapshot) {
      json[id] = query.value;
    }
    return json;
  }

  private write(existing: StoredQuery, items: readonly unknown[], value: unknown, content: string): UpdateResult {
    if (existing.content === content) {
      return { changed: false, version: existing.version };
    }

    const version = existing.version + 1;
    this.currentRevision++;
    this.queries.set(existing.id, freezeQuery({ id: existing.id, kind: existing.kind, items, value, version, content }));
    this.emit('change', { id: existing.id, version, revision: this.currentRevision });

    return { changed: true, version };
  }

  /**
   * Two versions of the same record: the newer one wins. Equal timestamps
   * with different content resolve by comparing their serializations so the
   * merge does not depend on arrival order.
   */
  private pickNewer(queryId: string, current: FeedRecord, incoming: FeedRecord): FeedRecord {
    if (incoming.created_at !== current.created_at) {
      return incoming.created_at > current.created_at ? incoming : current;
    }

    const currentContent = stableStringify(current);
    const incomingContent = stableStringify(incoming);
    if (currentContent === incomingContent) {
      return current;
    }

    const conflict = new MergeConflictError(queryId, incoming.id);
    if (this.debug) {
      console.warn(`[Livemark] ${conflict.message}`);
    }
    this.emit('error', conflict);
    return incomingContent > currentContent ? incoming : current;
  }
}

function freezeQuery(query: StoredQuery): StoredQuery {
  Object.freeze(query.items);
  return Object.freeze(query);
}
