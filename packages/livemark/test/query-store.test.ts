import { describe, it, expect, vi } from 'vitest';
import { QueryStore } from '../src/core/query-store';
import { EvalError, MergeConflictError } from '../src/core/errors';
import type { FeedRecord } from '../src/types';
import { createHash } from '../src/utils/hash';
import { note } from './helpers';

const ids = (store: QueryStore, id: string) =>
  store.get(id)?.items.map((item) => (typeof item === 'object' && item !== null && 'id' in item ? item.id : null));

describe('QueryStore', () => {
  describe('upsertRaw', () => {
    it('bumps the version once when a record is appended', () => {
      const store = new QueryStore();
      const a = note('a', 30);
      const b = note('b', 20);
      const c = note('c', 10);

      expect(store.upsertRaw('feed', [a, b])).toEqual({ changed: true, version: 1 });
      expect(store.upsertRaw('feed', [a, b, c])).toEqual({ changed: true, version: 2 });
      expect(ids(store, 'feed')).toEqual(['a', 'b', 'c']);
    });

    it('is idempotent for identical input', () => {
      const store = new QueryStore();
      const onChange = vi.fn();
      store.on('change', onChange);

      store.upsertRaw('feed', [note('a', 1), note('b', 2)]);
      const again = store.upsertRaw('feed', [note('b', 2), note('a', 1)]);

      expect(again).toEqual({ changed: false, version: 1 });
      expect(onChange).toHaveBeenCalledTimes(1);
      expect(onChange).toHaveBeenCalledWith({ id: 'feed', version: 1, revision: 1 });
    });

    it('does not bump a declared query for an empty batch', () => {
      const store = new QueryStore();
      store.declare('feed', 'raw');

      expect(store.upsertRaw('feed', [])).toEqual({ changed: false, version: 0 });
      expect(store.revision).toBe(0);
    });

    it('orders by recency, newest first, ties by id', () => {
      const store = new QueryStore();
      store.upsertRaw('feed', [note('m', 5), note('z', 9), note('b', 5), note('a', 1)]);

      expect(ids(store, 'feed')).toEqual(['z', 'b', 'm', 'a']);
    });

    it('reaches the same result whatever the arrival order', () => {
      const batches: FeedRecord[][] = [
        [note('a', 3), note('b', 1)],
        [note('c', 2), note('a', 3)],
        [note('d', 7)],
      ];
      const forward = new QueryStore();
      const backward = new QueryStore();

      batches.forEach((batch) => forward.upsertRaw('feed', batch));
      [...batches].reverse().forEach((batch) => backward.upsertRaw('feed', batch));

      expect(forward.get('feed')?.items).toEqual(backward.get('feed')?.items);
      expect(ids(forward, 'feed')).toEqual(['d', 'a', 'c', 'b']);
    });

    it('keeps the most recent version of a record', () => {
      const store = new QueryStore();
      store.upsertRaw('feed', [note('a', 10, 'alice', 'second')]);

      expect(store.upsertRaw('feed', [note('a', 5, 'alice', 'first')]).changed).toBe(false);
      expect(store.get('feed')?.items).toEqual([note('a', 10, 'alice', 'second')]);

      expect(store.upsertRaw('feed', [note('a', 20, 'alice', 'third')]).version).toBe(2);
      expect(store.get('feed')?.items).toEqual([note('a', 20, 'alice', 'third')]);
    });

    it('reports equal-timestamp conflicts and resolves them independently of order', () => {
      const left = note('a', 10, 'alice', 'left');
      const right = note('a', 10, 'alice', 'right');
      const first = new QueryStore();
      const second = new QueryStore();
      const errors: unknown[] = [];
      first.on('error', (error) => errors.push(error));

      first.upsertRaw('feed', [left]);
      first.upsertRaw('feed', [right]);
      second.upsertRaw('feed', [right]);
      second.upsertRaw('feed', [left]);

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(MergeConflictError);
      expect(first.get('feed')?.items).toEqual(second.get('feed')?.items);
    });

    it('replaces the whole set in replace mode', () => {
      const store = new QueryStore();
      store.upsertRaw('feed', [note('a', 2), note('b', 1)]);
      store.upsertRaw('feed', [note('c', 3)], { mode: 'replace' });

      expect(ids(store, 'feed')).toEqual(['c']);
      expect(store.get('feed')?.version).toBe(2);
    });

    it('moves the version only when the items change', () => {
      const store = new QueryStore();
      const steps: Array<[FeedRecord[], boolean]> = [
        [[note('a', 1)], true],
        [[note('a', 1)], false],
        [[note('b', 2)], true],
        [[], false],
        [[note('a', 0)], false],
        [[note('a', 4)], true],
      ];

      let version = 0;
      for (const [records, changes] of steps) {
        const result = store.upsertRaw('feed', records);
        expect(result.changed).toBe(changes);
        expect(result.version).toBe(changes ? version + 1 : version);
        version = result.version;
      }
      expect(store.revision).toBe(3);
    });

    it('refuses to write records into a derived query', () => {
      const store = new QueryStore();
      store.declare('count', 'derived');

      expect(() => store.upsertRaw('count', [note('a', 1)])).toThrow(/derived query 'count'/);
    });
  });

  describe('recomputeDerived', () => {
    it('stores the transform result and bumps only on change', () => {
      const store = new QueryStore();
      store.upsertRaw('feed', [note('a', 1), note('b', 2)]);
      const count = (input: Record<string, unknown>) => {
        const feed = input.feed;
        return { ok: true as const, value: Array.isArray(feed) ? feed.length : 0 };
      };

      expect(store.recomputeDerived('count', count)).toEqual({ changed: true, version: 1 });
      expect(store.get('count')?.value).toBe(2);
      expect(store.get('count')?.items).toEqual([2]);
      expect(store.recomputeDerived('count', count)).toEqual({ changed: false, version: 1 });
    });

    it('bumps for a new value even when its hash matches the old one', () => {
      const store = new QueryStore();
      const constant = (value: number) => () => ({ ok: true as const, value });

      store.recomputeDerived('count', constant(40189));
      expect(createHash(40189)).toBe(createHash(797186));

      expect(store.recomputeDerived('count', constant(797186))).toEqual({ changed: true, version: 2 });
      expect(store.get('count')?.value).toBe(797186);
    });

    it('tells a string apart from the number it spells', () => {
      const store = new QueryStore();
      store.recomputeDerived('count', () => ({ ok: true, value: 77 }));

      expect(store.recomputeDerived('count', () => ({ ok: true, value: '77' }))).toEqual({ changed: true, version: 2 });
    });

    it('keeps the previous value when the transform fails', () => {
      const store = new QueryStore();
      const errors: unknown[] = [];
      store.on('error', (error) => errors.push(error));
      store.recomputeDerived('titles', () => ({ ok: true, value: ['hello'] }));

      const failure = new EvalError('.feed[0]', 'Cannot index number');
      const result = store.recomputeDerived('titles', () => ({ ok: false, error: failure }));

      expect(result).toEqual({ changed: false, version: 1, error: failure });
      expect(store.get('titles')?.value).toEqual(['hello']);
      expect(errors).toEqual([failure]);
    });

    it('contains a transform that throws', () => {
      const store = new QueryStore();
      const result = store.recomputeDerived('broken', () => {
        throw new Error('boom');
      });

      expect(result.error).toBeInstanceOf(EvalError);
      expect(result.error?.message).toBe("Failed to evaluate 'broken': boom");
      expect(store.get('broken')?.version).toBe(0);
    });

    it('reads the snapshot it is given', () => {
      const store = new QueryStore();
      store.upsertRaw('feed', [note('a', 1)]);
      const before = store.snapshot();
      store.upsertRaw('feed', [note('b', 2)]);

      store.recomputeDerived('seen', (input) => ({ ok: true, value: input.feed }), before);

      expect(store.get('seen')?.value).toEqual([note('a', 1)]);
    });
  });

  describe('snapshot', () => {
    it('is not affected by later writes', () => {
      const store = new QueryStore();
      store.upsertRaw('feed', [note('a', 1)]);
      const snapshot = store.snapshot();

      store.upsertRaw('feed', [note('b', 2)]);

      expect(snapshot.get('feed')?.version).toBe(1);
      expect(snapshot.get('feed')?.items).toHaveLength(1);
      expect(Object.isFrozen(snapshot.get('feed'))).toBe(true);
    });

    it('exposes values by query id', () => {
      const store = new QueryStore();
      store.upsertRaw('feed', [note('a', 1)]);
      store.recomputeDerived('count', () => ({ ok: true, value: 1 }));

      expect(QueryStore.toJSON(store.snapshot())).toEqual({ feed: [note('a', 1)], count: 1 });
    });
  });
});
