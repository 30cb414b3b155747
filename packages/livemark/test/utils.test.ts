import { describe, it, expect, vi, afterEach } from 'vitest';
import { combineHashes, createHash, hashEquals, stableStringify } from '../src/utils/hash';
import { backoffDelay, debounce, sleep, timeout } from '../src/utils/time';
import { FetchTimeoutError } from '../src/core/errors';

describe('hash', () => {
  it('ignores object key order', () => {
    expect(createHash({ a: 1, b: [1, { c: 2, d: 3 }] })).toBe(createHash({ b: [1, { d: 3, c: 2 }], a: 1 }));
    expect(stableStringify({ b: 1, a: 2 })).toBe('{"a":2,"b":1}');
  });

  it('tells strings apart from the values they spell', () => {
    expect(createHash('77')).not.toBe(createHash(77));
    expect(createHash('null')).not.toBe(createHash(null));
    expect(stableStringify('77')).toBe('"77"');
  });

  it('tells array order and undefined apart', () => {
    expect(createHash([1, 2])).not.toBe(createHash([2, 1]));
    expect(createHash(undefined)).not.toBe(createHash(null));
    expect(combineHashes(['a', 'b'])).not.toBe(combineHashes(['b', 'a']));
  });

  it('compares null hashes only with null', () => {
    expect(hashEquals(null, null)).toBe(true);
    expect(hashEquals(null, createHash(null))).toBe(false);
    expect(hashEquals(createHash(1), createHash(1))).toBe(true);
  });
});

describe('time', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('doubles the backoff delay up to the cap', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);

    expect([0, 1, 2, 3].map((attempt) => backoffDelay(attempt, 100))).toEqual([100, 200, 400, 800]);
    expect(backoffDelay(20, 100, 1000)).toBe(1000);
  });

  it('rejects with a timeout error when the promise is too slow', async () => {
    vi.useFakeTimers();
    const result = timeout(new Promise<number>(() => {}), 50, '0:alice:');
    const assertion = expect(result).rejects.toBeInstanceOf(FetchTimeoutError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    await expect(result).rejects.toThrow('Fetch for 0:alice: timed out after 50ms');
  });

  it('resolves a sleep early on abort', async () => {
    const controller = new AbortController();
    const slept = sleep(60_000, controller.signal);

    controller.abort();

    await expect(slept).resolves.toBeUndefined();
  });

  it('runs a debounced call once per burst', () => {
    vi.useFakeTimers();
    const fn = vi.fn();
    const debounced = debounce(fn, 10);

    debounced();
    debounced();
    vi.advanceTimersByTime(9);
    debounced();
    expect(debounced.pending()).toBe(true);
    vi.advanceTimersByTime(10);
    expect(fn).toHaveBeenCalledTimes(1);

    debounced();
    debounced.flush();
    expect(fn).toHaveBeenCalledTimes(2);
    expect(debounced.pending()).toBe(false);

    debounced();
    debounced.cancel();
    vi.advanceTimersByTime(20);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('fires a steadily re-triggered call once maxWait has passed', () => {
    vi.useFakeTimers();
    const fn = vi.fn();
    const debounced = debounce(fn, 16, { maxWait: 16 });
    const starved = vi.fn();
    const plain = debounce(starved, 16);

    for (let i = 0; i < 10; i++) {
      debounced();
      plain();
      vi.advanceTimersByTime(10);
    }

    expect(fn).toHaveBeenCalledTimes(5);
    expect(starved).not.toHaveBeenCalled();
  });
});
