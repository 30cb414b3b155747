import { EvalError, toError } from '../src/core/errors';
import type { Evaluator, FeedRecord } from '../src/types';

/**
 * Small jq subset for tests: paths (`.a.b`, `.a[0]`), pipes, `length`,
 * `map(...)`, `//` defaults and JSON literals. Indexing a number, string or
 * array by name fails like jq does.
 */
export function createPathEvaluator(): Evaluator {
  return {
    evaluate(expression, input) {
      try {
        return { ok: true, value: runPipeline(expression, input) };
      } catch (error) {
        return { ok: false, error: new EvalError(expression, toError(error).message) };
      }
    },
  };
}

function runPipeline(expression: string, input: unknown): unknown {
  return expression
    .split('|')
    .map((stage) => stage.trim())
    .reduce<unknown>((value, stage) => runStage(stage, value), input);
}

function runStage(text: string, value: unknown): unknown {
  const alternative = text.indexOf('//');
  if (alternative >= 0) {
    let left: unknown = null;
    try {
      left = runStage(text.slice(0, alternative).trim(), value);
    } catch {
      left = null;
    }
    return left === null || left === undefined || left === false
      ? runStage(text.slice(alternative + 2).trim(), value)
      : left;
  }

  if (text === 'length') {
    if (Array.isArray(value) || typeof value === 'string') return value.length;
    if (value === null) return 0;
    if (typeof value === 'object') return Object.keys(value).length;
    throw new Error(`${typeof value} has no length`);
  }

  const map = /^map\((.+)\)$/.exec(text);
  if (map) {
    if (!Array.isArray(value)) throw new Error('Cannot iterate over non-array');
    return value.map((item: unknown) => runPipeline(map[1], item));
  }

  if (/^-?\d+(\.\d+)?$/.test(text) || text.startsWith('"') || ['null', 'true', 'false'].includes(text)) {
    return JSON.parse(text);
  }

  return readPath(text, value);
}

const SEGMENT = /^(?:\.([A-Za-z_][\w-]*)|\.?\[(\d+)\])/;

function readPath(text: string, value: unknown): unknown {
  if (!text.startsWith('.')) throw new Error(`Unsupported expression: ${text}`);
  if (text === '.') return value;

  let rest = text;
  let current: unknown = value;
  while (rest.length > 0) {
    const match = SEGMENT.exec(rest);
    if (!match) throw new Error(`Unsupported expression: ${text}`);
    rest = rest.slice(match[0].length);

    if (current === null || current === undefined) {
      current = null;
      continue;
    }

    if (match[1] !== undefined) {
      if (typeof current !== 'object' || Array.isArray(current)) {
        throw new Error(`Cannot index ${describe(current)} with "${match[1]}"`);
      }
      const next: unknown = Reflect.get(current, match[1]);
      current = next ?? null;
    } else {
      if (!Array.isArray(current)) {
        throw new Error(`Cannot index ${describe(current)} with number`);
      }
      const next: unknown = current[Number(match[2])];
      current = next ?? null;
    }
  }
  return current;
}

function describe(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

export function note(id: string, createdAt: number, pubkey = 'alice', content = `note ${id}`): FeedRecord {
  return { id, pubkey, created_at: createdAt, kind: 1, content, tags: [] };
}

export function profile(pubkey: string, name: string, createdAt = 100): FeedRecord {
  return {
    id: `profile-${pubkey}-${createdAt}`,
    pubkey,
    created_at: createdAt,
    kind: 0,
    content: JSON.stringify({ name }),
    tags: [],
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
