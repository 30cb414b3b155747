/**
 * livemark - Filters
 *
 * Turns authored filter definitions into the frozen form handed to a data
 * source, and matches records against it.
 */

import type { CompiledFilter, Evaluator, FeedRecord, FilterDefinition } from '../types';
import type { RuntimeContext } from './context';
import { createHash } from '../utils/hash';

const HEX_KEY = /^[0-9a-f]{64}$/i;
const NPUB_KEY = /^npub1[02-9ac-hj-np-z]{58}$/;

export interface CompileFilterOptions {
  debug?: boolean;
}

/**
 * Resolve author placeholders and drop empty constraints.
 *
 * Authors that are hex or npub keys are taken as written. Anything else is
 * an expression (`user.pubkey`, `state.following`) that must yield a hex or
 * npub key, or a list of them. Authors that fail to resolve are dropped; if
 * none resolve, the author constraint is left off.
 */
export function compileFilter(
  definition: FilterDefinition,
  context: RuntimeContext,
  evaluator: Evaluator,
  options: CompileFilterOptions = {}
): CompiledFilter {
  const tags: Record<string, readonly string[]> = {};
  for (const [letter, values] of Object.entries(definition.tags)) {
    if (values.length > 0) tags[letter] = Object.freeze([...values]);
  }

  const compiled: {
    kinds?: readonly number[];
    authors?: readonly string[];
    ids?: readonly string[];
    tags: Readonly<Record<string, readonly string[]>>;
    since?: number;
    until?: number;
    limit?: number;
  } = { tags: Object.freeze(tags) };

  if (definition.kinds && definition.kinds.length > 0) {
    compiled.kinds = Object.freeze([...definition.kinds]);
  }
  if (definition.authors && definition.authors.length > 0) {
    const authors = resolveAuthors(definition.authors, context, evaluator, options);
    if (authors.length > 0) compiled.authors = Object.freeze(authors);
  }
  if (definition.ids && definition.ids.length > 0) {
    compiled.ids = Object.freeze([...definition.ids]);
  }
  if (definition.since !== undefined) compiled.since = definition.since;
  if (definition.until !== undefined) compiled.until = definition.until;
  if (definition.limit !== undefined) compiled.limit = definition.limit;

  return Object.freeze(compiled);
}

function resolveAuthors(
  authors: readonly string[],
  context: RuntimeContext,
  evaluator: Evaluator,
  options: CompileFilterOptions
): string[] {
  const resolved = new Set<string>();

  for (const author of authors) {
    const key = asKey(author);
    if (key) {
      resolved.add(key);
      continue;
    }

    const result = context.eval(author, evaluator);
    if (!result.ok) {
      if (options.debug) {
        console.warn(`[Livemark] Dropping author '${author}':`, result.error.message);
      }
      continue;
    }

    const values = Array.isArray(result.value) ? result.value : [result.value];
    for (const value of values) {
      const resolvedKey = typeof value === 'string' ? asKey(value) : null;
      if (resolvedKey) {
        resolved.add(resolvedKey);
      } else if (options.debug) {
        console.warn(`[Livemark] Author '${author}' resolved to a value that is not a hex or npub key; dropped`);
      }
    }
  }

  return Array.from(resolved);
}

/**
 * Hex keys come back lowercased, npub keys as written
 */
function asKey(value: string): string | null {
  if (HEX_KEY.test(value)) return value.toLowerCase();
  if (NPUB_KEY.test(value)) return value;
  return null;
}

/**
 * Whether `record` satisfies every constraint of `filter`. `limit` is not
 * a per-record constraint and is ignored here.
 */
export function matchFilter(filter: CompiledFilter, record: FeedRecord): boolean {
  if (filter.kinds && !filter.kinds.includes(record.kind)) return false;
  if (filter.authors && !filter.authors.includes(record.pubkey)) return false;
  if (filter.ids && !filter.ids.includes(record.id)) return false;
  if (filter.since !== undefined && record.created_at < filter.since) return false;
  if (filter.until !== undefined && record.created_at > filter.until) return false;

  for (const [letter, values] of Object.entries(filter.tags)) {
    const hit = record.tags.some((tag) => tag[0] === letter && tag[1] !== undefined && values.includes(tag[1]));
    if (!hit) return false;
  }

  return true;
}

/**
 * Content hash of a compiled filter, for deciding whether a reload or a
 * state change needs to reopen its subscription
 */
export function filterHash(filter: CompiledFilter): string {
  return createHash(filter);
}
