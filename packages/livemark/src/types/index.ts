/**
 * livemark - Core Types
 *
 * Shared type definitions for the data and reconciliation runtime.
 * Anything that arrives from outside the package (documents, records,
 * options) has a zod schema next to its type.
 */

import { z } from 'zod';
import type { EvalError } from '../core/errors';
import { NodeSchema, type Node } from './node';

export * from './node';

// ============================================================================
// Records
// ============================================================================

export const FeedRecordSchema = z.object({
  id: z.string().min(1),
  pubkey: z.string().min(1),
  created_at: z.number().int().nonnegative(),
  kind: z.number().int().nonnegative(),
  content: z.string(),
  tags: z.array(z.array(z.string())),
  sig: z.string().optional(),
});

/**
 * A signed event from the remote feed. The runtime never interprets
 * `content`; it keys by `id`, orders by `created_at` and groups by `pubkey`.
 */
export type FeedRecord = z.infer<typeof FeedRecordSchema>;

/**
 * Cheap structural check for records already validated on the way in
 */
export function isFeedRecord(value: unknown): value is FeedRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'created_at' in value &&
    typeof value.created_at === 'number' &&
    'pubkey' in value &&
    typeof value.pubkey === 'string' &&
    'tags' in value &&
    Array.isArray(value.tags)
  );
}

// ============================================================================
// Filters
// ============================================================================

const TagValuesSchema = z.array(z.string());
const TAG_KEY = /^#[a-zA-Z]$/;

const FilterFieldsSchema = z.object({
  kinds: z.array(z.number().int().nonnegative()).optional(),
  /** Hex keys, npub keys, or expressions such as `user.pubkey` */
  authors: z.array(z.string()).optional(),
  ids: z.array(z.string()).optional(),
  since: z.number().int().nonnegative().optional(),
  until: z.number().int().nonnegative().optional(),
  limit: z.number().int().positive().optional(),
});

const FILTER_FIELDS = new Set(Object.keys(FilterFieldsSchema.shape));

export const FilterDefinitionSchema = FilterFieldsSchema.passthrough()
  .superRefine((value, ctx) => {
    for (const [key, values] of Object.entries(value)) {
      if (FILTER_FIELDS.has(key)) continue;
      if (!TAG_KEY.test(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Unknown filter field '${key}' (tag constraints are written '#x')`,
        });
      } else if (!TagValuesSchema.safeParse(values).success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Tag constraint '${key}' must be a list of strings`,
        });
      }
    }
  })
  .transform((value) => {
    const tags: Record<string, string[]> = {};
    for (const [key, values] of Object.entries(value)) {
      if (!TAG_KEY.test(key)) continue;
      const parsed = TagValuesSchema.safeParse(values);
      if (parsed.success) {
        tags[key.slice(1)] = parsed.data;
      }
    }
    return {
      kinds: value.kinds,
      authors: value.authors,
      ids: value.ids,
      since: value.since,
      until: value.until,
      limit: value.limit,
      tags,
    };
  });

/**
 * Filter as authored in the document frontmatter. Tag constraints (`#e`,
 * `#p`, `#t`, ...) are collected under `tags`, keyed by their letter.
 */
export type FilterDefinition = z.output<typeof FilterDefinitionSchema>;

/**
 * Filter ready to send to a data source: placeholders resolved, empty
 * constraints dropped. Frozen once compiled.
 */
export interface CompiledFilter {
  readonly kinds?: readonly number[];
  readonly authors?: readonly string[];
  readonly ids?: readonly string[];
  readonly tags: Readonly<Record<string, readonly string[]>>;
  readonly since?: number;
  readonly until?: number;
  readonly limit?: number;
}

// ============================================================================
// Frontmatter
// ============================================================================

export const PipeDefinitionSchema = z.object({
  /** Query (filter, load or pipe id) this pipe reads */
  from: z.string().min(1),
  /** Expression run over the query snapshot */
  jq: z.string().min(1),
});

export type PipeDefinition = z.infer<typeof PipeDefinitionSchema>;

export const LoadDependencySchema = z.object({
  /** Query whose records imply the keys to load */
  from: z.string().min(1),
  /** Kind of the record to load for each distinct author */
  kind: z.number().int().nonnegative(),
  /** Record field holding the author key */
  field: z.string().min(1).default('pubkey'),
  /** `d` identifier for addressable records; empty for replaceable ones */
  identifier: z.string().default(''),
});

export type LoadDependencyInput = z.input<typeof LoadDependencySchema>;
export type LoadDependency = z.output<typeof LoadDependencySchema>;

export const ActionTemplateSchema = z.object({
  kind: z.number().int().nonnegative(),
  /** Content, may contain `{expression}` placeholders */
  content: z.string(),
  tags: z.array(z.array(z.string())).default([]),
});

export type ActionTemplate = z.output<typeof ActionTemplateSchema>;

export const FrontmatterSchema = z.object({
  filters: z.record(z.string(), FilterDefinitionSchema).default({}),
  pipes: z.record(z.string(), PipeDefinitionSchema).default({}),
  loads: z.record(z.string(), LoadDependencySchema).default({}),
  actions: z.record(z.string(), ActionTemplateSchema).default({}),
  state: z.record(z.string(), z.unknown()).default({}),
});

export type FrontmatterInput = z.input<typeof FrontmatterSchema>;
export type Frontmatter = z.output<typeof FrontmatterSchema>;

export const DocumentSchema = z.object({
  frontmatter: FrontmatterSchema.default({}),
  body: z.array(NodeSchema),
});

export type DocumentInput = z.input<typeof DocumentSchema>;

export interface LiveDocument {
  frontmatter: Frontmatter;
  body: Node[];
}

/**
 * Unsigned event produced from an action template
 */
export interface EventTemplate {
  kind: number;
  content: string;
  tags: string[][];
  created_at: number;
}

// ============================================================================
// Queries
// ============================================================================

export type QueryKind = 'raw' | 'derived';

export interface Query<T = unknown> {
  readonly id: string;
  readonly kind: QueryKind;
  /** Ordered items; for derived non-array results, `[value]` */
  readonly items: readonly T[];
  /** What expressions see under `queries.<id>` */
  readonly value: unknown;
  /** Bumped on every observable change, never decreases */
  readonly version: number;
}

export type QuerySnapshot = ReadonlyMap<string, Query>;

export interface QueryChange {
  id: string;
  version: number;
  /** Store-wide counter at the time of the change */
  revision: number;
}

// ============================================================================
// Collaborators
// ============================================================================

export type EvalResult =
  | { ok: true; value: unknown }
  | { ok: false; error: EvalError };

/**
 * Expression evaluator (a jq-like engine). Must be pure.
 */
export interface Evaluator {
  evaluate(expression: string, input: unknown): EvalResult;
}

export interface FetchOnceOptions {
  timeout: number;
  signal?: AbortSignal;
}

/**
 * Remote data source. `subscribe` yields batches until `signal` aborts;
 * `fetchOnce` resolves with whatever arrived before the source's end of
 * stored results or its own timeout.
 */
export interface DataSource {
  subscribe(filter: CompiledFilter, signal: AbortSignal): AsyncIterable<readonly FeedRecord[]>;
  fetchOnce(filter: CompiledFilter, options: FetchOnceOptions): Promise<readonly FeedRecord[]>;
  publish?(template: EventTemplate): Promise<void>;
}

// ============================================================================
// Runtime Options
// ============================================================================

export const RuntimeOptionsSchema = z.object({
  /** Enable debug logging */
  debug: z.boolean().default(false),
  /** Timeout for one-shot loads in ms */
  loadTimeout: z.number().int().positive().default(5000),
  /** Window in ms during which version bumps collapse into one render */
  renderDelay: z.number().int().nonnegative().default(16),
  /** Reconnect attempts for a failing continuous subscription */
  maxRetries: z.number().int().nonnegative().default(3),
  /** Base delay for exponential backoff in ms */
  retryBaseDelay: z.number().int().positive().default(250),
  /** Exposed to expressions as `user` */
  user: z.record(z.string(), z.unknown()).default({}),
});

export type RuntimeOptions = z.input<typeof RuntimeOptionsSchema>;
export type ResolvedRuntimeOptions = z.output<typeof RuntimeOptionsSchema>;

// ============================================================================
// Utility Types
// ============================================================================

export type Awaitable<T> = T | Promise<T>;
