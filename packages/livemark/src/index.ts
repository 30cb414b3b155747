/**
 * livemark - Package Entry Point
 *
 * Reactive data and reconciliation runtime for live documents.
 *
 * - Continuous filters and one-shot loads feed versioned queries
 * - Overlapping loads share one fetch per key through the loader cache
 * - Each change ends in one positional diff of the rendered tree
 *
 * @packageDocumentation
 */

// Core types
export * from './types';

// Utilities
export * from './utils';

// Errors
export {
  LivemarkError,
  FetchTimeoutError,
  FetchTransportError,
  EvalError,
  MergeConflictError,
  UnknownQueryReferenceError,
  PipeCycleError,
  toError,
  type LivemarkErrorCode,
} from './core/errors';

// Data layer
export { loaderKey, parseLoaderKey, recordLoaderKey, type LoaderKey, type LoaderAddress } from './core/loader-key';
export {
  LoaderCache,
  LoaderCacheOptionsSchema,
  type LoaderCacheOptions,
  type CacheEntry,
  type FetchOne,
  type FetchMany,
  type LoadOptions,
  type LoaderStats,
} from './core/loader-cache';
export {
  QueryStore,
  compareRecords,
  type QueryStoreEvents,
  type QueryStoreOptions,
  type UpsertOptions,
  type UpdateResult,
  type DerivedTransform,
} from './core/query-store';
export { PipeEngine, type PipeEngineOptions } from './core/pipes';
export { compileFilter, matchFilter, filterHash, type CompileFilterOptions } from './core/filter';
export { RuntimeContext, normalizeExpression, isTruthy, type ContextInit, type Bindings } from './core/context';
export { parseDocument, declaredQueries, queryReferences, bodyExpressions, type DeclaredQueries } from './core/document';

// Client
export {
  SubscriptionManager,
  dependencyKeys,
  type SubscriptionState,
  type SubscriptionStatus,
  type LoadState,
  type SubscriptionManagerEvents,
  type SubscriptionManagerOptions,
} from './client/subscription-manager';
export { Runtime, createRuntime, type RenderFrame, type RuntimeEvents, type CreateRuntimeOptions } from './client/runtime';

// Rendering
export {
  buildSnapshot,
  toItems,
  type Slot,
  type NodeSlot,
  type EachSlot,
  type EachInstance,
  type Mountable,
  type Diagnostic,
  type RenderSnapshot,
} from './render/snapshot';
export {
  reconcile,
  summarize,
  type EditOp,
  type EditOpType,
  type OpSummary,
  type RenderState,
  type ScopeState,
  type ReconcileOptions,
  type ReconcileResult,
} from './render/reconciler';

// Transport
export { MemoryDataSource, type MemoryDataSourceOptions } from './transport';

import { createRuntime as _createRuntime } from './client/runtime';

/**
 * Default export for convenient imports
 */
export default {
  createRuntime: _createRuntime,
};
