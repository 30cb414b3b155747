/**
 * livemark - Reconciliation Engine
 *
 * Positional diff between the mounted tree and a freshly built snapshot.
 * Every list-producing scope (the document root and each `each`
 * expansion) is diffed index by index; there is no identity tracking
 * across indices, so removing the first item of a list rebuilds every
 * position after it.
 *
 * Scopes are addressed by a path. The root scope is `[]`; the k-th
 * expansion found under position i of scope S is `[...S, i, k]`.
 */

import type { Evaluator, Node } from '../types';
import type { EvalError } from '../core/errors';
import type { RuntimeContext, Bindings } from '../core/context';
import { ownProps, propExpression } from '../types';
import { createHash, hashEquals, stableStringify } from '../utils/hash';
import type { EachInstance, EachSlot, Mountable, Slot } from './snapshot';

export interface RenderState {
  lastNode: Node;
  /** Hash of `shape` */
  signature: string;
  /** Key-sorted serialization of the position; nested expansions contribute their template */
  shape: string;
  /** Bumped on every rebuild, never decreases */
  generation: number;
  /** Hash of `exprValues` */
  exprValueHash: string | null;
  /** Key-sorted serialization of the position's expression values; null without leaves or after a failure */
  exprValues: string | null;
  /** One entry per expansion under this position, in document order */
  scopes: ScopeState[];
}

export interface ScopeState {
  positions: RenderState[];
}

interface OpBase {
  scope: number[];
  index: number;
}

export type EditOp =
  | (OpBase & { type: 'keep' })
  | (OpBase & { type: 'rebuild'; slot: Mountable; generation: number; errors?: EvalError[] })
  | (OpBase & { type: 'add'; slot: Mountable; generation: number; errors?: EvalError[] })
  | (OpBase & { type: 'remove' });

export type EditOpType = EditOp['type'];

export interface ReconcileOptions {
  context: RuntimeContext;
  evaluator: Evaluator;
}

export interface ReconcileResult {
  ops: EditOp[];
  state: ScopeState;
}

/**
 * Diff `slots` against the previously mounted root scope. Pure: `previous`
 * is not modified.
 *
 * Within one scope, ops come as keep/rebuild for the surviving indices in
 * order, then adds in index order, then removes from the tail. The ops of
 * a nested scope directly follow the `keep` of the position holding it; a
 * rebuilt position brings its nested content along and emits nothing for
 * it.
 */
export function reconcile(
  previous: ScopeState | null,
  slots: readonly Slot[],
  options: ReconcileOptions
): ReconcileResult {
  const ops: EditOp[] = [];
  const state = diffScope(previous?.positions ?? [], slots, [], options, ops);
  return { ops, state };
}

export type OpSummary = Record<EditOpType, number>;

export function summarize(ops: readonly EditOp[]): OpSummary {
  const summary: OpSummary = { keep: 0, rebuild: 0, add: 0, remove: 0 };
  for (const op of ops) {
    summary[op.type]++;
  }
  return summary;
}

// ============================================================================
// Diff
// ============================================================================

interface Leaf {
  expression: string;
  locals: Bindings;
}

interface Described {
  node: Node;
  signature: string;
  shape: string;
  leaves: Leaf[];
  scopes: EachInstance[][];
}

interface LeafValues {
  hash: string | null;
  serialized: string | null;
  errors: EvalError[];
}

function diffScope(
  previous: readonly RenderState[],
  next: readonly Mountable[],
  scope: number[],
  options: ReconcileOptions,
  ops: EditOp[]
): ScopeState {
  const positions: RenderState[] = [];
  const common = Math.min(previous.length, next.length);

  for (let index = 0; index < common; index++) {
    const old = previous[index];
    const slot = next[index];
    const described = describe(slot);
    const values = evaluateLeaves(described.leaves, options);

    const unchanged =
      values.errors.length === 0 &&
      hashEquals(old.signature, described.signature) &&
      old.shape === described.shape &&
      hashEquals(old.exprValueHash, values.hash) &&
      old.exprValues === values.serialized;

    if (unchanged) {
      ops.push({ type: 'keep', scope, index });
      const scopes = described.scopes.map((instances, k) =>
        diffScope(old.scopes[k]?.positions ?? [], instances, [...scope, index, k], options, ops)
      );
      positions.push({ ...old, lastNode: described.node, scopes });
      continue;
    }

    const generation = old.generation + 1;
    ops.push(withErrors({ type: 'rebuild', scope, index, slot, generation }, values.errors));
    positions.push(seed(described, values, generation, options));
  }

  for (let index = common; index < next.length; index++) {
    const slot = next[index];
    const described = describe(slot);
    const values = evaluateLeaves(described.leaves, options);
    ops.push(withErrors({ type: 'add', scope, index, slot, generation: 0 }, values.errors));
    positions.push(seed(described, values, 0, options));
  }

  for (let index = previous.length - 1; index >= next.length; index--) {
    ops.push({ type: 'remove', scope, index });
  }

  return { positions };
}

/**
 * Fresh state for a mounted position, nested expansions included
 */
function seed(described: Described, values: LeafValues, generation: number, options: ReconcileOptions): RenderState {
  const failed = values.errors.length > 0;
  return {
    lastNode: described.node,
    signature: described.signature,
    shape: described.shape,
    generation,
    exprValueHash: failed ? null : values.hash,
    exprValues: failed ? null : values.serialized,
    scopes: described.scopes.map((instances) => ({
      positions: instances.map((instance) => {
        const nested = describe(instance);
        return seed(nested, evaluateLeaves(nested.leaves, options), 0, options);
      }),
    })),
  };
}

function withErrors<T extends EditOp>(op: T, errors: EvalError[]): T {
  return errors.length > 0 ? { ...op, errors } : op;
}

function evaluateLeaves(leaves: readonly Leaf[], options: ReconcileOptions): LeafValues {
  if (leaves.length === 0) return { hash: null, serialized: null, errors: [] };

  const values: unknown[] = [];
  const errors: EvalError[] = [];
  for (const leaf of leaves) {
    const result = options.context.withLocals(leaf.locals).eval(leaf.expression, options.evaluator);
    if (result.ok) {
      values.push(result.value);
    } else {
      errors.push(result.error);
    }
  }
  const serialized = stableStringify(values);
  return { hash: createHash(serialized), serialized, errors };
}

// ============================================================================
// Position description
// ============================================================================

function describe(slot: Mountable): Described {
  switch (slot.kind) {
    case 'node':
      return {
        node: slot.node,
        ...identify(shapeOf(slot)),
        leaves: leavesOf([slot]),
        scopes: expansionsOf([slot]).map((each) => each.instances),
      };
    case 'each':
      return {
        node: slot.node,
        ...identify(shapeOf(slot)),
        leaves: [],
        scopes: [slot.instances],
      };
    case 'instance':
      return {
        node: slot.template,
        ...identify(['instance', slot.item, slot.children.map(shapeOf)]),
        leaves: leavesOf(slot.children),
        scopes: expansionsOf(slot.children).map((each) => each.instances),
      };
  }
}

function identify(shape: unknown[]): { signature: string; shape: string } {
  const serialized = stableStringify(shape);
  return { signature: createHash(serialized), shape: serialized };
}

function shapeOf(slot: Slot): unknown[] {
  if (slot.kind === 'each') {
    return ['each', slot.node];
  }
  return ['node', ownProps(slot.node), ...slot.lists.map((list) => list.map(shapeOf))];
}

/**
 * Expression leaves of the given slots, not descending into expansions
 */
function leavesOf(slots: readonly Slot[]): Leaf[] {
  const leaves: Leaf[] = [];

  const walk = (slot: Slot): void => {
    if (slot.kind === 'each') return;
    const { node, locals } = slot;
    switch (node.type) {
      case 'expr':
        leaves.push({ expression: node.expression, locals });
        break;
      case 'json':
        leaves.push({ expression: node.value, locals });
        break;
      case 'component':
        for (const key of Object.keys(node.props).sort()) {
          const expression = propExpression(node.props[key]);
          if (expression) leaves.push({ expression, locals });
        }
        break;
      default:
        break;
    }
    for (const list of slot.lists) list.forEach(walk);
  };

  slots.forEach(walk);
  return leaves;
}

/**
 * Outermost expansions under the given slots, in document order
 */
function expansionsOf(slots: readonly Slot[]): EachSlot[] {
  const found: EachSlot[] = [];

  const walk = (slot: Slot): void => {
    if (slot.kind === 'each') {
      found.push(slot);
      return;
    }
    for (const list of slot.lists) list.forEach(walk);
  };

  slots.forEach(walk);
  return found;
}
