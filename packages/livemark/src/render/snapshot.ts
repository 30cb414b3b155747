/**
 * livemark - Render Snapshot Builder
 *
 * Expands the static node tree against one query snapshot: `each` becomes
 * one instance per item, `if` is replaced by its chosen branch, and
 * expression leaves stay unevaluated for the reconciler to read.
 */

import { childLists } from '../types';
import type { EachNode, Evaluator, IfNode, Node } from '../types';
import type { EvalError } from '../core/errors';
import { isTruthy, type Bindings, type RuntimeContext } from '../core/context';

export interface NodeSlot {
  kind: 'node';
  node: Node;
  /** One entry per child list of `node` (see `childLists`) */
  lists: Slot[][];
  locals: Bindings;
}

export interface EachSlot {
  kind: 'each';
  node: EachNode;
  instances: EachInstance[];
  locals: Bindings;
}

export interface EachInstance {
  kind: 'instance';
  /** The expansion this instance belongs to */
  template: EachNode;
  index: number;
  item: unknown;
  /** Parent locals plus the `as` binding and `itemIndex` */
  locals: Bindings;
  children: Slot[];
}

export type Slot = NodeSlot | EachSlot;

/** Anything the reconciler treats as one position */
export type Mountable = Slot | EachInstance;

export interface Diagnostic {
  /** Node whose expression failed */
  node: EachNode | IfNode;
  error: EvalError;
}

export interface RenderSnapshot {
  slots: Slot[];
  diagnostics: Diagnostic[];
}

export function buildSnapshot(nodes: readonly Node[], context: RuntimeContext, evaluator: Evaluator): RenderSnapshot {
  const diagnostics: Diagnostic[] = [];
  const slots = buildList(nodes, context, evaluator, {}, diagnostics);
  return { slots, diagnostics };
}

function buildList(
  nodes: readonly Node[],
  context: RuntimeContext,
  evaluator: Evaluator,
  locals: Bindings,
  diagnostics: Diagnostic[]
): Slot[] {
  const slots: Slot[] = [];

  for (const node of nodes) {
    switch (node.type) {
      case 'if': {
        const branch = chooseBranch(node, context.withLocals(locals), evaluator, diagnostics);
        slots.push(...buildList(branch, context, evaluator, locals, diagnostics));
        break;
      }
      case 'each':
        slots.push(buildEach(node, context, evaluator, locals, diagnostics));
        break;
      default:
        slots.push({
          kind: 'node',
          node,
          lists: childLists(node).map((list) => buildList(list, context, evaluator, locals, diagnostics)),
          locals,
        });
    }
  }

  return slots;
}

/**
 * A failing condition takes the else-branch
 */
function chooseBranch(
  node: IfNode,
  context: RuntimeContext,
  evaluator: Evaluator,
  diagnostics: Diagnostic[]
): Node[] {
  const result = context.eval(node.value, evaluator);
  if (!result.ok) {
    diagnostics.push({ node, error: result.error });
    return node.else ?? [];
  }
  return isTruthy(result.value) ? node.children : node.else ?? [];
}

function buildEach(
  node: EachNode,
  context: RuntimeContext,
  evaluator: Evaluator,
  locals: Bindings,
  diagnostics: Diagnostic[]
): EachSlot {
  const result = context.withLocals(locals).eval(node.from, evaluator);
  let items: readonly unknown[] = [];
  if (!result.ok) {
    diagnostics.push({ node, error: result.error });
  } else {
    items = toItems(result.value);
  }

  const instances = items.map((item, index): EachInstance => {
    const instanceLocals: Bindings = { ...locals, [node.as]: item, itemIndex: index };
    return {
      kind: 'instance',
      template: node,
      index,
      item,
      locals: instanceLocals,
      children: buildList(node.children, context, evaluator, instanceLocals, diagnostics),
    };
  });

  return { kind: 'each', node, instances, locals };
}

/**
 * Arrays iterate; `null` is empty; any other value is a one-item list
 */
export function toItems(value: unknown): readonly unknown[] {
  if (Array.isArray(value)) return value;
  if (value === null || value === undefined) return [];
  return [value];
}
