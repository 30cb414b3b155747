/**
 * livemark - Document Nodes
 *
 * The node tree the document parser hands to the runtime. Nodes are plain
 * immutable values; two nodes are the same node when they are structurally
 * equal.
 */

import { z } from 'zod';

export interface TextNode {
  type: 'text';
  value: string;
}

export interface HeadingNode {
  type: 'heading';
  level: number;
  children: Node[];
}

export interface ParagraphNode {
  type: 'paragraph';
  children: Node[];
}

export interface StrongNode {
  type: 'strong';
  children: Node[];
}

export interface EmphasisNode {
  type: 'emphasis';
  children: Node[];
}

export interface ListItem {
  children: Node[];
}

export interface ListNode {
  type: 'list';
  ordered: boolean;
  items: ListItem[];
}

export interface LinkNode {
  type: 'link';
  url: string;
  children: Node[];
}

export interface ImageNode {
  type: 'image';
  src: string;
  alt: string;
}

/** `{queries.feed[0].content}` */
export interface ExprNode {
  type: 'expr';
  expression: string;
}

/** One body instance per item of the array `from` evaluates to */
export interface EachNode {
  type: 'each';
  from: string;
  as: string;
  children: Node[];
}

export interface IfNode {
  type: 'if';
  /** Expression tested for truthiness (`false` and `null` are falsy) */
  value: string;
  children: Node[];
  else?: Node[];
}

export interface ButtonNode {
  type: 'button';
  /** Action id run on click */
  onClick?: string;
  children: Node[];
}

export interface InputNode {
  type: 'input';
  /** Form field name */
  name: string;
  placeholder?: string;
}

export type StackAlign = 'start' | 'center' | 'end';

export interface StackNode {
  type: 'vstack' | 'hstack';
  children: Node[];
  width?: number;
  height?: number;
  flex?: number;
  align?: StackAlign;
}

export interface GridNode {
  type: 'grid';
  columns?: number;
  children: Node[];
}

/** Debug viewer for any expression value */
export interface JsonNode {
  type: 'json';
  value: string;
}

export interface SpacerNode {
  type: 'spacer';
  size?: number;
}

/** Custom component; props written `{...}` are expressions */
export interface ComponentNode {
  type: 'component';
  name: string;
  props: Record<string, string>;
  children: Node[];
}

export type Node =
  | TextNode
  | HeadingNode
  | ParagraphNode
  | StrongNode
  | EmphasisNode
  | ListNode
  | LinkNode
  | ImageNode
  | ExprNode
  | EachNode
  | IfNode
  | ButtonNode
  | InputNode
  | StackNode
  | GridNode
  | JsonNode
  | SpacerNode
  | ComponentNode;

export type NodeType = Node['type'];

// ============================================================================
// Schema
// ============================================================================

export const NodeSchema: z.ZodType<Node> = z.lazy(() => {
  const children = z.array(NodeSchema);
  return z.union([
    z.object({ type: z.literal('text'), value: z.string() }),
    z.object({ type: z.literal('heading'), level: z.number().int().min(1).max(6), children }),
    z.object({ type: z.literal('paragraph'), children }),
    z.object({ type: z.literal('strong'), children }),
    z.object({ type: z.literal('emphasis'), children }),
    z.object({ type: z.literal('list'), ordered: z.boolean(), items: z.array(z.object({ children })) }),
    z.object({ type: z.literal('link'), url: z.string(), children }),
    z.object({ type: z.literal('image'), src: z.string(), alt: z.string() }),
    z.object({ type: z.literal('expr'), expression: z.string().min(1) }),
    z.object({ type: z.literal('each'), from: z.string().min(1), as: z.string().min(1), children }),
    z.object({ type: z.literal('if'), value: z.string().min(1), children, else: children.optional() }),
    z.object({ type: z.literal('button'), onClick: z.string().optional(), children }),
    z.object({ type: z.literal('input'), name: z.string().min(1), placeholder: z.string().optional() }),
    z.object({
      type: z.enum(['vstack', 'hstack']),
      children,
      width: z.number().optional(),
      height: z.number().optional(),
      flex: z.number().optional(),
      align: z.enum(['start', 'center', 'end']).optional(),
    }),
    z.object({ type: z.literal('grid'), columns: z.number().int().positive().optional(), children }),
    z.object({ type: z.literal('json'), value: z.string().min(1) }),
    z.object({ type: z.literal('spacer'), size: z.number().optional() }),
    z.object({
      type: z.literal('component'),
      name: z.string().min(1),
      props: z.record(z.string(), z.string()),
      children,
    }),
  ]);
});

// ============================================================================
// Builders
// ============================================================================

export const Nodes = {
  text: (value: string): TextNode => ({ type: 'text', value }),
  heading: (level: number, children: Node[]): HeadingNode => ({ type: 'heading', level, children }),
  paragraph: (children: Node[]): ParagraphNode => ({ type: 'paragraph', children }),
  strong: (children: Node[]): StrongNode => ({ type: 'strong', children }),
  emphasis: (children: Node[]): EmphasisNode => ({ type: 'emphasis', children }),
  list: (ordered: boolean, items: Node[][]): ListNode => ({
    type: 'list',
    ordered,
    items: items.map((children) => ({ children })),
  }),
  link: (url: string, children: Node[]): LinkNode => ({ type: 'link', url, children }),
  image: (src: string, alt: string): ImageNode => ({ type: 'image', src, alt }),
  expr: (expression: string): ExprNode => ({ type: 'expr', expression }),
  each: (from: string, as: string, children: Node[]): EachNode => ({ type: 'each', from, as, children }),
  if: (value: string, children: Node[], elseChildren?: Node[]): IfNode =>
    elseChildren ? { type: 'if', value, children, else: elseChildren } : { type: 'if', value, children },
  button: (onClick: string | undefined, children: Node[]): ButtonNode =>
    onClick === undefined ? { type: 'button', children } : { type: 'button', onClick, children },
  input: (name: string, placeholder?: string): InputNode =>
    placeholder === undefined ? { type: 'input', name } : { type: 'input', name, placeholder },
  vstack: (children: Node[]): StackNode => ({ type: 'vstack', children }),
  hstack: (children: Node[]): StackNode => ({ type: 'hstack', children }),
  grid: (children: Node[], columns?: number): GridNode =>
    columns === undefined ? { type: 'grid', children } : { type: 'grid', columns, children },
  json: (value: string): JsonNode => ({ type: 'json', value }),
  spacer: (size?: number): SpacerNode => (size === undefined ? { type: 'spacer' } : { type: 'spacer', size }),
  component: (name: string, props: Record<string, string>, children: Node[] = []): ComponentNode => ({
    type: 'component',
    name,
    props,
    children,
  }),
};

// ============================================================================
// Traversal helpers
// ============================================================================

/**
 * Child lists of a node, in document order. Lists give one entry per item,
 * `if` gives its then-branch and, when present, its else-branch.
 */
export function childLists(node: Node): Node[][] {
  switch (node.type) {
    case 'heading':
    case 'paragraph':
    case 'strong':
    case 'emphasis':
    case 'link':
    case 'each':
    case 'button':
    case 'vstack':
    case 'hstack':
    case 'grid':
    case 'component':
      return [node.children];
    case 'list':
      return node.items.map((item) => item.children);
    case 'if':
      return node.else ? [node.children, node.else] : [node.children];
    case 'text':
    case 'image':
    case 'expr':
    case 'input':
    case 'json':
    case 'spacer':
      return [];
  }
}

/**
 * A node's own fields, without its children
 */
export function ownProps(node: Node): Record<string, unknown> {
  const props: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(node)) {
    if (key === 'children' || key === 'items' || key === 'else') continue;
    props[key] = value;
  }
  return props;
}

const EXPRESSION_PROP = /^\{([\s\S]+)\}$/;

/**
 * Expression text of a component prop written `{...}`, or null for a literal
 */
export function propExpression(value: string): string | null {
  const match = EXPRESSION_PROP.exec(value.trim());
  return match ? match[1].trim() : null;
}
