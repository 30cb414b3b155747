/**
 * livemark - Documents
 *
 * Validation of parsed documents and of the query ids they reference.
 */

import { DocumentSchema, childLists, propExpression } from '../types';
import type { LiveDocument, Node } from '../types';
import { UnknownQueryReferenceError } from './errors';

/**
 * Validate parser output. Throws on a malformed document.
 */
export function parseDocument(input: unknown): LiveDocument {
  const parsed = DocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid Livemark document: ${parsed.error.message}`);
  }
  return parsed.data;
}

export interface DeclaredQueries {
  /** Filter and load ids: queries fed from the data source */
  raw: Set<string>;
  /** Pipe ids */
  derived: Set<string>;
}

/**
 * Collect the query ids a document declares, and check that every load
 * source and every `queries.<id>` in the body names one of them. Pipe
 * sources are checked by the pipe engine.
 *
 * @throws UnknownQueryReferenceError
 */
export function declaredQueries(document: LiveDocument): DeclaredQueries {
  const { filters, loads, pipes } = document.frontmatter;
  const raw = new Set<string>();
  const derived = new Set<string>();

  for (const id of [...Object.keys(filters), ...Object.keys(loads)]) {
    if (raw.has(id)) {
      throw new Error(`Query '${id}' is declared twice`);
    }
    raw.add(id);
  }
  for (const id of Object.keys(pipes)) {
    if (raw.has(id)) {
      throw new Error(`Query '${id}' is declared twice`);
    }
    derived.add(id);
  }

  const isDeclared = (id: string) => raw.has(id) || derived.has(id);

  for (const [id, load] of Object.entries(loads)) {
    if (!isDeclared(load.from)) {
      throw new UnknownQueryReferenceError(load.from, `Load '${id}'`);
    }
  }

  for (const expression of bodyExpressions(document.body)) {
    for (const ref of queryReferences(expression)) {
      if (!isDeclared(ref)) {
        throw new UnknownQueryReferenceError(ref, `Expression '${expression}'`);
      }
    }
  }

  return { raw, derived };
}

const QUERY_REFERENCE = /(?:^|[^\w.$])\.?queries\.([A-Za-z_][\w-]*)/g;

/**
 * Query ids an expression reads through `queries.<id>`
 */
export function queryReferences(expression: string): string[] {
  const ids: string[] = [];
  for (const match of expression.matchAll(QUERY_REFERENCE)) {
    ids.push(match[1]);
  }
  return ids;
}

/**
 * Every expression in a node tree, in document order
 */
export function bodyExpressions(nodes: readonly Node[]): string[] {
  const expressions: string[] = [];

  const walk = (node: Node): void => {
    switch (node.type) {
      case 'expr':
        expressions.push(node.expression);
        break;
      case 'json':
      case 'if':
        expressions.push(node.value);
        break;
      case 'each':
        expressions.push(node.from);
        break;
      case 'component':
        for (const value of Object.values(node.props)) {
          const expression = propExpression(value);
          if (expression) expressions.push(expression);
        }
        break;
      default:
        break;
    }
    for (const list of childLists(node)) {
      list.forEach(walk);
    }
  };

  nodes.forEach(walk);
  return expressions;
}
