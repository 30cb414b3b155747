/**
 * livemark - Runtime Context
 *
 * The value expressions are evaluated against:
 * `{ user, queries, state, form, ...locals }`.
 */

import type { EvalResult, Evaluator } from '../types';
import { EvalError, toError } from './errors';

export type Bindings = Readonly<Record<string, unknown>>;

export interface ContextInit {
  user?: Bindings;
  queries?: Bindings;
  state?: Bindings;
  form?: Bindings;
  /** Iteration variables and component props, visible at the top level */
  locals?: Bindings;
}

const EMPTY: Bindings = Object.freeze({});

export class RuntimeContext {
  readonly user: Bindings;
  readonly queries: Bindings;
  readonly state: Bindings;
  readonly form: Bindings;
  readonly locals: Bindings;
  private json: Record<string, unknown> | null = null;

  constructor(init: ContextInit = {}) {
    this.user = init.user ?? EMPTY;
    this.queries = init.queries ?? EMPTY;
    this.state = init.state ?? EMPTY;
    this.form = init.form ?? EMPTY;
    this.locals = init.locals ?? EMPTY;
  }

  /**
   * Evaluator input. Locals shadow the fixed top-level names.
   */
  toJSON(): Record<string, unknown> {
    if (!this.json) {
      this.json = {
        user: this.user,
        queries: this.queries,
        state: this.state,
        form: this.form,
        ...this.locals,
      };
    }
    return this.json;
  }

  /**
   * Evaluate an expression against this context. Authors write
   * `queries.feed`; the evaluator receives `.queries.feed`.
   */
  eval(expression: string, evaluator: Evaluator): EvalResult {
    const normalized = normalizeExpression(expression);
    try {
      return evaluator.evaluate(normalized, this.toJSON());
    } catch (error) {
      return { ok: false, error: new EvalError(normalized, toError(error).message) };
    }
  }

  /**
   * Copy with extra locals layered over the current ones
   */
  withLocals(locals: Bindings): RuntimeContext {
    if (Object.keys(locals).length === 0) return this;
    return new RuntimeContext({
      user: this.user,
      queries: this.queries,
      state: this.state,
      form: this.form,
      locals: { ...this.locals, ...locals },
    });
  }
}

export function normalizeExpression(expression: string): string {
  const trimmed = expression.trim();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * jq truthiness: only `false` and `null` are falsy
 */
export function isTruthy(value: unknown): boolean {
  return value !== false && value !== null && value !== undefined;
}
