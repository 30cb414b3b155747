/**
 * livemark - Pipe Engine
 *
 * Keeps derived queries in step with their sources. Pipes may read other
 * pipes; they are recomputed in dependency order so a pass never reads a
 * stale upstream value.
 */

import type { Evaluator, PipeDefinition } from '../types';
import type { QueryStore } from './query-store';
import { PipeCycleError, UnknownQueryReferenceError } from './errors';
import { normalizeExpression } from './context';

export interface PipeEngineOptions {
  debug?: boolean;
}

export class PipeEngine {
  private pipes: ReadonlyMap<string, PipeDefinition>;
  private order: string[];
  private debug: boolean;

  /**
   * @param sources - ids of the raw queries pipes may read
   * @throws UnknownQueryReferenceError when a pipe reads an undeclared query
   * @throws PipeCycleError when pipes depend on each other in a cycle
   */
  constructor(
    private store: QueryStore,
    private evaluator: Evaluator,
    pipes: Readonly<Record<string, PipeDefinition>>,
    sources: Iterable<string>,
    options: PipeEngineOptions = {}
  ) {
    this.pipes = new Map(Object.entries(pipes));
    this.debug = options.debug ?? false;

    const known = new Set(sources);
    for (const [id, pipe] of this.pipes) {
      if (!known.has(pipe.from) && !this.pipes.has(pipe.from)) {
        throw new UnknownQueryReferenceError(pipe.from, `Pipe '${id}'`);
      }
    }

    this.order = this.sort();
  }

  /**
   * Pipe ids in the order they are recomputed
   */
  get ids(): readonly string[] {
    return this.order;
  }

  has(id: string): boolean {
    return this.pipes.has(id);
  }

  /**
   * Recompute the pipes downstream of `changed`, or every pipe when no ids
   * are given. Returns the ids of the pipes whose value changed.
   */
  run(changed?: Iterable<string>): string[] {
    const dirty = changed ? new Set(changed) : null;
    const updated: string[] = [];

    for (const id of this.order) {
      const pipe = this.pipes.get(id);
      if (!pipe) continue;
      if (dirty && !dirty.has(pipe.from)) continue;

      const expression = normalizeExpression(pipe.jq);
      const result = this.store.recomputeDerived(id, (input) => this.evaluator.evaluate(expression, input));

      if (result.changed) {
        updated.push(id);
        dirty?.add(id);
        if (this.debug) {
          console.log(`[Livemark] Pipe '${id}' -> v${result.version}`);
        }
      }
    }

    return updated;
  }

  /**
   * Depth-first topological sort over `from` edges between pipes
   */
  private sort(): string[] {
    const order: string[] = [];
    const done = new Set<string>();
    const path: string[] = [];

    const visit = (id: string): void => {
      if (done.has(id)) return;
      const start = path.indexOf(id);
      if (start >= 0) {
        throw new PipeCycleError([...path.slice(start), id]);
      }

      const pipe = this.pipes.get(id);
      if (!pipe) return;

      path.push(id);
      if (this.pipes.has(pipe.from)) visit(pipe.from);
      path.pop();

      done.add(id);
      order.push(id);
    };

    for (const id of [...this.pipes.keys()].sort()) {
      visit(id);
    }
    return order;
  }
}
