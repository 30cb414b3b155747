/**
 * livemark - Errors
 *
 * Fetch and evaluation errors are contained where they happen and reported
 * through events; configuration errors are thrown before the first render.
 */

export type LivemarkErrorCode =
  | 'FETCH_TIMEOUT'
  | 'FETCH_TRANSPORT'
  | 'EVAL'
  | 'MERGE_CONFLICT'
  | 'UNKNOWN_QUERY_REFERENCE'
  | 'PIPE_CYCLE';

export class LivemarkError extends Error {
  constructor(message: string, public readonly code: LivemarkErrorCode) {
    super(message);
    this.name = 'LivemarkError';
  }

  /** Configuration errors abort `Runtime.load()`; everything else is contained */
  get fatal(): boolean {
    return this.code === 'UNKNOWN_QUERY_REFERENCE' || this.code === 'PIPE_CYCLE';
  }
}

export class FetchTimeoutError extends LivemarkError {
  constructor(public readonly key: string, public readonly timeoutMs: number) {
    super(`Fetch for ${key} timed out after ${timeoutMs}ms`, 'FETCH_TIMEOUT');
    this.name = 'FetchTimeoutError';
  }
}

export class FetchTransportError extends LivemarkError {
  constructor(public readonly key: string, public readonly reason: unknown) {
    super(`Fetch for ${key} failed: ${describeCause(reason)}`, 'FETCH_TRANSPORT');
    this.name = 'FetchTransportError';
  }
}

export class EvalError extends LivemarkError {
  constructor(public readonly expression: string, detail: string) {
    super(`Failed to evaluate '${expression}': ${detail}`, 'EVAL');
    this.name = 'EvalError';
  }
}

export class MergeConflictError extends LivemarkError {
  constructor(public readonly queryId: string, public readonly recordId: string) {
    super(
      `Query '${queryId}' received two versions of record ${recordId} with the same timestamp`,
      'MERGE_CONFLICT'
    );
    this.name = 'MergeConflictError';
  }
}

export class UnknownQueryReferenceError extends LivemarkError {
  constructor(public readonly queryId: string, public readonly referencedBy: string) {
    super(`${referencedBy} references undeclared query '${queryId}'`, 'UNKNOWN_QUERY_REFERENCE');
    this.name = 'UnknownQueryReferenceError';
  }
}

export class PipeCycleError extends LivemarkError {
  constructor(public readonly path: readonly string[]) {
    super(`Pipes depend on each other in a cycle: ${path.join(' -> ')}`, 'PIPE_CYCLE');
    this.name = 'PipeCycleError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
