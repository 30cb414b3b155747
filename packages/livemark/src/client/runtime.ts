/**
 * livemark - Runtime
 *
 * Wires a document to a data source: filters feed raw queries, load
 * dependencies fill lookup queries through the loader cache, pipes derive
 * further queries, and every change ends in one coalesced render pass that
 * reconciles the expanded tree against what is mounted.
 */

import EventEmitter from 'eventemitter3';
import { RuntimeOptionsSchema } from '../types';
import type {
  CompiledFilter,
  DataSource,
  DocumentInput,
  EventTemplate,
  Evaluator,
  FeedRecord,
  LiveDocument,
  QueryChange,
  QuerySnapshot,
  ResolvedRuntimeOptions,
  RuntimeOptions,
} from '../types';
import { QueryStore } from '../core/query-store';
import { LoaderCache } from '../core/loader-cache';
import { PipeEngine } from '../core/pipes';
import { RuntimeContext } from '../core/context';
import { compileFilter } from '../core/filter';
import { declaredQueries, parseDocument } from '../core/document';
import { FetchTransportError, type LivemarkError } from '../core/errors';
import { SubscriptionManager, type SubscriptionStatus } from './subscription-manager';
import { buildSnapshot, type Diagnostic, type Slot } from '../render/snapshot';
import { reconcile, summarize, type EditOp, type OpSummary, type ScopeState } from '../render/reconciler';
import { stableStringify } from '../utils/hash';
import { debounce, now, type Debounced } from '../utils/time';

export interface RenderFrame {
  /** Increments with every render pass */
  pass: number;
  /** Store revision the pass was built from */
  revision: number;
  ops: EditOp[];
  summary: OpSummary;
  slots: Slot[];
  diagnostics: Diagnostic[];
}

export interface RuntimeEvents {
  render: (frame: RenderFrame) => void;
  'query:update': (change: QueryChange) => void;
  'subscription:state': (status: SubscriptionStatus) => void;
  error: (error: LivemarkError) => void;
}

export interface CreateRuntimeOptions extends RuntimeOptions {
  source: DataSource;
  evaluator: Evaluator;
  /** Share a loader cache between runtimes */
  cache?: LoaderCache<FeedRecord>;
}

/**
 * Runtime for one live document
 */
export class Runtime extends EventEmitter<RuntimeEvents> {
  readonly store: QueryStore;
  readonly cache: LoaderCache<FeedRecord>;
  readonly subscriptions: SubscriptionManager;

  private config: ResolvedRuntimeOptions;
  private source: DataSource;
  private evaluator: Evaluator;
  private document: LiveDocument | null = null;
  private pipes: PipeEngine | null = null;
  /** Key-sorted serialization of each open filter and load dependency */
  private filterContents: Map<string, string> = new Map();
  private loadContents: Map<string, string> = new Map();
  private mounted: ScopeState | null = null;
  private state: Record<string, unknown> = {};
  private form: Record<string, unknown> = {};
  private scheduleRender: Debounced;
  private runningPipes = false;
  private passes = 0;
  private destroyed = false;

  constructor(options: CreateRuntimeOptions) {
    super();
    const { source, evaluator, cache, ...rest } = options;

    const parsed = RuntimeOptionsSchema.safeParse(rest);
    if (!parsed.success) {
      throw new Error(`Invalid Livemark options: ${parsed.error.message}`);
    }
    this.config = parsed.data;
    this.source = source;
    this.evaluator = evaluator;

    this.store = new QueryStore({ debug: this.config.debug });
    this.cache = cache ?? new LoaderCache<FeedRecord>({ timeout: this.config.loadTimeout, debug: this.config.debug });
    this.subscriptions = new SubscriptionManager({
      source,
      store: this.store,
      cache: this.cache,
      loadTimeout: this.config.loadTimeout,
      maxRetries: this.config.maxRetries,
      retryBaseDelay: this.config.retryBaseDelay,
      debug: this.config.debug,
    });

    this.scheduleRender = debounce(() => this.render(), this.config.renderDelay, {
      maxWait: this.config.renderDelay,
    });

    this.store.on('change', (change) => this.handleChange(change));
    this.store.on('error', (error) => this.emit('error', error));
    this.subscriptions.on('state', (status) => this.emit('subscription:state', status));
    this.subscriptions.on('error', (error) => this.emit('error', error));
  }

  // ==========================================================================
  // Documents
  // ==========================================================================

  /**
   * Start a document. Configuration errors (malformed document, unknown
   * query references, pipe cycles) are thrown before anything is opened
   * or rendered. The first frame is rendered synchronously.
   */
  load(input: DocumentInput | LiveDocument): void {
    this.assertAlive();
    if (this.document) {
      throw new Error('A document is already loaded; use reload()');
    }

    const { document, pipes } = this.prepare(input);
    this.document = document;
    this.state = { ...document.frontmatter.state };
    this.form = {};

    this.apply(document, pipes);
    this.render();
  }

  /**
   * Swap in a new version of the document. Subscriptions whose compiled
   * filter is unchanged stay open, local state survives for keys the new
   * document still declares, and the new tree is diffed against the
   * mounted one.
   */
  reload(input: DocumentInput | LiveDocument): void {
    this.assertAlive();
    if (!this.document) {
      this.load(input);
      return;
    }

    const { document, pipes } = this.prepare(input);
    const previous = this.document;
    this.document = document;

    const state: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(document.frontmatter.state)) {
      state[key] = key in this.state ? this.state[key] : value;
    }
    this.state = state;

    this.pipes = null;
    this.retire(previous, document);
    this.apply(document, pipes);
    this.render();
  }

  get loadedDocument(): LiveDocument | null {
    return this.document;
  }

  private prepare(input: DocumentInput | LiveDocument): { document: LiveDocument; pipes: PipeEngine } {
    const document = parseDocument(input);
    const { raw } = declaredQueries(document);
    const pipes = new PipeEngine(this.store, this.evaluator, document.frontmatter.pipes, raw, {
      debug: this.config.debug,
    });
    return { document, pipes };
  }

  /**
   * Close and forget what the previous document declared and the new one
   * does not (or declares differently)
   */
  private retire(previous: LiveDocument, next: LiveDocument): void {
    const { filters, loads, pipes } = next.frontmatter;

    for (const id of Object.keys(previous.frontmatter.filters)) {
      if (id in filters) continue;
      this.subscriptions.close(id).catch((error: unknown) => this.report(new FetchTransportError(id, error)));
      this.filterContents.delete(id);
      this.store.remove(id);
    }
    for (const id of Object.keys(previous.frontmatter.loads)) {
      if (id in loads && this.loadContents.get(id) === stableStringify(loads[id])) continue;
      this.subscriptions.removeLoadDependency(id);
      this.loadContents.delete(id);
      if (id in loads) {
        this.store.upsertRaw(id, [], { mode: 'replace' });
      } else {
        this.store.remove(id);
      }
    }
    for (const id of Object.keys(previous.frontmatter.pipes)) {
      if (!(id in pipes)) this.store.remove(id);
    }
  }

  private apply(document: LiveDocument, pipes: PipeEngine): void {
    const { filters, loads } = document.frontmatter;

    for (const id of Object.keys(filters)) this.store.declare(id, 'raw');
    for (const id of Object.keys(loads)) this.store.declare(id, 'raw');

    this.pipes = pipes;
    this.runPipes();

    for (const [id, dependency] of Object.entries(loads)) {
      if (this.loadContents.has(id)) continue;
      this.loadContents.set(id, stableStringify(dependency));
      this.subscriptions.addLoadDependency(id, dependency);
    }

    this.refreshFilters();
  }

  /**
   * Compile every filter against the current context and (re)open those
   * whose compiled form changed
   */
  private refreshFilters(): void {
    if (!this.document) return;
    const context = this.context(this.store.snapshot());

    for (const [id, definition] of Object.entries(this.document.frontmatter.filters)) {
      const compiled: CompiledFilter = compileFilter(definition, context, this.evaluator, {
        debug: this.config.debug,
      });
      const content = stableStringify(compiled);
      const previous = this.filterContents.get(id);
      if (previous === content) continue;

      this.filterContents.set(id, content);
      if (previous !== undefined) {
        // Records matched by the old filter do not belong to the new one
        this.store.upsertRaw(id, [], { mode: 'replace' });
      }
      this.subscriptions.openFilter(id, compiled);
    }
  }

  // ==========================================================================
  // Local bindings
  // ==========================================================================

  setState(patch: Record<string, unknown>): void {
    this.assertAlive();
    this.state = { ...this.state, ...patch };
    this.refreshFilters();
    this.scheduleRender();
  }

  getState(): Readonly<Record<string, unknown>> {
    return this.state;
  }

  setFormField(name: string, value: unknown): void {
    this.assertAlive();
    this.form = { ...this.form, [name]: value };
    this.scheduleRender();
  }

  getForm(): Readonly<Record<string, unknown>> {
    return this.form;
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  /**
   * Build the event an action would publish. `{expr}` placeholders in the
   * content and tags are replaced by their values.
   */
  resolveAction(id: string): EventTemplate {
    const action = this.document?.frontmatter.actions[id];
    if (!action) {
      throw new Error(`Unknown action '${id}'`);
    }

    const context = this.context(this.store.snapshot());
    return {
      kind: action.kind,
      content: this.interpolate(action.content, context),
      tags: action.tags.map((tag) => tag.map((value) => this.interpolate(value, context))),
      created_at: Math.floor(now() / 1000),
    };
  }

  async publish(id: string): Promise<EventTemplate> {
    this.assertAlive();
    const template = this.resolveAction(id);
    if (!this.source.publish) {
      throw new Error('Data source does not support publishing');
    }
    await this.source.publish(template);
    return template;
  }

  private interpolate(text: string, context: RuntimeContext): string {
    return text.replace(/\{([^{}]+)\}/g, (_match, expression: string) => {
      const result = context.eval(expression, this.evaluator);
      if (!result.ok) {
        this.report(result.error);
        return '';
      }
      const { value } = result;
      if (value === null || value === undefined) return '';
      return typeof value === 'string' ? value : JSON.stringify(value);
    });
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  /**
   * Run the pending render pass now. Returns false when nothing was pending.
   */
  flush(): boolean {
    if (!this.scheduleRender.pending()) return false;
    this.scheduleRender.flush();
    return true;
  }

  /**
   * Render from a fresh snapshot and reconcile against the mounted tree
   */
  render(): RenderFrame | null {
    if (this.destroyed || !this.document) return null;
    this.scheduleRender.cancel();

    const snapshot = this.store.snapshot();
    const revision = this.store.revision;
    const context = this.context(snapshot);

    const { slots, diagnostics } = buildSnapshot(this.document.body, context, this.evaluator);
    const { ops, state } = reconcile(this.mounted, slots, { context, evaluator: this.evaluator });
    this.mounted = state;

    for (const diagnostic of diagnostics) this.report(diagnostic.error);
    for (const op of ops) {
      if ((op.type === 'rebuild' || op.type === 'add') && op.errors) {
        op.errors.forEach((error) => this.report(error));
      }
    }

    const frame: RenderFrame = {
      pass: ++this.passes,
      revision,
      ops,
      summary: summarize(ops),
      slots,
      diagnostics,
    };

    if (this.config.debug) {
      const { keep, rebuild, add, remove } = frame.summary;
      console.log(`[Livemark] Render #${frame.pass} r${revision}: ${keep} keep, ${rebuild} rebuild, ${add} add, ${remove} remove`);
    }

    this.emit('render', frame);
    return frame;
  }

  get mountedState(): ScopeState | null {
    return this.mounted;
  }

  private context(snapshot: QuerySnapshot): RuntimeContext {
    return new RuntimeContext({
      user: this.config.user,
      queries: QueryStore.toJSON(snapshot),
      state: this.state,
      form: this.form,
    });
  }

  private handleChange(change: QueryChange): void {
    this.emit('query:update', change);
    if (!this.runningPipes) this.runPipes([change.id]);
    this.scheduleRender();
  }

  /**
   * Pipe recomputes emit changes of their own; those are already covered
   * by the pass in progress
   */
  private runPipes(changed?: string[]): void {
    if (!this.pipes) return;
    this.runningPipes = true;
    try {
      this.pipes.run(changed);
    } finally {
      this.runningPipes = false;
    }
  }

  private report(error: LivemarkError): void {
    if (this.config.debug) {
      console.warn(`[Livemark] ${error.message}`);
    }
    this.emit('error', error);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Close every subscription and drop the pending render. One-shot loads
   * already in flight still fill the cache.
   */
  async destroy(): Promise<void> {
    if (this.destroyed) return;
    this.destroyed = true;
    this.scheduleRender.cancel();
    try {
      await this.subscriptions.closeAll();
    } finally {
      this.store.removeAllListeners();
      this.subscriptions.removeAllListeners();
      this.removeAllListeners();
    }
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  private assertAlive(): void {
    if (this.destroyed) {
      throw new Error('Runtime has been destroyed');
    }
  }
}

/**
 * Create a runtime for one document
 */
export function createRuntime(options: CreateRuntimeOptions): Runtime {
  return new Runtime(options);
}
