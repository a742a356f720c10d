/**
 * TraceContext: everything tracing knows about one logical request.
 *
 * Passed explicitly down the request's call chain instead of being looked
 * up from ambient state, so concurrent requests can never see each other's
 * active span or baggage. Holds:
 *   - a unique id
 *   - the scopes opened on it, as a tree (each scope knows its parent)
 *   - the baggage overlay
 *
 * Work inside one request can fan out (Promise.all over withSpan calls).
 * Each scope entered through withSpan() or scope.run() gets its own frame
 * in AsyncLocalStorage, so parallel branches each see their own active
 * scope and siblings stay siblings. Outside any frame the context falls
 * back to a plain stack of the scopes opened with openSpan().
 *
 * The context ends when its last root scope closes; spans opened after
 * that are inert.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import { ROOT_CONTEXT, type Context } from '@opentelemetry/api';
import { silentLogger, type Logger } from '../utils/logger.js';
import { BaggageOverlay } from './baggage.js';
import { baggageFromContext, contextWithBaggage, injectContext } from './propagation.js';
import { ScopeHandle, type ScopeOwner } from './span-scope.js';
import type { Attributes, SpanRecord, TracingBackend } from './types.js';

/**
 * Scopes made active by withSpan()/run() on one async branch. `outer` links
 * to the enclosing frame, which may belong to another context.
 */
interface Frame {
  readonly owner: TraceContext;
  readonly stack: ScopeHandle[];
  readonly outer: Frame | undefined;
}

const frames = new AsyncLocalStorage<Frame>();

export interface TraceContextOptions {
  /** Remote parent and baggage extracted from inbound headers */
  remote?: Context;
  /** Millisecond clock; defaults to Date.now */
  clock?: () => number;
  logger?: Logger;
}

export class TraceContext implements ScopeOwner {
  readonly id = randomUUID();
  readonly baggage: BaggageOverlay;
  readonly logger: Logger;

  private readonly remote: Context;
  private readonly clock: () => number;
  /** Scopes opened outside any frame of this context */
  private readonly baseStack: ScopeHandle[] = [];
  private readonly opened: ScopeHandle[] = [];
  private ended = false;

  constructor(
    readonly backend: TracingBackend,
    options: TraceContextOptions = {}
  ) {
    this.remote = options.remote ?? ROOT_CONTEXT;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.baggage = new BaggageOverlay(this.id, baggageFromContext(this.remote));
  }

  /**
   * Innermost open scope on the calling branch, if any. When every scope on
   * the branch has been closed (by an enclosing scope closing early) the
   * nearest open ancestor is active instead.
   */
  get activeScope(): ScopeHandle | undefined {
    const stack = this.currentStack();
    for (let i = stack.length - 1; i >= 0; i--) {
      const scope = stack[i];
      if (scope?.isOpen) return scope;
    }
    let ancestor = stack[0]?.parent ?? null;
    while (ancestor && !ancestor.isOpen) {
      ancestor = ancestor.parent;
    }
    return ancestor ?? undefined;
  }

  /** True once the last root scope has closed */
  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Open a scope as a child of the active one and make it active on the
   * calling branch. Prefer openSpan()/withSpan().
   */
  open(name: string, attributes: Attributes = {}): ScopeHandle {
    const scope = this.create(name, attributes);
    if (!scope.isInert) {
      this.currentStack().push(scope);
    }
    return scope;
  }

  /**
   * Open a scope that is active only inside `fn` and the async work `fn`
   * starts. Scopes opened by sibling branches afterwards are not nested
   * under it.
   */
  within<T>(name: string, attributes: Attributes, fn: (scope: ScopeHandle) => T): T {
    const scope = this.create(name, attributes);
    return this.enter(scope, () => fn(scope));
  }

  /**
   * Snapshots of every span opened on this context, in opening order.
   */
  spans(): SpanRecord[] {
    return this.opened.map((scope) => scope.toRecord());
  }

  /**
   * Write traceparent/baggage headers for an outbound call made on behalf
   * of this request.
   */
  injectHeaders(carrier: Record<string, string>): Record<string, string> {
    const base = this.activeScope?.context ?? this.remote;
    injectContext(contextWithBaggage(base, this.baggage.entries()), carrier);
    return carrier;
  }

  // ==========================================================================
  // ScopeOwner
  // ==========================================================================

  now(): number {
    return this.clock();
  }

  baggageEntries(): Record<string, string> {
    return this.baggage.entries();
  }

  backendContext(scope: ScopeHandle): Context {
    return contextWithBaggage(scope.context, this.baggage.entries());
  }

  enter<T>(scope: ScopeHandle, fn: () => T): T {
    if (scope.isInert) return fn();
    return frames.run({ owner: this, stack: [scope], outer: frames.getStore() }, fn);
  }

  release(scope: ScopeHandle): void {
    if (!scope.isOpen) return;
    scope.finish(this.now());

    // The bottom entry stays so a branch that outlives its scope still
    // finds that scope's open ancestors
    const stack = this.currentStack();
    while (stack.length > 1 && !stack[stack.length - 1]?.isOpen) {
      stack.pop();
    }

    if (scope.parent === null && !this.opened.some((s) => s.parent === null && s.isOpen)) {
      this.ended = true;
    }
  }

  private create(name: string, attributes: Attributes): ScopeHandle {
    if (this.ended) {
      this.logger.debug?.(`Span "${name}" opened after request ${this.id} ended; not recorded`);
      return new ScopeHandle(this, name, null, this.remote, attributes, true);
    }

    const parent = this.activeScope ?? null;
    const parentContext = contextWithBaggage(parent?.context ?? this.remote, this.baggage.entries());
    const scope = new ScopeHandle(this, name, parent, parentContext, attributes);
    this.opened.push(scope);
    return scope;
  }

  /** Stack of the innermost frame this context owns, else the base stack */
  private currentStack(): ScopeHandle[] {
    for (let frame = frames.getStore(); frame; frame = frame.outer) {
      if (frame.owner === this) return frame.stack;
    }
    return this.baseStack;
  }
}
