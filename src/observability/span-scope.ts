/**
 * Span scopes: one traced operation within a request.
 *
 * A ScopeHandle is opened on a TraceContext, becomes a child of whatever
 * scope is active there, and must be closed exactly once. withSpan() does
 * the closing on every exit path (return, throw, abort).
 *
 * Invariants:
 *   - endTime, once set, never changes
 *   - endTime >= startTime
 *   - a child's endTime is never later than its parent's
 *   - closing a scope closes its open descendants first; under a failed or
 *     cancelled scope they are closed as cancelled
 */

import { randomBytes } from 'node:crypto';
import type { Context } from '@opentelemetry/api';
import type { Logger } from '../utils/logger.js';
import { isAttributeValue } from './attributes.js';
import { createNoopBackend } from './noop-backend.js';
import type { TraceContext } from './trace-context.js';
import type {
  AttributeValue,
  Attributes,
  BackendSpan,
  SpanRecord,
  SpanStatus,
  TracingBackend,
} from './types.js';

/**
 * What a scope needs from the context that opened it.
 */
export interface ScopeOwner {
  readonly backend: TracingBackend;
  readonly logger: Logger;
  now(): number;
  baggageEntries(): Record<string, string>;
  /** `scope`'s context with the current baggage applied */
  backendContext(scope: ScopeHandle): Context;
  /** Run fn with `scope` active on the calling async branch */
  enter<T>(scope: ScopeHandle, fn: () => T): T;
  /** Close `scope` and any scopes opened inside it; no-op if not open */
  release(scope: ScopeHandle): void;
}

function newSpanId(): string {
  return randomBytes(8).toString('hex');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ScopeHandle {
  readonly spanId = newSpanId();
  readonly startTime: number;

  private endTime: number | null = null;
  private status: SpanStatus = 'ok';
  private message?: string;
  private readonly attributes: Attributes;
  private latestChildEnd = 0;
  private readonly openChildren = new Set<ScopeHandle>();
  private readonly span: BackendSpan;

  /**
   * @param inert - handle of an ended context: records locally, exports nothing
   */
  constructor(
    private readonly owner: ScopeOwner,
    readonly name: string,
    readonly parent: ScopeHandle | null,
    parentContext: Context,
    attributes: Attributes,
    private readonly inert = false
  ) {
    this.startTime = owner.now();
    this.attributes = { ...owner.baggageEntries(), ...attributes };
    const backend = inert ? createNoopBackend() : owner.backend;
    this.span = backend.startSpan(name, {
      attributes: this.attributes,
      startTime: this.startTime,
      parent: parentContext,
    });
    parent?.openChildren.add(this);
  }

  get isOpen(): boolean {
    return this.endTime === null;
  }

  /** Handle of an ended context */
  get isInert(): boolean {
    return this.inert;
  }

  /** OpenTelemetry context with this span active (parent for children). */
  get context(): Context {
    return this.span.context;
  }

  setAttribute(key: string, value: AttributeValue): this {
    if (!this.isOpen) return this;
    if (!isAttributeValue(value)) {
      this.owner.logger.debug?.(`Dropping non-scalar attribute "${key}" on span "${this.name}"`);
      return this;
    }
    this.attributes[key] = value;
    this.span.setAttribute(key, value);
    return this;
  }

  /** Mark the span failed. The first recorded message is kept. */
  recordError(error: unknown): this {
    if (!this.isOpen) return this;
    this.status = 'error';
    this.message ??= errorMessage(error);
    this.span.recordException(error);
    return this;
  }

  /** Mark the span as cut short by cancellation. */
  cancel(reason?: unknown): this {
    if (!this.isOpen) return this;
    this.setAttribute('cancelled', true);
    this.status = 'error';
    this.message ??= reason === undefined ? 'cancelled' : errorMessage(reason);
    return this;
  }

  /**
   * End the span. Scopes still open inside this one are closed first.
   * Calling close() again is a no-op.
   */
  close(): void {
    if (!this.isOpen) return;
    if (this.inert) {
      this.endTime = Math.max(this.owner.now(), this.startTime);
      return;
    }
    this.owner.release(this);
  }

  /**
   * Run fn with this span (and current baggage) as the active OpenTelemetry
   * context, so auto-instrumented outbound calls are parented here.
   */
  run<T>(fn: () => T): T {
    if (this.inert) return fn();
    return this.owner.enter(this, () =>
      this.owner.backend.bind(this.owner.backendContext(this), fn)
    );
  }

  /**
   * @internal Called by the owner on close. Ends open descendants
   * innermost-first, then this span.
   */
  finish(at: number): number {
    for (const child of [...this.openChildren]) {
      if (this.status === 'error') {
        child.cancel(this.message);
      }
      child.finish(at);
    }

    const end = Math.max(at, this.startTime, this.latestChildEnd);
    this.endTime = end;
    this.parent?.childFinished(this, end);
    this.span.end(this.status, end, this.message);
    return end;
  }

  private childFinished(child: ScopeHandle, end: number): void {
    this.openChildren.delete(child);
    this.latestChildEnd = Math.max(this.latestChildEnd, end);
  }

  toRecord(): SpanRecord {
    return {
      spanId: this.spanId,
      name: this.name,
      parentId: this.parent?.spanId ?? null,
      startTime: this.startTime,
      endTime: this.endTime,
      status: this.status,
      attributes: { ...this.attributes },
      ...(this.message !== undefined ? { errorMessage: this.message } : {}),
    };
  }
}

// ============================================================================
// Public operations
// ============================================================================

export interface WithSpanOptions {
  attributes?: Attributes;
  /** When aborted by the time fn settles, the span is closed as cancelled */
  signal?: AbortSignal;
}

/**
 * Open a span on `ctx`, parented to its active span (root if none).
 * The caller must close the handle; prefer withSpan().
 */
export function openSpan(ctx: TraceContext, name: string, attributes: Attributes = {}): ScopeHandle {
  return ctx.open(name, attributes);
}

/**
 * Run `fn` inside a span that is closed however fn exits. Thrown errors are
 * recorded on the span and rethrown.
 *
 * The span is active only for fn and the async work fn starts, so several
 * withSpan() calls run in parallel on one context open sibling spans.
 * Inside fn, write to the span through `scope` rather than the context.
 */
export async function withSpan<T>(
  ctx: TraceContext,
  name: string,
  fn: (scope: ScopeHandle) => T | Promise<T>,
  options: WithSpanOptions = {}
): Promise<T> {
  return ctx.within(name, options.attributes ?? {}, async (scope) => {
    try {
      return await fn(scope);
    } catch (error) {
      scope.recordError(error);
      throw error;
    } finally {
      if (options.signal?.aborted) {
        scope.cancel(options.signal.reason);
      }
      scope.close();
    }
  });
}
