/**
 * Baggage: values copied onto every span opened while they are attached.
 *
 * Modeled as a layered overlay. Each attach() adds a layer and returns the
 * token that removes exactly that layer; later layers shadow earlier ones
 * with the same key, so detaching an inner value restores the outer one.
 *
 * Detach is tolerant: a second detach, a token from another context, or an
 * out-of-order detach never throws. Out-of-order detach removes only the
 * token's own layer.
 */

import type { TraceContext } from './trace-context.js';

/**
 * Proof of an attach. Required to undo it.
 */
export class DetachToken {
  constructor(
    /** Id of the TraceContext the layer belongs to */
    readonly contextId: string,
    /** Layer id, unique within that context */
    readonly layerId: number
  ) {
    Object.freeze(this);
  }
}

interface BaggageLayer {
  key: string;
  value: string;
}

export class BaggageOverlay {
  private readonly layers = new Map<number, BaggageLayer>();
  private nextLayerId = 1;

  constructor(
    private readonly contextId: string,
    /** Baggage received from upstream; cannot be detached */
    private readonly base: Readonly<Record<string, string>> = {}
  ) {}

  attach(key: string, value: string): DetachToken {
    const layerId = this.nextLayerId++;
    this.layers.set(layerId, { key, value });
    return new DetachToken(this.contextId, layerId);
  }

  /**
   * Remove the layer created by `token`.
   *
   * @returns true if a layer was removed
   */
  detach(token: DetachToken): boolean {
    if (token.contextId !== this.contextId) return false;
    return this.layers.delete(token.layerId);
  }

  /** Effective key/value pairs, inner layers winning. */
  entries(): Record<string, string> {
    const result: Record<string, string> = { ...this.base };
    for (const { key, value } of this.layers.values()) {
      result[key] = value;
    }
    return result;
  }
}

/**
 * Attach a baggage value on `ctx`. The caller owns the token and must
 * detach it on every exit path; prefer withBaggage().
 */
export function attachBaggage(ctx: TraceContext, key: string, value: string): DetachToken {
  return ctx.baggage.attach(key, value);
}

/**
 * Undo the attach that produced `token`.
 */
export function detachBaggage(ctx: TraceContext, token: DetachToken): void {
  if (!ctx.baggage.detach(token)) {
    ctx.logger.debug?.(`Ignoring detach of unknown baggage token ${token.layerId}`);
  }
}

/**
 * Run `fn` with a baggage value attached, detaching it however fn exits.
 */
export async function withBaggage<T>(
  ctx: TraceContext,
  key: string,
  value: string,
  fn: () => T | Promise<T>
): Promise<T> {
  const token = attachBaggage(ctx, key, value);
  try {
    return await fn();
  } finally {
    detachBaggage(ctx, token);
  }
}
