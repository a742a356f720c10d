/**
 * BaggageContext Tests
 *
 * attach/detach as a precise undo, tolerance for misuse, and copying onto
 * spans opened while attached.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TraceContext } from '../trace-context.js';
import { openSpan } from '../span-scope.js';
import { attachBaggage, detachBaggage, withBaggage, BaggageOverlay, DetachToken } from '../baggage.js';
import { createNoopBackend } from '../noop-backend.js';

describe('BaggageOverlay', () => {
  it('starts from the base entries', () => {
    const overlay = new BaggageOverlay('ctx-1', { tenant: 'acme' });

    expect(overlay.entries()).toEqual({ tenant: 'acme' });
  });

  it('shadows an outer value and restores it on detach', () => {
    const overlay = new BaggageOverlay('ctx-1', { tenant: 'acme' });
    const token = overlay.attach('tenant', 'globex');

    expect(overlay.entries()).toEqual({ tenant: 'globex' });
    expect(overlay.detach(token)).toBe(true);
    expect(overlay.entries()).toEqual({ tenant: 'acme' });
  });

  it('rejects tokens from another overlay', () => {
    const a = new BaggageOverlay('ctx-a');
    const b = new BaggageOverlay('ctx-b');
    const token = a.attach('k', 'v');

    expect(b.detach(token)).toBe(false);
    expect(a.entries()).toEqual({ k: 'v' });
  });
});

describe('attachBaggage / detachBaggage', () => {
  let ctx: TraceContext;
  let debug: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    debug = vi.fn();
    ctx = new TraceContext(createNoopBackend(), { logger: { warn: vi.fn(), debug } });
  });

  it('leaves baggage unchanged after attach followed by detach', () => {
    const before = ctx.baggage.entries();
    const token = attachBaggage(ctx, 'request_id', 'r1');
    detachBaggage(ctx, token);

    expect(ctx.baggage.entries()).toEqual(before);
  });

  it('returns frozen tokens', () => {
    const token = attachBaggage(ctx, 'k', 'v');

    expect(token).toBeInstanceOf(DetachToken);
    expect(Object.isFrozen(token)).toBe(true);
  });

  it('undoes nested attaches of the same key one at a time', () => {
    const outer = attachBaggage(ctx, 'tenant', 'acme');
    const inner = attachBaggage(ctx, 'tenant', 'acme-eu');

    expect(ctx.baggage.entries()).toEqual({ tenant: 'acme-eu' });
    detachBaggage(ctx, inner);
    expect(ctx.baggage.entries()).toEqual({ tenant: 'acme' });
    detachBaggage(ctx, outer);
    expect(ctx.baggage.entries()).toEqual({});
  });

  it('removes only the matching layer when detached out of order', () => {
    const first = attachBaggage(ctx, 'tenant', 'acme');
    const second = attachBaggage(ctx, 'request_id', 'r1');

    detachBaggage(ctx, first);
    expect(ctx.baggage.entries()).toEqual({ request_id: 'r1' });

    detachBaggage(ctx, second);
    expect(ctx.baggage.entries()).toEqual({});
  });

  it('ignores a second detach of the same token', () => {
    const token = attachBaggage(ctx, 'k', 'v');
    detachBaggage(ctx, token);

    expect(() => detachBaggage(ctx, token)).not.toThrow();
    expect(debug).toHaveBeenCalledWith(`Ignoring detach of unknown baggage token ${token.layerId}`);
  });

  it('copies attached values onto spans opened while attached', () => {
    const root = openSpan(ctx, 'root');
    const token = attachBaggage(ctx, 'tenant', 'acme');
    openSpan(ctx, 'with-baggage').close();
    detachBaggage(ctx, token);
    openSpan(ctx, 'without-baggage').close();
    root.close();

    expect(ctx.spans().map((s) => s.attributes)).toEqual([{}, { tenant: 'acme' }, {}]);
  });
});

describe('withBaggage', () => {
  it('detaches after the function returns', async () => {
    const ctx = new TraceContext(createNoopBackend());

    const seen = await withBaggage(ctx, 'tenant', 'acme', () => ctx.baggage.entries());

    expect(seen).toEqual({ tenant: 'acme' });
    expect(ctx.baggage.entries()).toEqual({});
  });

  it('detaches when the function throws', async () => {
    const ctx = new TraceContext(createNoopBackend());

    await expect(
      withBaggage(ctx, 'tenant', 'acme', async () => {
        throw new Error('downstream failed');
      })
    ).rejects.toThrow('downstream failed');
    expect(ctx.baggage.entries()).toEqual({});
  });
});
