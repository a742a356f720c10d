/**
 * Attribute sink: write scalar values onto the active span of a request.
 *
 * With no active span every call is a no-op, never an error. Dotted keys
 * ("query.is_sdg") are the naming convention, not a rule.
 */

import type { TraceContext } from './trace-context.js';
import type { AttributeValue, Attributes } from './types.js';

/**
 * Runtime guard for values coming from untyped callers. Non-finite
 * numbers are rejected along with objects, arrays, null and undefined.
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    default:
      return false;
  }
}

/**
 * Set one attribute on the active span of `ctx`.
 */
export function setAttribute(ctx: TraceContext, key: string, value: AttributeValue): void {
  ctx.activeScope?.setAttribute(key, value);
}

/**
 * Set several attributes on the active span of `ctx`.
 */
export function setAttributes(ctx: TraceContext, attributes: Attributes): void {
  const scope = ctx.activeScope;
  if (!scope) return;

  for (const [key, value] of Object.entries(attributes)) {
    scope.setAttribute(key, value);
  }
}
