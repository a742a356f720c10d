/**
 * Test Utilities - Unified Reset
 *
 * Provides a single function to reset all singletons for test isolation.
 *
 * ORDER MATTERS:
 * 1. Forget the installed exporter state (it captured resolved env values)
 * 2. Clear the env cache so the next configure() re-reads process.env
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.unstubAllEnvs();
 * });
 * ```
 */

import { _resetObservability } from '../observability/state.js';
import { _clearEnvCache } from '../config/env.js';

/**
 * Reset all process-wide state for test isolation.
 *
 * Call this in `beforeEach` for complete isolation, or `afterAll` for cleanup.
 */
export function resetAll(): void {
  _resetObservability();
  _clearEnvCache();
}
