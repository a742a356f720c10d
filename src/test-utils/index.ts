/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 * ```
 */

export { resetAll } from './reset.js';
export { createSpyBackend, fakeClock, type SpyBackend, type SpyCall } from './spy-backend.js';
