/**
 * Test Utilities - Unified Reset
 *
 * Provides a single function to reset cached process state for test isolation.
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   vi.stubEnv('TEXTVEC_HOME', tempDir);
 *   resetAll();
 * });
 * ```
 */

import { _clearEnvCache } from '../config/index.js';

/**
 * Reset all cached state.
 *
 * Call after stubbing environment variables so the config layer
 * picks up the new values.
 */
export function resetAll(): void {
  _clearEnvCache();
}
