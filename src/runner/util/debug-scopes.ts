/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugLog.
 * Keeping these in one place ensures logs and tests remain consistent.
 */

/** config discovery and parsing */
export const DBG_SCOPE_CONFIG_LOAD = 'config:load';

/** tree listing (exclusions, ignore patterns) */
export const DBG_SCOPE_PACK_SELECT = 'pack:select';

/** staging acquire/release */
export const DBG_SCOPE_PACK_STAGING = 'pack:staging';

/** docker child processes */
export const DBG_SCOPE_BUILD_DOCKER = 'build:docker';

/** session signal handlers and exit hook */
export const DBG_SCOPE_SESSION_SIGNALS = 'session:signals';

/** ci plan resolution */
export const DBG_SCOPE_CI_PLAN = 'ci:plan';
