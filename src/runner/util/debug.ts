/* src/runner/util/debug.ts
 * Opt-in debug logger. Emits only when CTXPACK_DEBUG=1.
 */

const on = (): boolean => process.env.CTXPACK_DEBUG === '1';

/** Log a concise debug line to stderr (scope: module:function). */
export const debugLog = (scope: string, message: string): void => {
  if (!on()) return;
  console.error(`ctxpack: debug: ${scope}: ${message}`);
};
