// src/runner/session/signals.ts
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_SESSION_SIGNALS } from '@/runner/util/debug-scopes';

/**
 * Install a one-shot SIGINT handler and a synchronous exit hook for one
 * session. After the first Ctrl-C the handler is gone, so a second one gets
 * Node's default (terminate). Returns the detach function.
 */
export const attachSessionSignals = (
  onSigint: () => void,
  onExitCleanup: () => void,
): (() => void) => {
  debugLog(DBG_SCOPE_SESSION_SIGNALS, 'install SIGINT handler and exit hook');
  process.once('SIGINT', onSigint);
  process.on('exit', onExitCleanup);
  return () => {
    debugLog(DBG_SCOPE_SESSION_SIGNALS, 'detach SIGINT handler and exit hook');
    process.off('SIGINT', onSigint);
    process.off('exit', onExitCleanup);
  };
};
