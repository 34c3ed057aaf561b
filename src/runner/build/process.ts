/* src/runner/build/process.ts
 * Child process execution with inherited stdio and abort support.
 */
import { spawn } from 'node:child_process';

import treeKill from 'tree-kill';

export type ProcessResult = {
  /** Exit code; 1 when the child ended on a signal without one. */
  exitCode: number;
  /** Terminating signal, when any. */
  signal: NodeJS.Signals | null;
};

export type ProcessOptions = {
  cwd?: string;
  /** Run through a shell (true = platform default, or a shell path). */
  shell?: boolean | string;
  /** Aborting terminates the whole child process tree. */
  signal?: AbortSignal;
  /** Default 'inherit' so docker/CI output reaches the terminal. */
  stdio?: 'inherit' | 'ignore';
};

/**
 * Spawn command and resolve with its exit status.
 * Rejects only when the process cannot be started (e.g. ENOENT).
 */
export const runProcess = (
  command: string,
  args: readonly string[],
  opts: ProcessOptions = {},
): Promise<ProcessResult> =>
  new Promise<ProcessResult>((resolveP, rejectP) => {
    const child = spawn(command, [...args], {
      cwd: opts.cwd,
      shell: opts.shell ?? false,
      stdio: opts.stdio ?? 'inherit',
      windowsHide: true,
    });

    const onAbort = (): void => {
      if (typeof child.pid === 'number') treeKill(child.pid, 'SIGTERM');
    };
    if (opts.signal?.aborted) onAbort();
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    child.on('error', (e) => {
      opts.signal?.removeEventListener('abort', onAbort);
      rejectP(e);
    });
    child.on('close', (code, sig) => {
      opts.signal?.removeEventListener('abort', onAbort);
      resolveP({ exitCode: code ?? 1, signal: sig });
    });
  });

/** Shell used for host commands; CI commands rely on bash builtins such as "source". */
export const hostShell = (): boolean | string =>
  process.platform === 'win32' ? true : '/bin/bash';
