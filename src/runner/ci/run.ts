/* src/runner/ci/run.ts
 * Execute a CI plan: install commands on the host, then steps in order.
 * Install failure aborts the run. Step failures do not, unless bail is set.
 */
import type { DockerClient } from '@/runner/build/docker';
import {
  hostShell,
  type ProcessResult,
  runProcess,
} from '@/runner/build/process';
import { type CiPlan, type CiPlanStep, stepLabel } from '@/runner/ci/plan';
import { EXIT_FAILURE, EXIT_OK } from '@/runner/errors';
import { alert, error, ok, warn } from '@/runner/util/color';

export type HostRunner = (
  command: string,
  cwd: string,
  signal?: AbortSignal,
) => Promise<ProcessResult>;

export type CiStepResult = {
  index: number;
  label: string;
  /** null when the step could not be started. */
  exitCode: number | null;
  ok: boolean;
};

export type CiOutcome = {
  install: Array<{ command: string; exitCode: number | null }>;
  results: CiStepResult[];
  ok: boolean;
  exitCode: number;
};

export type CiRunOptions = {
  docker: DockerClient;
  host?: HostRunner;
  /** Stop at the first failing step. */
  bail?: boolean;
  silent?: boolean;
  signal?: AbortSignal;
};

/** Default host runner: bash (cmd on Windows) in cwd. */
export const runOnHost: HostRunner = (command, cwd, signal) =>
  runProcess(command, [], { cwd, shell: hostShell(), signal });

const attempt = async (
  fn: () => Promise<ProcessResult>,
  silent: boolean,
): Promise<number | null> => {
  try {
    return (await fn()).exitCode;
  } catch (e) {
    if (!silent) {
      console.error(
        `ctxpack: ${error('failed')} to start: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
    return null;
  }
};

export const runCi = async (
  cwd: string,
  plan: CiPlan,
  opts: CiRunOptions,
): Promise<CiOutcome> => {
  const silent = Boolean(opts.silent);
  const host = opts.host ?? runOnHost;
  const log = (s: string): void => {
    if (!silent) console.log(s);
  };

  const install: CiOutcome['install'] = [];
  for (const command of plan.install) {
    log(`ctxpack: start "${alert(`install: ${command}`)}"`);
    const exitCode = await attempt(
      () => host(command, cwd, opts.signal),
      silent,
    );
    install.push({ command, exitCode });
    if (exitCode !== 0) {
      log(
        `ctxpack: ${error('failed')} "install: ${command}" (exit ${String(exitCode ?? 'n/a')})`,
      );
      return { install, results: [], ok: false, exitCode: EXIT_FAILURE };
    }
  }

  const runStep = (p: CiPlanStep): Promise<ProcessResult> =>
    p.mode === 'docker'
      ? opts.docker.run({
          image: p.step.image,
          command: p.step.command,
          shmSize: p.step.shmSize,
          signal: opts.signal,
        })
      : host(p.step.command, cwd, opts.signal);

  const results: CiStepResult[] = [];
  for (const p of plan.steps) {
    if (opts.signal?.aborted) break;
    const label = stepLabel(p);
    log(`ctxpack: start "${alert(`step ${String(p.index)}`)}" ${label}`);
    const exitCode = await attempt(() => runStep(p), silent);
    const passed = exitCode === 0;
    results.push({ index: p.index, label, exitCode, ok: passed });
    if (passed) {
      log(`ctxpack: ${ok('done')} "step ${String(p.index)}"`);
      continue;
    }
    log(
      `ctxpack: ${error('failed')} "step ${String(p.index)}" (exit ${String(exitCode ?? 'n/a')})`,
    );
    if (opts.bail) {
      log(`ctxpack: ${warn('bail')} after step ${String(p.index)}`);
      break;
    }
  }

  const allOk =
    results.length === plan.steps.length && results.every((r) => r.ok);
  return {
    install,
    results,
    ok: allOk,
    exitCode: allOk ? EXIT_OK : EXIT_FAILURE,
  };
};
