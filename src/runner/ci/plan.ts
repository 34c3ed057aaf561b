/* src/runner/ci/plan.ts
 * Resolve the ordered CI step list for one host.
 */
import type {
  CiConfig,
  CiMatrixEntry,
  CiStep,
} from '@/cli/config/schema';
import { ConfigError } from '@/runner/errors';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CI_PLAN } from '@/runner/util/debug-scopes';

export type CiPlanStep = {
  /** 1-based position in the configured list. */
  index: number;
  step: CiStep;
  mode: 'docker' | 'host';
};

export type CiPlan = {
  matrix: CiMatrixEntry[];
  install: string[];
  steps: CiPlanStep[];
  skipped: Array<{ index: number; step: CiStep; reason: string }>;
};

export type CiPlanOptions = {
  /** Run steps inside their images; when false, docker-only steps are skipped. */
  docker: boolean;
  /** 1-based step numbers to keep (all when empty/undefined). */
  only?: number[];
};

/**
 * Build the plan: configured order, optional selection, docker-only filter.
 *
 * @throws ConfigError when a selected step number does not exist.
 */
export const planCi = (ci: CiConfig, opts: CiPlanOptions): CiPlan => {
  const total = ci.steps.length;
  const only = opts.only && opts.only.length > 0 ? new Set(opts.only) : null;
  if (only) {
    for (const n of only) {
      if (!Number.isInteger(n) || n < 1 || n > total) {
        throw new ConfigError(
          `ci: no step ${String(n)} (steps are numbered 1..${String(total)})`,
        );
      }
    }
  }

  const steps: CiPlanStep[] = [];
  const skipped: CiPlan['skipped'] = [];
  ci.steps.forEach((step, i) => {
    const index = i + 1;
    if (only && !only.has(index)) return;
    if (step.dockerOnly && !opts.docker) {
      skipped.push({ index, step, reason: 'docker-only step (docker disabled)' });
      return;
    }
    steps.push({ index, step, mode: opts.docker ? 'docker' : 'host' });
  });
  debugLog(
    DBG_SCOPE_CI_PLAN,
    `${String(steps.length)} step(s), ${String(skipped.length)} skipped`,
  );
  return { matrix: ci.matrix, install: ci.install, steps, skipped };
};

const matrixLabel = (m: CiMatrixEntry): string => {
  const detail = m.dist ?? m.osxImage;
  return detail ? `${m.os} (${detail})` : m.os;
};

/** One-line label for a planned step. */
export const stepLabel = (p: CiPlanStep): string => {
  if (p.mode === 'host') return `[host] ${p.step.command}`;
  const shm = p.step.shmSize ? ` shm=${p.step.shmSize}` : '';
  return `[docker ${p.step.image}${shm}] ${p.step.command}`;
};

/** Human-readable plan body. */
export const renderCiPlan = (plan: CiPlan): string => {
  const lines: string[] = [];
  lines.push(
    `matrix: ${plan.matrix.length ? plan.matrix.map(matrixLabel).join(', ') : '(none)'}`,
  );
  lines.push('install:');
  if (plan.install.length === 0) lines.push('  (none)');
  plan.install.forEach((c, i) => lines.push(`  ${String(i + 1)}. ${c}`));
  lines.push('steps:');
  if (plan.steps.length === 0) lines.push('  (none)');
  for (const p of plan.steps) lines.push(`  ${String(p.index)}. ${stepLabel(p)}`);
  if (plan.skipped.length > 0) {
    lines.push('skipped:');
    for (const s of plan.skipped)
      lines.push(`  ${String(s.index)}. ${s.reason}`);
  }
  return lines.join('\n');
};
