// src/runner/ci/index.ts
export type { CiPlan, CiPlanOptions, CiPlanStep } from './plan';
export { planCi, renderCiPlan, stepLabel } from './plan';
export type { CiOutcome, CiRunOptions, CiStepResult, HostRunner } from './run';
export { runCi, runOnHost } from './run';
