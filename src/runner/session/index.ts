// src/runner/session/index.ts
export { packageAndBuild } from './run-session';
export type {
  PackagerOutcome,
  SessionArgs,
  SessionOptions,
  SessionProgress,
} from './types';
