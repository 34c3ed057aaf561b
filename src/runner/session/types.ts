// src/runner/session/types.ts
import type { DockerClient } from '@/runner/build/docker';
import type { PackagerConfig } from '@/runner/config/defaults';
import type { PackagerError, PackagerPhase } from '@/runner/errors';
import type { ArchiveResult } from '@/runner/pack/archive';

export type SessionArgs = {
  /** Tree root to archive; config paths resolve against it. */
  root: string;
  config: PackagerConfig;
};

// Progress callbacks (phase start/done/fail)
export type SessionProgress = {
  start?: (phase: PackagerPhase) => void;
  /**
   * @param detail - Archive path for packaging, tag for building.
   */
  done?: (
    phase: PackagerPhase,
    detail: string,
    startedAt: number,
    endedAt: number,
  ) => void;
  fail?: (error: PackagerError) => void;
};

export type SessionOptions = {
  docker?: DockerClient;
  progress?: SessionProgress;
  /** Suppress console phase lines. */
  silent?: boolean;
  /** Install SIGINT/exit handlers for the session (default true). */
  signals?: boolean;
};

export type PackagerOutcome = {
  tag: string;
  archive?: ArchiveResult;
  /** Phase failures in the order they occurred. */
  failures: PackagerError[];
  cancelled: boolean;
  exitCode: number;
};
