// src/runner/index.ts
export type { DockerClient } from './build/docker';
export { buildArgs, createDockerClient, runArgs } from './build/docker';
export type { ProcessResult } from './build/process';
export * from './ci';
export type { PackagerConfig, StagingMode } from './config/defaults';
export { PACKAGER_DEFAULTS } from './config/defaults';
export * from './errors';
export type { ArchiveResult } from './pack/archive';
export { createContextArchive } from './pack/archive';
export { listContextEntries } from './pack/select';
export type { Staging } from './pack/staging';
export { acquireStaging } from './pack/staging';
export * from './session';
