/* src/runner/build/docker.ts
 * Docker client seam: argument construction plus a spawn-backed default.
 */
import { runProcess, type ProcessResult } from '@/runner/build/process';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_BUILD_DOCKER } from '@/runner/util/debug-scopes';

export type BuildRequest = {
  /** Build context directory. */
  context: string;
  tag: string;
  noCache: boolean;
  signal?: AbortSignal;
};

export type RunRequest = {
  image: string;
  /** Run through bash inside the container. */
  command: string;
  /** --shm-size value such as "500m". */
  shmSize?: string;
  signal?: AbortSignal;
};

export interface DockerClient {
  build(req: BuildRequest): Promise<ProcessResult>;
  run(req: RunRequest): Promise<ProcessResult>;
}

/** docker build [--no-cache] -t <tag> <context> */
export const buildArgs = (req: BuildRequest): string[] => [
  'build',
  ...(req.noCache ? ['--no-cache'] : []),
  '-t',
  req.tag,
  req.context,
];

/** docker run --rm [--shm-size=<size>] <image> /bin/bash -c <command> */
export const runArgs = (req: RunRequest): string[] => [
  'run',
  '--rm',
  ...(req.shmSize ? [`--shm-size=${req.shmSize}`] : []),
  req.image,
  '/bin/bash',
  '-c',
  req.command,
];

/** Default client: spawn the docker executable with inherited stdio. */
export const createDockerClient = (command = 'docker'): DockerClient => {
  const exec = (args: string[], signal?: AbortSignal) => {
    debugLog(DBG_SCOPE_BUILD_DOCKER, `${command} ${args.join(' ')}`);
    return runProcess(command, args, { signal });
  };
  return {
    build: (req) => exec(buildArgs(req), req.signal),
    run: (req) => exec(runArgs(req), req.signal),
  };
};
