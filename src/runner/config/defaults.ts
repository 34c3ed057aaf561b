/* src/runner/config/defaults.ts
 * Resolved packager configuration and its built-in defaults.
 */
export type StagingMode = 'temp' | 'context';

export type PackagerConfig = {
  /** Tree-relative paths or globs left out of the archive. */
  exclude: string[];
  /** Build context directory, relative to the tree root. */
  context: string;
  /** File name of the archive inside the build context. */
  archiveName: string;
  /** Image tag passed to the build. */
  tag: string;
  /** Build without the layer cache. */
  noCache: boolean;
  /** Where the archive is staged for the build. */
  staging: StagingMode;
  /** Docker client executable. */
  dockerCommand: string;
};

export const PACKAGER_DEFAULTS: Readonly<PackagerConfig> = Object.freeze({
  exclude: ['./docker'],
  context: 'docker/deploy-conda',
  archiveName: 'ray.tar',
  tag: 'ray-project/ray:deploy-conda',
  noCache: true,
  staging: 'temp',
  dockerCommand: 'docker',
});
