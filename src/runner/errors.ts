/* src/runner/errors.ts
 * Error taxonomy for the packager session and CLI.
 * Each phase failure carries its own exit code; the first failure wins.
 */

export type PackagerPhase = 'packaging' | 'building' | 'cleanup';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 1;
export const EXIT_PACKAGING = 2;
export const EXIT_BUILD = 3;
export const EXIT_CLEANUP = 4;
export const EXIT_INTERRUPTED = 130;

export abstract class PackagerError extends Error {
  abstract readonly phase: PackagerPhase;
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Listing the tree or writing the archive failed. */
export class PackagingError extends PackagerError {
  readonly phase = 'packaging';
  readonly exitCode = EXIT_PACKAGING;
}

/** The image build could not be started or exited non-zero. */
export class BuildError extends PackagerError {
  readonly phase = 'building';
  readonly exitCode = EXIT_BUILD;

  constructor(
    message: string,
    readonly buildExitCode: number | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Removing the archive (or the staging directory) failed. */
export class CleanupError extends PackagerError {
  readonly phase = 'cleanup';
  readonly exitCode = EXIT_CLEANUP;
}

/** Invalid or unreadable configuration. */
export class ConfigError extends Error {
  readonly exitCode = EXIT_CONFIG;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** First failure's exit code, or EXIT_OK. */
export const exitCodeOf = (failures: readonly PackagerError[]): number =>
  failures.length > 0 ? failures[0].exitCode : EXIT_OK;
