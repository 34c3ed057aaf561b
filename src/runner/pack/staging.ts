/* src/runner/pack/staging.ts
 * Scoped archive resource for one packager session.
 *
 * - temp: copy the build context into a fresh per-invocation temp dir and
 *   stage the archive there (safe for concurrent runs).
 * - context: stage the archive in place at <context>/<archiveName>.
 *
 * release() removes exactly what acquire created and may be called more than
 * once; releaseSync() is the same for process exit hooks.
 */
import { rmSync } from 'node:fs';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { copy } from 'fs-extra';

import type { PackagerConfig, StagingMode } from '@/runner/config/defaults';
import { CleanupError, PackagingError } from '@/runner/errors';
import { packagerPaths } from '@/runner/paths';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_PACK_STAGING } from '@/runner/util/debug-scopes';

export type Staging = {
  mode: StagingMode;
  /** Directory handed to the image build. */
  contextDir: string;
  /** Archive location inside contextDir. */
  archivePath: string;
  release: () => Promise<void>;
  releaseSync: () => void;
};

const isDirectory = async (p: string): Promise<boolean> => {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
};

const makeRelease = (target: string, recursive: boolean) => {
  let released = false;
  const release = async (): Promise<void> => {
    if (released) return;
    try {
      await rm(target, { recursive, force: true });
    } catch (e) {
      throw new CleanupError(`unable to remove ${target}`, { cause: e });
    }
    released = true;
    debugLog(DBG_SCOPE_PACK_STAGING, `removed ${target}`);
  };
  const releaseSync = (): void => {
    if (released) return;
    try {
      rmSync(target, { recursive, force: true });
      released = true;
    } catch (e) {
      // Exit hooks cannot await or rethrow; report and move on.
      console.error(`ctxpack: unable to remove ${target}: ${String(e)}`);
    }
  };
  return { release, releaseSync };
};

/**
 * Acquire the staging area for root/config.
 *
 * @throws PackagingError when the build context is missing or cannot be copied.
 */
export const acquireStaging = async (
  root: string,
  config: Pick<PackagerConfig, 'context' | 'archiveName' | 'staging'>,
): Promise<Staging> => {
  const paths = packagerPaths(root, config);
  if (!(await isDirectory(paths.context))) {
    throw new PackagingError(
      `build context ${paths.context} is not a directory`,
    );
  }

  if (config.staging === 'context') {
    debugLog(DBG_SCOPE_PACK_STAGING, `in place at ${paths.archiveInContext}`);
    return {
      mode: 'context',
      contextDir: paths.context,
      archivePath: paths.archiveInContext,
      ...makeRelease(paths.archiveInContext, false),
    };
  }

  const dir = await mkdtemp(path.join(tmpdir(), 'ctxpack-'));
  const scoped = makeRelease(dir, true);
  try {
    // A leftover archive from an in-place run would be overwritten anyway.
    await copy(paths.context, dir, {
      filter: (src) => path.resolve(src) !== paths.archiveInContext,
    });
  } catch (e) {
    const failure = new PackagingError(
      `unable to copy build context ${paths.context}`,
      { cause: e },
    );
    // The copy failure is the one to report; a failed removal is only logged.
    await scoped.release().catch((re: unknown) => {
      console.error(`ctxpack: ${re instanceof Error ? re.message : String(re)}`);
    });
    throw failure;
  }
  debugLog(DBG_SCOPE_PACK_STAGING, `copied ${paths.context} -> ${dir}`);
  return {
    mode: 'temp',
    contextDir: dir,
    archivePath: path.join(dir, config.archiveName),
    ...scoped,
  };
};
