/* src/runner/session/run-session.ts
 * Packager session: packaging -> building -> cleanup.
 *
 * Packaging failure skips the build. Cleanup runs whenever staging was
 * acquired, whatever happened before it. Every failure is kept; the outcome's
 * exit code is the first one's (130 when interrupted).
 */
import { createDockerClient } from '@/runner/build/docker';
import {
  BuildError,
  CleanupError,
  EXIT_INTERRUPTED,
  exitCodeOf,
  PackagerError,
  type PackagerPhase,
  PackagingError,
} from '@/runner/errors';
import { type ArchiveResult, createContextArchive } from '@/runner/pack/archive';
import { acquireStaging, type Staging } from '@/runner/pack/staging';
import { attachSessionSignals } from '@/runner/session/signals';
import type {
  PackagerOutcome,
  SessionArgs,
  SessionOptions,
} from '@/runner/session/types';
import { alert, error, ok } from '@/runner/util/color';

const posix = (p: string): string => p.replace(/\\/g, '/');

const asPhaseError = (phase: PackagerPhase, e: unknown): PackagerError => {
  if (e instanceof PackagerError) return e;
  const message = e instanceof Error ? e.message : String(e);
  if (phase === 'packaging') return new PackagingError(message, { cause: e });
  if (phase === 'building') return new BuildError(message, null, { cause: e });
  return new CleanupError(message, { cause: e });
};

/**
 * Package the tree, build the image from the staged context, and remove the
 * archive.
 */
export const packageAndBuild = async (
  args: SessionArgs,
  opts: SessionOptions = {},
): Promise<PackagerOutcome> => {
  const { root, config } = args;
  const silent = Boolean(opts.silent);
  const docker = opts.docker ?? createDockerClient(config.dockerCommand);
  const failures: PackagerError[] = [];
  const abort = new AbortController();
  let staging: Staging | undefined;
  let archive: ArchiveResult | undefined;
  let cancelled = false;

  const start = (phase: PackagerPhase): number => {
    opts.progress?.start?.(phase);
    if (!silent) console.log(`ctxpack: start "${alert(phase)}"`);
    return Date.now();
  };
  const done = (phase: PackagerPhase, detail: string, startedAt: number) => {
    opts.progress?.done?.(phase, detail, startedAt, Date.now());
    if (!silent) {
      const tail = detail ? ` -> ${alert(detail)}` : '';
      console.log(`ctxpack: ${ok('done')} "${alert(phase)}"${tail}`);
    }
  };
  const fail = (phase: PackagerPhase, e: unknown): void => {
    const err = asPhaseError(phase, e);
    failures.push(err);
    opts.progress?.fail?.(err);
    if (!silent) {
      console.error(`ctxpack: ${error('failed')} "${phase}": ${err.message}`);
    }
  };

  const detachSignals =
    opts.signals === false
      ? () => undefined
      : attachSessionSignals(
          () => {
            cancelled = true;
            abort.abort();
          },
          () => staging?.releaseSync(),
        );

  try {
    const packStarted = start('packaging');
    try {
      staging = await acquireStaging(root, config);
      archive = await createContextArchive(root, staging.archivePath, {
        exclude: config.exclude,
        signal: abort.signal,
      });
      done('packaging', posix(archive.path), packStarted);
    } catch (e) {
      fail('packaging', e);
    }

    if (failures.length === 0 && staging && !abort.signal.aborted) {
      const buildStarted = start('building');
      try {
        const res = await docker.build({
          context: staging.contextDir,
          tag: config.tag,
          noCache: config.noCache,
          signal: abort.signal,
        });
        if (res.exitCode !== 0) {
          const why = abort.signal.aborted
            ? 'image build interrupted'
            : `image build exited with code ${String(res.exitCode)}`;
          throw new BuildError(why, res.exitCode);
        }
        done('building', config.tag, buildStarted);
      } catch (e) {
        fail('building', e);
      }
    }
  } finally {
    if (staging) {
      const cleanupStarted = start('cleanup');
      try {
        await staging.release();
        done('cleanup', '', cleanupStarted);
      } catch (e) {
        fail('cleanup', e);
      }
    }
    detachSignals();
  }

  return {
    tag: config.tag,
    archive,
    failures,
    cancelled,
    exitCode: cancelled ? EXIT_INTERRUPTED : exitCodeOf(failures),
  };
};
