import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { BuildRequest, DockerClient } from '@/runner/build/docker';
import { PACKAGER_DEFAULTS, type PackagerConfig } from '@/runner/config/defaults';
import { BuildError, CleanupError, PackagingError } from '@/runner/errors';
import { listTarEntries, rmDirWithRetries, writeTree } from '@/test';

import { packageAndBuild } from './run-session';

type Seen = { req: BuildRequest; entries: string[]; archiveExisted: boolean };

/** Fake docker: records the request and what the archive held at build time. */
const fakeDocker = (
  archiveName: string,
  behave: (req: BuildRequest) => Promise<number> = async () => 0,
): DockerClient & { seen: Seen[] } => {
  const seen: Seen[] = [];
  return {
    seen,
    build: async (req) => {
      const archive = path.join(req.context, archiveName);
      const archiveExisted = existsSync(archive);
      const entries = archiveExisted ? await listTarEntries(archive) : [];
      seen.push({ req, entries, archiveExisted });
      return { exitCode: await behave(req), signal: null };
    },
    run: vi.fn(async () => ({ exitCode: 0, signal: null })),
  };
};

/** Invoke only handlers added after `before`; emitting SIGINT would reach the runner's too. */
const sendSessionSigint = (before: number): void => {
  for (const l of process.rawListeners('SIGINT').slice(before)) {
    l.call(process, 'SIGINT');
  }
};

describe('packageAndBuild', () => {
  let dir: string;
  const config = (over: Partial<PackagerConfig> = {}): PackagerConfig => ({
    ...PACKAGER_DEFAULTS,
    exclude: [...PACKAGER_DEFAULTS.exclude],
    ...over,
  });

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'ctxpack-session-'));
    await writeTree(dir, {
      'a.txt': 'a\n',
      'docker/deploy-conda/Dockerfile': 'FROM scratch\nADD ray.tar /ray\n',
    });
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('context staging: builds from docker/deploy-conda and removes ray.tar afterwards', async () => {
    const docker = fakeDocker('ray.tar');
    const out = await packageAndBuild(
      { root: dir, config: config({ staging: 'context' }) },
      { docker, silent: true, signals: false },
    );

    expect(out.failures).toEqual([]);
    expect(out.exitCode).toBe(0);
    expect(docker.seen).toHaveLength(1);
    const [call] = docker.seen;
    expect(call.req.context).toBe(path.join(dir, 'docker', 'deploy-conda'));
    expect(call.req.tag).toBe('ray-project/ray:deploy-conda');
    expect(call.req.noCache).toBe(true);
    expect(call.archiveExisted).toBe(true);
    expect(call.entries).toEqual(['a.txt']);
    expect(existsSync(path.join(dir, 'docker', 'deploy-conda', 'ray.tar'))).toBe(false);
  });

  it('temp staging: the build sees a copied context holding the archive; both are removed', async () => {
    const docker = fakeDocker('ray.tar');
    const out = await packageAndBuild(
      { root: dir, config: config() },
      { docker, silent: true, signals: false },
    );

    expect(out.exitCode).toBe(0);
    const [call] = docker.seen;
    expect(call.req.context).not.toBe(path.join(dir, 'docker', 'deploy-conda'));
    expect(call.entries).toEqual(['a.txt']);
    expect(existsSync(call.req.context)).toBe(false);
    expect(out.archive?.entries).toEqual(['a.txt']);
  });

  it('build failure still removes the archive and reports BuildError (exit 3)', async () => {
    const docker = fakeDocker('ray.tar', async () => 17);
    const out = await packageAndBuild(
      { root: dir, config: config({ staging: 'context' }) },
      { docker, silent: true, signals: false },
    );

    expect(out.exitCode).toBe(3);
    expect(out.failures).toHaveLength(1);
    const [failure] = out.failures;
    expect(failure).toBeInstanceOf(BuildError);
    expect(failure.message).toBe('image build exited with code 17');
    expect(existsSync(path.join(dir, 'docker', 'deploy-conda', 'ray.tar'))).toBe(false);
  });

  it('a docker client that cannot start becomes a BuildError', async () => {
    const docker = fakeDocker('ray.tar', () =>
      Promise.reject(new Error('spawn docker ENOENT')),
    );
    const out = await packageAndBuild(
      { root: dir, config: config({ staging: 'context' }) },
      { docker, silent: true, signals: false },
    );
    expect(out.exitCode).toBe(3);
    expect(out.failures[0]).toBeInstanceOf(BuildError);
    expect(out.failures[0].message).toBe('spawn docker ENOENT');
    expect(existsSync(path.join(dir, 'docker', 'deploy-conda', 'ray.tar'))).toBe(false);
  });

  it('packaging failure skips the build (exit 2)', async () => {
    const docker = fakeDocker('ray.tar');
    const out = await packageAndBuild(
      { root: dir, config: config({ context: 'docker/missing' }) },
      { docker, silent: true, signals: false },
    );
    expect(out.exitCode).toBe(2);
    expect(out.failures[0]).toBeInstanceOf(PackagingError);
    expect(docker.seen).toHaveLength(0);
  });

  it('cleanup failure is reported distinctly after a successful build (exit 4)', async () => {
    // Replace the archive with a non-empty directory so a plain rm fails.
    const docker = fakeDocker('ray.tar', async (req) => {
      const archive = path.join(req.context, 'ray.tar');
      await rm(archive, { force: true });
      await mkdir(path.join(archive, 'held'), { recursive: true });
      return 0;
    });
    const out = await packageAndBuild(
      { root: dir, config: config({ staging: 'context' }) },
      { docker, silent: true, signals: false },
    );
    expect(out.failures.map((f) => f.phase)).toEqual(['cleanup']);
    expect(out.failures[0]).toBeInstanceOf(CleanupError);
    expect(out.exitCode).toBe(4);
  });

  it('reports phases to progress hooks in order', async () => {
    const events: string[] = [];
    await packageAndBuild(
      { root: dir, config: config() },
      {
        docker: fakeDocker('ray.tar'),
        silent: true,
        signals: false,
        progress: {
          start: (p) => events.push(`start:${p}`),
          done: (p) => events.push(`done:${p}`),
        },
      },
    );
    expect(events).toEqual([
      'start:packaging',
      'done:packaging',
      'start:building',
      'done:building',
      'start:cleanup',
      'done:cleanup',
    ]);
  });

  it('prints phase lines when not silent', async () => {
    const logs: string[] = [];
    const spy = vi.spyOn(console, 'log').mockImplementation((m: unknown) => {
      logs.push(String(m));
    });
    try {
      await packageAndBuild(
        { root: dir, config: config({ staging: 'context' }) },
        { docker: fakeDocker('ray.tar'), signals: false },
      );
    } finally {
      spy.mockRestore();
    }
    const archive = path
      .join(dir, 'docker', 'deploy-conda', 'ray.tar')
      .replace(/\\/g, '/');
    expect(logs).toEqual([
      'ctxpack: start "packaging"',
      `ctxpack: done "packaging" -> ${archive}`,
      'ctxpack: start "building"',
      'ctxpack: done "building" -> ray-project/ray:deploy-conda',
      'ctxpack: start "cleanup"',
      'ctxpack: done "cleanup"',
    ]);
  });

  it('SIGINT during the build aborts it, cleans up and exits 130', async () => {
    const listenersBefore = process.listenerCount('SIGINT');
    const docker = fakeDocker(
      'ray.tar',
      (req) =>
        new Promise<number>((resolve) => {
          req.signal?.addEventListener('abort', () => resolve(143), { once: true });
          sendSessionSigint(listenersBefore);
        }),
    );
    const out = await packageAndBuild(
      { root: dir, config: config({ staging: 'context' }) },
      { docker, silent: true },
    );
    expect(out.cancelled).toBe(true);
    expect(out.exitCode).toBe(130);
    expect(out.failures[0].message).toBe('image build interrupted');
    expect(existsSync(path.join(dir, 'docker', 'deploy-conda', 'ray.tar'))).toBe(false);
    expect(process.listenerCount('SIGINT')).toBe(listenersBefore);
  });
  it('SIGINT during packaging skips the archive and the build (exit 130)', async () => {
    const listenersBefore = process.listenerCount('SIGINT');
    const docker = fakeDocker('ray.tar');
    const out = await packageAndBuild(
      { root: dir, config: config({ staging: 'context' }) },
      {
        docker,
        silent: true,
        progress: {
          start: (phase) => {
            if (phase === 'packaging') sendSessionSigint(listenersBefore);
          },
        },
      },
    );
    expect(out.cancelled).toBe(true);
    expect(out.exitCode).toBe(130);
    expect(out.failures.map((f) => f.message)).toEqual(['packaging interrupted']);
    expect(out.archive).toBeUndefined();
    expect(docker.seen).toHaveLength(0);
    expect(existsSync(path.join(dir, 'docker', 'deploy-conda', 'ray.tar'))).toBe(false);
    expect(process.listenerCount('SIGINT')).toBe(listenersBefore);
  });

  it('build and cleanup both failing: both reported, build exit code wins', async () => {
    const docker = fakeDocker('ray.tar', async (req) => {
      const archive = path.join(req.context, 'ray.tar');
      await rm(archive, { force: true });
      await mkdir(path.join(archive, 'held'), { recursive: true });
      return 9;
    });
    const out = await packageAndBuild(
      { root: dir, config: config({ staging: 'context' }) },
      { docker, silent: true, signals: false },
    );
    expect(out.failures.map((f) => [f.phase, f.message])).toEqual([
      ['building', 'image build exited with code 9'],
      ['cleanup', `unable to remove ${path.join(dir, 'docker', 'deploy-conda', 'ray.tar')}`],
    ]);
    expect(out.exitCode).toBe(3);
  });

  it('a tree holding only the excluded subtree still builds from a root-only archive', async () => {
    await rm(path.join(dir, 'a.txt'));
    const docker = fakeDocker('ray.tar');
    const out = await packageAndBuild(
      { root: dir, config: config({ staging: 'context' }) },
      { docker, silent: true, signals: false },
    );
    expect(out.failures).toEqual([]);
    expect(out.exitCode).toBe(0);
    expect(docker.seen).toHaveLength(1);
    expect(docker.seen[0].entries).toEqual(['.']);
    expect(existsSync(path.join(dir, 'docker', 'deploy-conda', 'ray.tar'))).toBe(false);
  });
});
