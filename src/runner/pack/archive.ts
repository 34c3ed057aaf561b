/* src/runner/pack/archive.ts
 * Deterministic tar of the working tree.
 * Sorted entries, portable headers, fixed mtime: same snapshot => same bytes.
 */
import { createHash } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import path from 'node:path';

import { ensureDir } from 'fs-extra';
import { Pack } from 'tar';

import { PackagingError } from '@/runner/errors';
import { listContextEntries, type SelectOptions } from '@/runner/pack/select';
import { relInside } from '@/runner/paths';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_PACK_SELECT } from '@/runner/util/debug-scopes';

export const ARCHIVE_MTIME = new Date(0);

/** Written alone when exclusions leave nothing else, as `tar -c .` would. */
export const ROOT_ENTRY = '.';

export type ArchiveOptions = SelectOptions & {
  /** Checked before and after listing; an aborted run writes nothing. */
  signal?: AbortSignal;
};

export type ArchiveResult = {
  /** Absolute archive path. */
  path: string;
  /** Archived entries in write order. */
  entries: string[];
  bytes: number;
  sha256: string;
};

const isDirectory = async (p: string): Promise<boolean> => {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
};

const interrupted = (signal?: AbortSignal): void => {
  if (signal?.aborted) throw new PackagingError('packaging interrupted');
};

/**
 * Stream entries through tar's Pack into file, hashing and counting on the way.
 * Pack takes every name literally; tar.create() would read "@name" as another
 * archive to append.
 */
const writeTar = (
  cwd: string,
  file: string,
  entries: readonly string[],
): Promise<{ bytes: number; sha256: string }> =>
  new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    let bytes = 0;
    const pack = new Pack({
      cwd,
      portable: true,
      mtime: ARCHIVE_MTIME,
      noDirRecurse: true,
      follow: false,
    });
    const out = createWriteStream(file);
    pack.on('error', (e: unknown) => {
      out.destroy();
      reject(e);
    });
    out.on('error', reject);
    out.on('close', () => resolve({ bytes, sha256: hash.digest('hex') }));
    pack.on('data', (chunk: Buffer) => {
      hash.update(chunk);
      bytes += chunk.length;
    });
    pack.pipe(out);
    for (const e of entries) pack.add(e);
    pack.end();
  });

/**
 * Archive cwd (minus exclusions) into file.
 * The listing is taken before the file exists and never contains the file
 * itself, even when it lies inside cwd.
 *
 * @throws PackagingError when cwd is not a directory, writing fails, or the signal aborts.
 */
export const createContextArchive = async (
  cwd: string,
  file: string,
  opts: ArchiveOptions,
): Promise<ArchiveResult> => {
  interrupted(opts.signal);
  const abs = path.resolve(file);
  const self = relInside(cwd, abs);
  const omit = [...(opts.omit ?? []), ...(self ? [self] : [])];

  if (!(await isDirectory(cwd))) {
    throw new PackagingError(`unable to list ${cwd}: not a directory`);
  }
  let entries: string[];
  try {
    entries = await listContextEntries(cwd, { exclude: opts.exclude, omit });
  } catch (e) {
    throw new PackagingError(`unable to list ${cwd}`, { cause: e });
  }
  if (entries.length === 0) {
    debugLog(DBG_SCOPE_PACK_SELECT, 'nothing left after exclusions; root entry only');
    entries = [ROOT_ENTRY];
  }
  interrupted(opts.signal);

  try {
    await ensureDir(path.dirname(abs));
    const { bytes, sha256 } = await writeTar(cwd, abs, entries);
    return { path: abs, entries, bytes, sha256 };
  } catch (e) {
    throw new PackagingError(`unable to write archive ${abs}`, { cause: e });
  }
};
