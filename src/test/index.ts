// src/test/index.ts
// Shared helpers for suites that work on temp repos and real tar files.
import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { list } from 'tar';

/** rm -rf with a few retries (Windows keeps handles open briefly). */
export const rmDirWithRetries = async (
  dir: string,
  tries = 5,
): Promise<void> => {
  for (let i = 0; i < tries; i += 1) {
    try {
      await rm(dir, { recursive: true, force: true });
      return;
    } catch (e) {
      if (i === tries - 1) throw e;
      await new Promise((r) => setTimeout(r, 50 * (i + 1)));
    }
  }
};

/** Write files relative to root; a trailing "/" creates an empty directory. */
export const writeTree = async (
  root: string,
  files: Record<string, string>,
): Promise<void> => {
  for (const [rel, body] of Object.entries(files)) {
    const abs = path.join(root, rel);
    if (rel.endsWith('/')) {
      await mkdir(abs, { recursive: true });
      continue;
    }
    await mkdir(path.dirname(abs), { recursive: true });
    await writeFile(abs, body, 'utf8');
  }
};

/**
 * Entry names of a tar file as written, read back through tar's own parser.
 * Directory slashes are dropped; "./x" reads as "x" and the root as ".".
 */
export const listTarEntries = async (file: string): Promise<string[]> => {
  const names: string[] = [];
  await list({
    file,
    onReadEntry: (entry) => {
      const name = entry.path.replace(/\/+$/, '');
      names.push(name === '.' ? name : name.replace(/^\.\/+/, ''));
    },
  });
  return names;
};
