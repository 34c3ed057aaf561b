// src/runner/paths.ts
import path from 'node:path';

import type { PackagerConfig } from '@/runner/config/defaults';

export type PackagerPaths = {
  /** <root> */
  root: string;
  /** <root>/<context> */
  context: string;
  /** <root>/<context>/<archiveName> (in-place staging target) */
  archiveInContext: string;
};

/** Normalize a tree-relative entry: POSIX separators, no "./" prefix, no trailing "/". */
export const normalizeRel = (p: string): string =>
  p
    .replace(/\\+/g, '/')
    .replace(/^(\.\/)+/, '')
    .replace(/\/+$/, '');

/** Compute the absolute paths the packager works with. */
export const packagerPaths = (
  root: string,
  config: Pick<PackagerConfig, 'context' | 'archiveName'>,
): PackagerPaths => {
  const context = path.resolve(root, config.context);
  const archiveInContext = path.join(context, config.archiveName);
  return { root: path.resolve(root), context, archiveInContext };
};

/**
 * Tree-relative POSIX path of abs when it lies inside root; null otherwise.
 */
export const relInside = (root: string, abs: string): string | null => {
  const rel = path.relative(path.resolve(root), path.resolve(abs));
  if (!rel || rel.split(path.sep)[0] === '..' || path.isAbsolute(rel))
    return null;
  return rel.replace(/\\/g, '/');
};
