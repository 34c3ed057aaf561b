/* src/runner/pack/select.ts
 * Tree listing for the build-context archive.
 */
import fg from 'fast-glob';

import { normalizeRel } from '@/runner/paths';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_PACK_SELECT } from '@/runner/util/debug-scopes';

export type SelectOptions = {
  /** Tree-relative paths or globs; each also covers everything below it. */
  exclude: string[];
  /** Exact tree-relative paths left out in addition to exclude (e.g. the archive itself). */
  omit?: string[];
};

/** Expand exclusion entries into fast-glob ignore patterns. */
export const toIgnorePatterns = (exclude: readonly string[]): string[] => {
  const out: string[] = [];
  for (const raw of exclude) {
    const p = normalizeRel(raw.trim());
    if (!p || p === '.') {
      // "./" would exclude the whole tree
      debugLog(DBG_SCOPE_PACK_SELECT, `ignoring exclude entry "${raw}"`);
      continue;
    }
    out.push(p, `${p}/**`);
  }
  return out;
};

/** Code-unit order; locale-independent so listings are stable across hosts. */
export const compareEntries = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * List files, directories and links under cwd (dotfiles included), minus
 * exclusions, sorted. Symlinks are listed, never followed.
 */
export const listContextEntries = async (
  cwd: string,
  opts: SelectOptions,
): Promise<string[]> => {
  const ignore = [
    ...toIgnorePatterns(opts.exclude),
    ...(opts.omit ?? []).map(normalizeRel).filter((p) => p.length > 0),
  ];
  debugLog(DBG_SCOPE_PACK_SELECT, `ignore ${JSON.stringify(ignore)}`);
  const entries = await fg('**', {
    cwd,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    unique: true,
    ignore,
  });
  return entries.sort(compareEntries);
};
