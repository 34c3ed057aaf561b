/* src/cli/config/load.ts
 * Locate, parse and validate ctxpack.config.*; merge over built-in defaults.
 * Relative paths in the file resolve against the directory holding it.
 */
import { existsSync, readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import {
  type CiConfig,
  ciSchema,
  configSchema,
  type RawConfig,
} from '@/cli/config/schema';
import { parseText } from '@/common/config/parse';
import { PACKAGER_DEFAULTS, type PackagerConfig } from '@/runner/config/defaults';
import { ConfigError } from '@/runner/errors';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CONFIG_LOAD } from '@/runner/util/debug-scopes';

export const CONFIG_FILE_NAMES = [
  'ctxpack.config.yml',
  'ctxpack.config.yaml',
  'ctxpack.config.json',
] as const;

export type LoadedConfig = {
  /** Absolute config file path, or null when running on defaults. */
  path: string | null;
  /** Tree root: the config file's directory, or the starting cwd. */
  root: string;
  packager: PackagerConfig;
  ci: CiConfig;
  cliDefaults: { debug: boolean; boring: boolean };
};

const posix = (p: string): string => p.replace(/\\/g, '/');

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

/** Nearest ctxpack.config.* walking up from dir; null when none exists. */
export const findConfigPathSync = (dir: string): string | null => {
  let cur = path.resolve(dir);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const cand = path.join(cur, name);
      if (existsSync(cand)) return cand;
    }
    const parent = path.dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
};

const defaultCiUrl = new URL('./ci.default.yml', import.meta.url);

/** Bundled CI plan used when the config has no "ci" section. */
export const loadDefaultCi = (): CiConfig => {
  const text = readFileSync(defaultCiUrl, 'utf8');
  return ciSchema.parse(parseText(defaultCiUrl.pathname, text));
};

const validate = (cfgPath: string, text: string): RawConfig => {
  let parsed: unknown;
  try {
    parsed = parseText(cfgPath, text);
  } catch (e) {
    throw new ConfigError(
      `ctxpack: unable to parse ${posix(cfgPath)}\n${String(e)}`,
      { cause: e },
    );
  }
  // An empty YAML document parses to null; treat as "no overrides".
  try {
    return configSchema.parse(parsed ?? {});
  } catch (e) {
    throw new ConfigError(
      `ctxpack: invalid config in ${posix(cfgPath)}\n${formatZodError(e)}`,
      { cause: e },
    );
  }
};

const resolveConfig = (
  cfgPath: string | null,
  root: string,
  raw: RawConfig,
): LoadedConfig => {
  const pkg = raw.package ?? {};
  const packager: PackagerConfig = {
    exclude: pkg.exclude ?? [...PACKAGER_DEFAULTS.exclude],
    context: pkg.context ?? PACKAGER_DEFAULTS.context,
    archiveName: pkg.archiveName ?? PACKAGER_DEFAULTS.archiveName,
    tag: pkg.tag ?? PACKAGER_DEFAULTS.tag,
    noCache: pkg.noCache ?? PACKAGER_DEFAULTS.noCache,
    staging: pkg.staging ?? PACKAGER_DEFAULTS.staging,
    dockerCommand: raw.docker?.command ?? PACKAGER_DEFAULTS.dockerCommand,
  };
  return {
    path: cfgPath,
    root,
    packager,
    ci: raw.ci ?? loadDefaultCi(),
    cliDefaults: {
      debug: raw.cliDefaults?.debug ?? false,
      boring: raw.cliDefaults?.boring ?? false,
    },
  };
};

/** Load and validate configuration for cwd. */
export const loadConfig = async (cwd: string): Promise<LoadedConfig> => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) {
    debugLog(DBG_SCOPE_CONFIG_LOAD, `no config found from ${posix(cwd)}`);
    return resolveConfig(null, path.resolve(cwd), {});
  }
  debugLog(DBG_SCOPE_CONFIG_LOAD, `using ${posix(cfgPath)}`);
  const text = await readFile(cfgPath, 'utf8');
  return resolveConfig(cfgPath, path.dirname(cfgPath), validate(cfgPath, text));
};

/** Synchronous variant for CLI construction (root defaults, help). */
export const loadConfigSync = (cwd: string): LoadedConfig => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) return resolveConfig(null, path.resolve(cwd), {});
  const text = readFileSync(cfgPath, 'utf8');
  return resolveConfig(cfgPath, path.dirname(cfgPath), validate(cfgPath, text));
};
