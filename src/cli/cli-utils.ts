/** Shared Commander helpers for the ctxpack CLI.
 * DRY the repeated exitOverride + parse normalization across subcommands.
 */
import type { Command, Option } from 'commander';

import { loadConfigSync } from '@/cli/config/load';
import { ConfigError } from '@/runner/errors';
import { error } from '@/runner/util/color';

const cwdSafe = (): string => {
  try {
    return process.cwd();
  } catch {
    return '.';
  }
};

/** Safe wrapper for Commander’s getOptionValueSource. */
export const getOptionSource = (
  cmd: Command,
  name: string,
): string | undefined => cmd.getOptionValueSource(name);

/** Normalize argv from unit tests like ["node","ctxpack", ...] -> [...] */
export const normalizeArgv = (
  argv?: readonly string[],
): readonly string[] | undefined => {
  if (!argv) return undefined;
  if (argv.length >= 2 && argv[0] === 'node' && argv[1] === 'ctxpack') {
    return argv.slice(2);
  }
  return argv;
};

/** Patch parseAsync() to normalize argv before Commander parses. */
export const patchParseMethods = (cli: Command): void => {
  const origParseAsync = cli.parseAsync.bind(cli);
  cli.parseAsync = async (argv, opts) => {
    const normalized = normalizeArgv(argv);
    // Test-style argv is user args; real process.argv keeps node semantics.
    await origParseAsync(
      normalized,
      normalized !== argv ? { from: 'user' } : opts,
    );
    return cli;
  };
};

/**
 * Make Commander throw CommanderError instead of calling process.exit.
 * The binary maps the error's exitCode onto process.exitCode.
 */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride();
};

/** Apply both safety adapters to a command. */
export function applyCliSafety(cmd: Command): void {
  installExitOverride(cmd);
  patchParseMethods(cmd);
}

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}

/** Root-level boolean defaults (debug/boring) from config or built-ins. */
export const rootDefaults = (
  dir = cwdSafe(),
): { debugDefault: boolean; boringDefault: boolean } => {
  try {
    const { cliDefaults } = loadConfigSync(dir);
    return {
      debugDefault: cliDefaults.debug,
      boringDefault: cliDefaults.boring,
    };
  } catch {
    // Invalid config is reported by the action that loads it; help/flags use built-ins.
    return { debugDefault: false, boringDefault: false };
  }
};

/**
 * Run an action body; configuration errors print their message and set
 * exit code 1 instead of surfacing a stack trace.
 */
export const withConfigErrors = async (
  fn: () => Promise<number>,
): Promise<void> => {
  try {
    process.exitCode = await fn();
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`${error('error')}: ${e.message}`);
      process.exitCode = e.exitCode;
      return;
    }
    throw e;
  }
};

/** Parse a list of 1-based step numbers from CLI arguments. */
export const parseStepNumbers = (raw: readonly string[]): number[] =>
  raw.map((s) => {
    const n = Number.parseInt(s, 10);
    if (!Number.isInteger(n) || String(n) !== s.trim()) {
      throw new ConfigError(`ci: "${s}" is not a step number`);
    }
    return n;
  });
