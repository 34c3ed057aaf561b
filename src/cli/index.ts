/* src/cli/index.ts
 * Root CLI factory for "ctxpack": global flags, subcommands, help footer.
 * Never calls process.exit (exitOverride); the binary maps exit codes.
 */
import { readFileSync } from 'node:fs';

import { Command, Option } from 'commander';

import { renderDefaultsHelp } from '@/runner/help';

import { type DockerFactory, registerBuild } from './build';
import { registerCi } from './ci';
import { applyCliSafety, getOptionSource, rootDefaults, tagDefault } from './cli-utils';
import { registerPack } from './pack';

const readVersion = (): string => {
  try {
    const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf8');
    const pkg: unknown = JSON.parse(raw);
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string')
      return pkg.version;
  } catch {
    // fall through to placeholder
  }
  return '0.0.0';
};

export type CliDeps = {
  /** Docker client factory (tests pass a fake). */
  docker?: DockerFactory;
};

/**
 * Build the root CLI (`ctxpack`) without side effects (safe for tests).
 *
 * @returns New Commander `Command` instance.
 */
export const makeCli = (deps: CliDeps = {}): Command => {
  const cli = new Command();
  const { debugDefault, boringDefault } = rootDefaults(process.cwd());

  cli
    .name('ctxpack')
    .description(
      'Package the working tree into an image build context, build the image, and run CI steps in containers.',
    )
    .version(readVersion(), '-v, --version', 'print version');

  const optDebug = new Option('-d, --debug', 'enable verbose debug logging');
  const optNoDebug = new Option('-D, --no-debug', 'disable verbose debug logging');
  tagDefault(debugDefault ? optDebug : optNoDebug, true);
  cli.addOption(optDebug).addOption(optNoDebug);

  const optBoring = new Option(
    '-b, --boring',
    'disable all color and styling (useful for tests/CI)',
  );
  const optNoBoring = new Option('-B, --no-boring', 'do not disable color/styling');
  tagDefault(boringDefault ? optBoring : optNoBoring, true);
  cli.addOption(optBoring).addOption(optNoBoring);

  cli.addHelpText('after', () => renderDefaultsHelp(process.cwd()));
  applyCliSafety(cli);

  // Resolve -d/-b (flags > config > built-ins) before any subcommand action.
  cli.hook('preAction', () => {
    const opts = cli.opts<{ debug?: boolean; boring?: boolean }>();
    const envDebug = process.env.CTXPACK_DEBUG === '1';
    let debug = debugDefault || envDebug;
    if (getOptionSource(cli, 'debug') === 'cli') debug = Boolean(opts.debug);
    const boring =
      getOptionSource(cli, 'boring') === 'cli' ? Boolean(opts.boring) : boringDefault;

    if (debug) process.env.CTXPACK_DEBUG = '1';
    else delete process.env.CTXPACK_DEBUG;
    if (boring) {
      process.env.CTXPACK_BORING = '1';
      process.env.FORCE_COLOR = '0';
      process.env.NO_COLOR = '1';
    }
  });

  registerBuild(cli, deps.docker);
  registerPack(cli);
  registerCi(cli, deps.docker);
  return cli;
};
