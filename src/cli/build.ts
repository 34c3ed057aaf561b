/* src/cli/build.ts
 * "ctxpack build" — package the tree, build the image, remove the archive.
 * Also the default command when none is given.
 */
import type { Command } from 'commander';
import { Option } from 'commander';

import { loadConfig } from '@/cli/config/load';
import { stagingSchema } from '@/cli/config/schema';
import type { DockerClient } from '@/runner/build/docker';
import type { PackagerConfig } from '@/runner/config/defaults';
import { ConfigError } from '@/runner/errors';
import { packageAndBuild } from '@/runner/session';

import { withConfigErrors } from './cli-utils';

export type BuildFlags = {
  tag?: string;
  context?: string;
  exclude?: string[];
  archiveName?: string;
  staging?: string;
  cache?: boolean;
};

export type DockerFactory = (command: string) => DockerClient;

/** Flags win over config; --cache/--no-cache only apply when given. */
export const applyBuildOverrides = (
  base: PackagerConfig,
  flags: BuildFlags,
): PackagerConfig => {
  let staging = base.staging;
  if (typeof flags.staging === 'string') {
    const parsed = stagingSchema.safeParse(flags.staging);
    if (!parsed.success) {
      throw new ConfigError(
        `--staging: expected "temp" or "context", got "${flags.staging}"`,
      );
    }
    staging = parsed.data;
  }
  return {
    ...base,
    tag: flags.tag ?? base.tag,
    context: flags.context ?? base.context,
    exclude: flags.exclude && flags.exclude.length ? flags.exclude : base.exclude,
    archiveName: flags.archiveName ?? base.archiveName,
    noCache: typeof flags.cache === 'boolean' ? !flags.cache : base.noCache,
    staging,
  };
};

/** Register the `build` subcommand on the provided root CLI. */
export function registerBuild(cli: Command, docker?: DockerFactory): Command {
  const sub = cli
    .command('build', { isDefault: true })
    .description(
      'Archive the working tree into the build context, build the image, and remove the archive.',
    )
    .option('-t, --tag <tag>', 'image tag')
    .option('-c, --context <dir>', 'build context directory (relative to the config root)')
    .option('-x, --exclude <paths...>', 'paths or globs to leave out of the archive (replaces configured list)')
    .option('--archive-name <name>', 'archive file name inside the build context')
    .addOption(
      new Option('--staging <mode>', 'where the archive is staged').choices([
        'temp',
        'context',
      ]),
    )
    .option('--cache', 'allow the image build to use its layer cache')
    .option('--no-cache', 'build without the layer cache');
  sub.exitOverride();

  sub.action(async (flags: BuildFlags) => {
    await withConfigErrors(async () => {
      const loaded = await loadConfig(process.cwd());
      const config = applyBuildOverrides(loaded.packager, flags);
      const outcome = await packageAndBuild(
        { root: loaded.root, config },
        { docker: docker?.(config.dockerCommand) },
      );
      if (outcome.cancelled) console.error('ctxpack: interrupted');
      return outcome.exitCode;
    });
  });
  return cli;
}
