/* src/cli/pack.ts
 * "ctxpack pack [file]" — write the deterministic archive only.
 */
import path from 'node:path';

import type { Command } from 'commander';

import { loadConfig } from '@/cli/config/load';
import { EXIT_OK, PackagingError } from '@/runner/errors';
import { createContextArchive } from '@/runner/pack/archive';
import { alert, error, ok } from '@/runner/util/color';

import { withConfigErrors } from './cli-utils';

/** Register the `pack` subcommand on the provided root CLI. */
export function registerPack(cli: Command): Command {
  const sub = cli
    .command('pack')
    .description('Write the build-context archive without building an image.')
    .argument('[file]', 'output file (default: <archiveName> in the current directory)')
    .option('-x, --exclude <paths...>', 'paths or globs to leave out (replaces configured list)');
  sub.exitOverride();

  sub.action(async (file: string | undefined, flags: { exclude?: string[] }) => {
    await withConfigErrors(async () => {
      const cwd = process.cwd();
      const loaded = await loadConfig(cwd);
      const exclude =
        flags.exclude && flags.exclude.length
          ? flags.exclude
          : loaded.packager.exclude;
      const out = path.resolve(cwd, file ?? loaded.packager.archiveName);
      try {
        const res = await createContextArchive(loaded.root, out, { exclude });
        console.log(
          `ctxpack: ${ok('done')} "pack" -> ${alert(res.path.replace(/\\/g, '/'))} (${String(res.entries.length)} entries, ${String(res.bytes)} bytes, sha256 ${res.sha256})`,
        );
        return EXIT_OK;
      } catch (e) {
        if (!(e instanceof PackagingError)) throw e;
        console.error(`ctxpack: ${error('failed')} "pack": ${e.message}`);
        return e.exitCode;
      }
    });
  });
  return cli;
}
