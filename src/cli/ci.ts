/* src/cli/ci.ts
 * "ctxpack ci [steps...]" — run (or print) the configured CI steps.
 */
import type { Command } from 'commander';

import { loadConfig } from '@/cli/config/load';
import { createDockerClient } from '@/runner/build/docker';
import { planCi, renderCiPlan, runCi } from '@/runner/ci';
import { EXIT_INTERRUPTED, EXIT_OK } from '@/runner/errors';
import { attachSessionSignals } from '@/runner/session/signals';
import { bold } from '@/runner/util/color';

import type { DockerFactory } from './build';
import { parseStepNumbers, withConfigErrors } from './cli-utils';

type CiFlags = { plan?: boolean; docker?: boolean; bail?: boolean };

/** Register the `ci` subcommand on the provided root CLI. */
export function registerCi(cli: Command, docker?: DockerFactory): Command {
  const sub = cli
    .command('ci')
    .description('Run the configured CI install commands and steps, in order.')
    .argument('[steps...]', 'step numbers to run (default: all)')
    .option('-p, --plan', 'print the plan and exit')
    .option('--no-docker', 'run steps on the host and skip docker-only steps')
    .option('--bail', 'stop at the first failing step');
  sub.exitOverride();

  sub.action(async (stepsRaw: string[], flags: CiFlags) => {
    await withConfigErrors(async () => {
      const loaded = await loadConfig(process.cwd());
      const plan = planCi(loaded.ci, {
        docker: flags.docker !== false,
        only: parseStepNumbers(stepsRaw),
      });
      console.log(`${bold('ctxpack: ci plan')}\n${renderCiPlan(plan)}`);
      if (flags.plan) return EXIT_OK;

      const factory = docker ?? createDockerClient;
      const abort = new AbortController();
      const detach = attachSessionSignals(
        () => abort.abort(),
        () => undefined,
      );
      try {
        const outcome = await runCi(loaded.root, plan, {
          docker: factory(loaded.packager.dockerCommand),
          bail: flags.bail,
          signal: abort.signal,
        });
        const passed = outcome.results.filter((r) => r.ok).length;
        console.log(
          `ctxpack: ci ${outcome.ok ? 'passed' : 'failed'} (${String(passed)}/${String(plan.steps.length)} steps ok)`,
        );
        return abort.signal.aborted ? EXIT_INTERRUPTED : outcome.exitCode;
      } finally {
        detach();
      }
    });
  });
  return cli;
}
