// src/cli/bin/ctxpack.ts
// CLI bootstrap (executes the parser). Kept apart from src/cli/index.ts so the
// factory stays import-safe for tests.
import { CommanderError } from 'commander';

import { makeCli } from '..';

makeCli()
  .parseAsync()
  .catch((e: unknown) => {
    if (e instanceof CommanderError) {
      // help/version land here with exitCode 0
      process.exitCode = e.exitCode;
      return;
    }
    console.error(e);
    process.exitCode = 1;
  });
