/* src/runner/util/color.ts
 * Console styling by meaning. Plain text under CTXPACK_BORING=1, NO_COLOR=1,
 * FORCE_COLOR=0, or when stdout is not a terminal.
 */
import chalk, { type ChalkInstance } from 'chalk';

// Read on every call: tests and the -b flag set these after import.
export const isBoring = (): boolean => {
  const env = process.env;
  if (env.CTXPACK_BORING === '1' || env.NO_COLOR === '1') return true;
  if (env.FORCE_COLOR === '0') return true;
  return !process.stdout.isTTY;
};

const styled =
  (style: ChalkInstance) =>
  (s: string): string =>
    isBoring() ? s : style(s);

/** success */
export const ok = styled(chalk.green);
/** names: phases, paths, tags */
export const alert = styled(chalk.cyan);
export const error = styled(chalk.red);
export const warn = styled(chalk.hex('#FFA500'));
export const bold = styled(chalk.bold);
