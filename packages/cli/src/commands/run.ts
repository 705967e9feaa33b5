/**
 * commands/run.ts: Command boundary.
 *
 * Exit codes:
 *   0  success
 *   1  error (bad configuration, unreadable registry, I/O failure)
 *   2  the command ran and something was rejected
 */

import { formatError } from '../output/format.js';
import { t } from '../output/theme.js';

export const EXIT_ERROR = 1;
export const EXIT_REJECTED = 2;

/**
 * Run a command body. Any thrown error is printed in red under the
 * command's label and sets the error exit code; nothing is rethrown.
 */
export function runCommand(label: string, body: () => void): void {
  try {
    body();
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(t.red(`[mediagate ${label}] ${formatError(err)}`));
    process.exitCode = EXIT_ERROR;
  }
}
