/**
 * mediagate Runtime Host: Home Directory Resolution
 *
 * Resolves the mediagate home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. MEDIAGATE_HOME environment variable
 *   3. Default: ~/.mediagate
 *
 * Layout under the resolved home:
 *
 *   <MEDIAGATE_HOME>/
 *     config.json        optional node configuration
 *     logs/
 *       verdicts.jsonl   audited validation verdicts
 *
 * Resolution does not touch the filesystem. Directories are created on
 * demand by FileStateIO when something is written.
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/** Environment variable naming the home directory. */
export const HOME_ENV_VAR = 'MEDIAGATE_HOME';

/** Directory name used under the user's home when nothing else is set. */
export const DEFAULT_HOME_DIRNAME = '.mediagate';

/**
 * Options for home resolution.
 */
export interface ResolveHomeOptions {
  /**
   * Explicit override, highest precedence.
   * Typically supplied by the --home CLI flag.
   */
  readonly home?: string | undefined;
  /** Environment to consult. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Resolve the mediagate home directory.
 *
 * Empty strings are treated as unset at every level.
 *
 * @returns The absolute path to the resolved home directory
 */
export function resolveMediagateHome(opts?: ResolveHomeOptions): string {
  const env = opts?.env ?? process.env;

  if (typeof opts?.home === 'string' && opts.home !== '') {
    return resolve(opts.home);
  }

  const fromEnv = env[HOME_ENV_VAR];
  if (typeof fromEnv === 'string' && fromEnv !== '') {
    return resolve(fromEnv);
  }

  return join(homedir(), DEFAULT_HOME_DIRNAME);
}
