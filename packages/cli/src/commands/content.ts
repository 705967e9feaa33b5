/**
 * mediagate content: Check a payload against its media type
 *
 * Usage:
 *   mediagate content text/plain 'hello'
 *   mediagate content image/png 89504e47
 *   mediagate content '' 'hello'        (empty media type means text/plain)
 *
 * Text types take the payload as UTF-8; every other type takes it as hex.
 * Prints each problem found and exits 2 when there is any.
 */

import { Command } from 'commander';
import { checkContent } from '@mediagate/kernel';
import { t } from '../output/theme.js';
import { buildRuntime } from '../runtime.js';
import type { GlobalOptions } from '../runtime.js';
import { EXIT_REJECTED, runCommand } from './run.js';

export const contentCommand = new Command('content')
  .description('Check that a payload can be stored under a media type')
  .argument('<media-type>', 'Media-type string; empty for text/plain')
  .argument('<content>', 'Payload: text for text types, hex otherwise')
  .option('--json', 'Output as JSON')
  .action((mediaType: string, content: string, options: { json?: boolean }, command: Command) => {
    runCommand('content', () => {
      const { registry } = buildRuntime(command.optsWithGlobals<GlobalOptions>());
      const problems = checkContent(mediaType, content, registry);

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ ok: problems.length === 0, problems }, null, 2));
      } else if (problems.length === 0) {
        // eslint-disable-next-line no-console
        console.log(t.green('ok'));
      } else {
        for (const problem of problems) {
          // eslint-disable-next-line no-console
          console.log(`${t.red('problem')}  ${problem}`);
        }
      }

      if (problems.length > 0) {
        process.exitCode = EXIT_REJECTED;
      }
    });
  });
