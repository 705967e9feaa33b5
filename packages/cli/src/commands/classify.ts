/**
 * mediagate classify: Report whether a media type carries text or binary content
 *
 * Usage:
 *   mediagate classify text/html      → text
 *   mediagate classify image/png      → binary
 *
 * The input is validated first; a rejected type has no class and exits 2.
 * The empty string classifies as the default content type.
 */

import { Command } from 'commander';
import { DEFAULT_CONTENT_MEDIA_TYPE, classifyMediaType } from '@mediagate/kernel';
import { formatVerdict } from '../output/format.js';
import { t } from '../output/theme.js';
import { buildRuntime } from '../runtime.js';
import type { GlobalOptions } from '../runtime.js';
import { EXIT_REJECTED, runCommand } from './run.js';

export const classifyCommand = new Command('classify')
  .description('Classify a media type as text or binary content')
  .argument('<media-type>', 'Media-type string, exactly as submitted')
  .option('--json', 'Output as JSON')
  .action((input: string, options: { json?: boolean }, command: Command) => {
    runCommand('classify', () => {
      const { gate } = buildRuntime(command.optsWithGlobals<GlobalOptions>());
      const verdict = gate.validate(input);

      if (!verdict.ok) {
        // eslint-disable-next-line no-console
        console.log(formatVerdict(input, verdict));
        process.exitCode = EXIT_REJECTED;
        return;
      }

      const mediaType = verdict.canonical ?? DEFAULT_CONTENT_MEDIA_TYPE;
      const contentClass = classifyMediaType(mediaType);

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ input, media_type: mediaType, class: contentClass }, null, 2));
        return;
      }
      // eslint-disable-next-line no-console
      console.log(`${t.white(mediaType)}  ${t.blue(contentClass)}`);
    });
  });
