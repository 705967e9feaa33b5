/**
 * commands/index.ts: Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/mediagate.ts   (the `mediagate` executable)
 *   src/index.ts           (library entry for embedding and tests)
 */

import { program } from 'commander'
import { validateCommand } from './validate.js'
import { registryCommand } from './registry.js'
import { classifyCommand } from './classify.js'
import { contentCommand } from './content.js'
import { logCommand } from './log.js'

program
  .name('mediagate')
  .description(
    'mediagate: media-type validation gate.\n' +
    'Accepts or rejects media-type strings against a fixed registry and\n' +
    'prints the canonical form every node agrees on.',
  )
  .version('0.1.0')
  .option('--home <dir>', 'Home directory (default: $MEDIAGATE_HOME or ~/.mediagate)')
  .option('--registry <file>', 'Registry document to use instead of the built-in table')
  .option('--no-log', 'Do not record verdicts in the verdict log')

program.addCommand(validateCommand)
program.addCommand(registryCommand)
program.addCommand(classifyCommand)
program.addCommand(contentCommand)
program.addCommand(logCommand)

export { program }
