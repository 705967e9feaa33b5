/**
 * mediagate validate: Validate and canonicalize media types
 *
 * Usage:
 *   mediagate validate 'audio/ogg; codecs=OPUS' video/webm
 *   mediagate validate --json 'text/plain;charset=utf-8'
 *
 * Each input goes through the audited gate, so every verdict is recorded
 * in the verdict log unless --no-log is given. Exits 2 when any input is
 * rejected.
 */

import { Command } from 'commander';
import type { Verdict } from '@mediagate/kernel';
import { formatVerdict, verdictToJson } from '../output/format.js';
import { buildRuntime } from '../runtime.js';
import type { GlobalOptions } from '../runtime.js';
import { EXIT_REJECTED, runCommand } from './run.js';

export const validateCommand = new Command('validate')
  .description('Validate media types and print their canonical form')
  .argument('<media-type...>', 'Media-type strings, exactly as submitted')
  .option('--json', 'Output as JSON')
  .action((inputs: string[], options: { json?: boolean }, command: Command) => {
    runCommand('validate', () => {
      const { gate } = buildRuntime(command.optsWithGlobals<GlobalOptions>());
      const results: Array<{ input: string; verdict: Verdict }> = inputs.map((input) => ({
        input,
        verdict: gate.validate(input),
      }));

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(results.map((r) => verdictToJson(r.input, r.verdict)), null, 2));
      } else {
        for (const r of results) {
          // eslint-disable-next-line no-console
          console.log(formatVerdict(r.input, r.verdict));
        }
      }

      if (results.some((r) => !r.verdict.ok)) {
        process.exitCode = EXIT_REJECTED;
      }
    });
  });
