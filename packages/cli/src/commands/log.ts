/**
 * mediagate log: Query the verdict log
 *
 * Reads `<home>/logs/verdicts.jsonl`, oldest first. Every gated validation
 * is recorded regardless of outcome, so the log answers "what did this node
 * accept, and under which registry fingerprint".
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  FileStateIO,
  VERDICT_LOG_FILENAME,
  filterVerdicts,
  readVerdictLog,
  resolveMediagateHome,
} from '@mediagate/runtime-host';
import { formatVerdictRecord } from '../output/format.js';
import { t } from '../output/theme.js';
import type { GlobalOptions } from '../runtime.js';
import { runCommand } from './run.js';

type Outcome = 'accepted' | 'rejected';

function parseOutcome(value: string): Outcome {
  if (value === 'accepted' || value === 'rejected') return value;
  throw new InvalidArgumentError('Expected "accepted" or "rejected".');
}

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

export const logCommand = new Command('log')
  .description('Query the verdict log')
  .option('--outcome <outcome>', 'Filter by outcome (accepted|rejected)', parseOutcome)
  .option('--limit <n>', 'Show only the most recent n entries', parseLimit, 100)
  .option('--json', 'Output as JSON')
  .action((options: { outcome?: Outcome; limit: number; json?: boolean }, command: Command) => {
    runCommand('log', () => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const home = resolveMediagateHome({ home: globals.home });
      const raw = new FileStateIO(home).readLogRaw(VERDICT_LOG_FILENAME);
      const { events, stats } = readVerdictLog(raw);
      const records = filterVerdicts(events, { outcome: options.outcome, limit: options.limit });

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ entries: records, stats }, null, 2));
        return;
      }

      if (records.length === 0) {
        // eslint-disable-next-line no-console
        console.log(t.muted('  (no entries)'));
      }
      for (const record of records) {
        // eslint-disable-next-line no-console
        console.log(formatVerdictRecord(record));
      }
      if (stats.parseErrors > 0 || stats.partialTrailingLine) {
        // eslint-disable-next-line no-console
        console.error(
          t.amber(`[mediagate log] skipped ${stats.parseErrors} unreadable line(s)` +
            (stats.partialTrailingLine ? ', trailing line incomplete' : '')),
        );
      }
    });
  });
