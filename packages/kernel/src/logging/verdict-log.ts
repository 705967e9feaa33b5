/**
 * mediagate Kernel: Verdict Logger
 *
 * Forwards verdict log entries to an injected sink.
 *
 * Every gated validation produces exactly one entry, accepted or rejected.
 * Given `input` and `registry_fingerprint`, the verdict in an entry must be
 * reproducible on any node.
 *
 * If no sink is injected (tests, embedded use), record() is a no-op.
 */

import type { VerdictLog } from '../types/verdict.js';
import type { VerdictSink } from './verdict-sink.js';

export class VerdictLogger {
  constructor(private readonly sink?: VerdictSink) {}

  /** Record a verdict log entry. Called once per gated validation. */
  record(entry: VerdictLog): void {
    this.sink?.append(entry);
  }
}
