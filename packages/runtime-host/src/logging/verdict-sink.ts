/**
 * mediagate Runtime Host: File-backed Verdict Sink
 *
 * Implements the VerdictSink interface from @mediagate/kernel by appending
 * one JSONL line per verdict to `<home>/logs/verdicts.jsonl`.
 *
 * Synchronous: the line is written before append() returns.
 */

import type { VerdictLog, VerdictSink } from '@mediagate/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

/** Log file name under `<home>/logs/`. */
export const VERDICT_LOG_FILENAME = 'verdicts.jsonl';

export class FileVerdictSink implements VerdictSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: () => string = ulid,
  ) {}

  append(entry: VerdictLog): void {
    const line = JSON.stringify({
      event_id: this.nextId(),
      timestamp: entry.timestamp,
      input: entry.input,
      input_hash: entry.input_hash,
      registry_fingerprint: entry.registry_fingerprint,
      outcome: entry.outcome,
      canonical: entry.canonical,
      admission: entry.admission,
      reject_kind: entry.reject_kind,
      token: entry.token,
    });
    this.stateIO.appendLine(VERDICT_LOG_FILENAME, line);
  }
}
