/**
 * mediagate Runtime Host: Log Reader
 *
 * Pure functions for reading JSONL log files with dedupe-on-read.
 *
 * readLog() guarantees:
 *   - valid JSONL events are parsed; malformed lines are dropped and counted
 *   - events are deduplicated by event_id, first seen wins
 *   - a partial trailing line (content not ending in '\n') is dropped and flagged
 *   - more than one timestamp regression in file order is flagged as out of order
 *   - output is sorted by (timestamp asc, event_id asc)
 *
 * readVerdictLog() layers verdict-specific field checks on top.
 *
 * No I/O here. Callers obtain raw content via StateIO.readLogRaw().
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * A single parsed log event. Fields beyond event_id depend on the log file.
 */
export interface LogEvent {
  /** ULID, the deduplication key. */
  readonly event_id: string;
  /** ISO 8601 timestamp, used for ordering. */
  readonly timestamp?: string | undefined;
  readonly [key: string]: unknown;
}

/** Statistics about the raw file content. */
export interface LogReadStats {
  /** Non-empty lines processed. */
  totalLines: number;
  /** Events included in the output, after dedup. */
  parsedEvents: number;
  /** Events dropped because their event_id was already seen. */
  duplicates: number;
  /** Lines dropped for a JSON error, a missing event_id, or a bad field. */
  parseErrors: number;
  /** The content did not end with '\n'; the last line was dropped. */
  partialTrailingLine: boolean;
  /** More than one timestamp regression in file order. */
  outOfOrder: boolean;
}

export interface LogReadResult<E extends LogEvent = LogEvent> {
  /** Deduplicated, time-sorted events. */
  events: ReadonlyArray<E>;
  stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Generic JSONL reading
// ---------------------------------------------------------------------------

function toLogEvent(parsed: unknown): LogEvent | undefined {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return undefined;
  const record: Record<string, unknown> = { ...parsed };
  const eventId = record['event_id'];
  if (typeof eventId !== 'string') return undefined;
  const timestamp = record['timestamp'];
  if (timestamp !== undefined && typeof timestamp !== 'string') return undefined;
  return { ...record, event_id: eventId, timestamp };
}

function compareEvents(a: LogEvent, b: LogEvent): number {
  const ta = a.timestamp ?? '';
  const tb = b.timestamp ?? '';
  if (ta < tb) return -1;
  if (ta > tb) return 1;
  if (a.event_id < b.event_id) return -1;
  if (a.event_id > b.event_id) return 1;
  return 0;
}

/**
 * Parse, deduplicate, and sort a JSONL log file given its raw text.
 *
 * @param rawContent - Raw JSONL text of the log file
 * @returns Deduplicated, sorted events with collection statistics
 */
export function readLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');

  const rawLines = rawContent.split('\n');
  // A trailing '\n' leaves an empty last element; a partial line leaves an incomplete one.
  const lineList = rawLines.slice(0, -1).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const ordered: LogEvent[] = [];

  for (const line of lineList) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      // Malformed lines are counted, not fatal.
      parseErrors++;
      continue;
    }

    const event = toLogEvent(parsed);
    if (event === undefined) {
      parseErrors++;
      continue;
    }

    if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.add(event.event_id);
      ordered.push(event);
    }
  }

  // A single regression is tolerated (clock skew); more suggests reordering.
  let regressions = 0;
  let prev: string | undefined;
  for (const event of ordered) {
    if (prev !== undefined && event.timestamp !== undefined && event.timestamp < prev) {
      regressions++;
    }
    prev = event.timestamp ?? prev;
  }

  return {
    events: [...ordered].sort(compareEvents),
    stats: {
      totalLines: lineList.length,
      parsedEvents: ordered.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}

// ---------------------------------------------------------------------------
// Verdict log
// ---------------------------------------------------------------------------

/** One line of `verdicts.jsonl`, as read back from disk. */
export interface VerdictRecord extends LogEvent {
  readonly timestamp: string;
  readonly input: string;
  readonly input_hash: string;
  readonly registry_fingerprint: string;
  readonly outcome: 'accepted' | 'rejected';
  readonly canonical: string | null;
  readonly admission: string | null;
  readonly reject_kind: string | null;
  readonly token: string | null;
}

function stringOrNull(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isOutcome(value: unknown): value is 'accepted' | 'rejected' {
  return value === 'accepted' || value === 'rejected';
}

function toVerdictRecord(event: LogEvent): VerdictRecord | undefined {
  const { timestamp, input, input_hash, registry_fingerprint, outcome, canonical, admission, reject_kind, token } =
    event;
  if (
    typeof timestamp !== 'string' ||
    typeof input !== 'string' ||
    typeof input_hash !== 'string' ||
    typeof registry_fingerprint !== 'string' ||
    !isOutcome(outcome) ||
    !stringOrNull(canonical) ||
    !stringOrNull(admission) ||
    !stringOrNull(reject_kind) ||
    !stringOrNull(token)
  ) {
    return undefined;
  }
  return {
    event_id: event.event_id,
    timestamp,
    input,
    input_hash,
    registry_fingerprint,
    outcome,
    canonical,
    admission,
    reject_kind,
    token,
  };
}

/**
 * Read `verdicts.jsonl` content. Lines that parse as JSON but lack a verdict
 * field of the right type are counted as parse errors.
 */
export function readVerdictLog(rawContent: string): LogReadResult<VerdictRecord> {
  const { events, stats } = readLog(rawContent);
  const verdicts: VerdictRecord[] = [];
  let invalid = 0;
  for (const event of events) {
    const record = toVerdictRecord(event);
    if (record === undefined) {
      invalid++;
    } else {
      verdicts.push(record);
    }
  }
  return {
    events: verdicts,
    stats: {
      ...stats,
      parsedEvents: stats.parsedEvents - invalid,
      parseErrors: stats.parseErrors + invalid,
    },
  };
}

/** Filters for selecting verdict records. */
export interface VerdictFilter {
  readonly outcome?: 'accepted' | 'rejected' | undefined;
  /** Keep only the most recent `limit` records. */
  readonly limit?: number | undefined;
}

/** Apply a VerdictFilter to time-sorted records, keeping the sort order. */
export function filterVerdicts(
  records: ReadonlyArray<VerdictRecord>,
  filter: VerdictFilter,
): ReadonlyArray<VerdictRecord> {
  const matching =
    filter.outcome === undefined ? records : records.filter((r) => r.outcome === filter.outcome);
  if (filter.limit === undefined) return matching;
  return filter.limit <= 0 ? [] : matching.slice(-filter.limit);
}
