/**
 * output/format.ts: Pure text and JSON renderers for CLI output.
 *
 * Every function returns strings; the commands decide where they go.
 * Colors come from the theme and disappear when chalk's level is 0.
 */

import { RejectKind } from '@mediagate/media-type';
import type { RejectReason, ValidationError } from '@mediagate/media-type';
import type { MediaTypeRegistry, RegistryEntry, ValueConstraint, Verdict } from '@mediagate/kernel';
import type { VerdictRecord } from '@mediagate/runtime-host';
import { admissionColor, outcomeColor, t } from './theme.js';

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

/** `--json` shape of one validate result. Field names follow the verdict log. */
export interface VerdictJson {
  readonly input: string;
  readonly outcome: 'accepted' | 'rejected';
  readonly canonical: string | null;
  readonly admission: string | null;
  readonly reject_kind: string | null;
  readonly token: string | null;
  readonly message: string | null;
}

/** `DisallowedParameter`, or `ParseError(MissingSeparator)` for grammar defects. */
export function describeReason(reason: RejectReason): string {
  const label = reason.kind === RejectKind.ParseError ? `${reason.kind}(${reason.code})` : reason.kind;
  return `${label}: ${reason.message}`;
}

/**
 * One line per input:
 *
 *   accepted  audio/ogg;codecs=opus  registry
 *   rejected  "video/mp4;foo=bar"  DisallowedParameter: Parameter "foo" is ...
 */
export function formatVerdict(input: string, verdict: Verdict): string {
  if (!verdict.ok) {
    return [
      outcomeColor('rejected')('rejected'),
      JSON.stringify(input),
      t.text(describeReason(verdict.reason)),
    ].join('  ');
  }
  return [
    outcomeColor('accepted')('accepted'),
    verdict.canonical === null ? t.muted('(none)') : t.white(verdict.canonical),
    admissionColor(verdict.admission)(verdict.admission),
  ].join('  ');
}

export function verdictToJson(input: string, verdict: Verdict): VerdictJson {
  if (!verdict.ok) {
    return {
      input,
      outcome: 'rejected',
      canonical: null,
      admission: null,
      reject_kind: verdict.reason.kind,
      token: verdict.reason.token,
      message: verdict.reason.message,
    };
  }
  return {
    input,
    outcome: 'accepted',
    canonical: verdict.canonical,
    admission: verdict.admission,
    reject_kind: null,
    token: null,
    message: null,
  };
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export function formatConstraint(constraint: ValueConstraint): string {
  let text: string;
  switch (constraint.kind) {
    case 'exact':
      text = `= ${constraint.value}`;
      break;
    case 'enum':
      text = `one of ${constraint.values.join(', ')}`;
      break;
    case 'token':
      text = 'any token';
      break;
  }
  return constraint.caseInsensitive ? `${text} (case-insensitive)` : text;
}

/**
 * An entry and its parameter policy:
 *
 *   audio/ogg  Ogg audio
 *     codecs  one of opus (case-insensitive)
 */
export function formatRegistryEntry(entry: RegistryEntry): string[] {
  const head = entry.description === null
    ? `  ${t.white(entry.key)}`
    : `  ${t.white(entry.key)}  ${t.muted(entry.description)}`;

  const params = Object.entries(entry.parameters);
  if (params.length === 0) {
    return [head, `    ${t.muted('(no parameters)')}`];
  }
  return [head, ...params.map(([name, constraint]) => `    ${t.blue(name)}  ${formatConstraint(constraint)}`)];
}

export function registryToJson(registry: MediaTypeRegistry, fingerprint: string): unknown {
  return {
    fingerprint,
    entries: registry.entries().map((e) => ({
      key: e.key,
      description: e.description,
      parameters: e.parameters,
    })),
  };
}

export function formatValidationErrors(errors: ReadonlyArray<ValidationError>): string[] {
  return errors.map((e) =>
    e.context !== undefined ? `  ${t.muted(e.context)}  ${e.message}` : `  ${e.message}`,
  );
}

// ---------------------------------------------------------------------------
// Verdict log
// ---------------------------------------------------------------------------

/**
 *   2026-01-01T00:00:00.000Z  accepted  "audio/ogg"  audio/ogg
 *   2026-01-01T00:00:01.000Z  rejected  "x"  ParseError at "x"
 */
export function formatVerdictRecord(record: VerdictRecord): string {
  const detail = record.outcome === 'accepted'
    ? record.canonical ?? '(none)'
    : `${record.reject_kind ?? 'unknown'} at ${JSON.stringify(record.token ?? '')}`;
  return [
    t.muted(record.timestamp),
    outcomeColor(record.outcome)(record.outcome),
    JSON.stringify(record.input),
    detail,
  ].join('  ');
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
