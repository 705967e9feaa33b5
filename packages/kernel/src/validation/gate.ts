/**
 * mediagate Kernel: Validation Gate
 *
 * The single entry point that decides whether a submitted media-type string
 * is acceptable and, if so, produces the bytes every node must agree on.
 *
 *   raw → tokenize → evaluatePolicy → canonicalize → Verdict
 *
 * The first failing stage short-circuits with its own reason. There is no
 * hidden state: the registry is an explicit argument, and the same input
 * and registry always produce the same verdict.
 *
 * Three call shapes share the one validate() function:
 * - validate(): result union, for callers that branch on the outcome
 * - requireValidMediaType(): throws MediaTypeRejectedError, for the request layer
 * - validateForReplay(): throws ReplayDivergenceError, for the chain indexer
 *
 * MediaTypeGate adds the audit trail: one VerdictLog entry per call.
 */

import { createHash } from 'node:crypto';
import { canonicalize, tokenize } from '@mediagate/media-type';
import type { CanonicalMediaType } from '@mediagate/media-type';
import type { MediaTypeRegistry, RegistryFingerprint } from '../types/registry.js';
import type { UndeclaredMediaType, Verdict, VerdictLog } from '../types/verdict.js';
import { Admission } from '../types/verdict.js';
import type { VerdictSink } from '../logging/verdict-sink.js';
import { VerdictLogger } from '../logging/verdict-log.js';
import { evaluatePolicy } from '../policy/evaluator.js';
import { DEFAULT_REGISTRY } from '../registry/default-table.js';
import { registryFingerprint } from '../registry/fingerprint.js';
import { MediaTypeRejectedError, ReplayDivergenceError } from '../errors.js';

const UNDECLARED: UndeclaredMediaType = Object.freeze({
  ok: true,
  canonical: null,
  admission: Admission.Undeclared,
});

// ---------------------------------------------------------------------------
// Pure entry points
// ---------------------------------------------------------------------------

/**
 * Validate and canonicalize a raw media-type string.
 *
 * Never throws and never logs.
 *
 * @param raw - The media-type string exactly as submitted
 * @param registry - Registry to evaluate against; DEFAULT_REGISTRY when omitted
 *
 * @example
 * validate('audio/ogg;codecs=OPUS')
 * // { ok: true, canonical: 'audio/ogg;codecs=opus', admission: 'registry' }
 * validate('')
 * // { ok: true, canonical: null, admission: 'undeclared' }
 */
export function validate(raw: string, registry: MediaTypeRegistry = DEFAULT_REGISTRY): Verdict {
  const tokenized = tokenize(raw);
  if (!tokenized.ok) {
    return { ok: false, reason: tokenized.reason };
  }
  if (tokenized.parsed === null) {
    return UNDECLARED;
  }

  const policy = evaluatePolicy(tokenized.parsed, registry);
  if (!policy.ok) {
    return { ok: false, reason: policy.reason };
  }

  return { ok: true, canonical: canonicalize(policy.value), admission: policy.admission };
}

/**
 * Validate at the request boundary.
 *
 * @returns The canonical form, or null when no media type was declared
 * @throws {MediaTypeRejectedError} When the input is rejected
 */
export function requireValidMediaType(
  raw: string,
  registry: MediaTypeRegistry = DEFAULT_REGISTRY,
): CanonicalMediaType | null {
  const verdict = validate(raw, registry);
  if (!verdict.ok) {
    throw new MediaTypeRejectedError(raw, verdict.reason);
  }
  return verdict.canonical;
}

/**
 * Re-validate a media type taken from already-embedded chain data.
 *
 * A rejection here is a compatibility bug, not bad input.
 *
 * @returns The canonical form, or null when no media type was declared
 * @throws {ReplayDivergenceError} When historically accepted input is now rejected
 */
export function validateForReplay(
  raw: string,
  registry: MediaTypeRegistry = DEFAULT_REGISTRY,
): CanonicalMediaType | null {
  const verdict = validate(raw, registry);
  if (!verdict.ok) {
    throw new ReplayDivergenceError(raw, verdict.reason);
  }
  return verdict.canonical;
}

// ---------------------------------------------------------------------------
// Audited gate
// ---------------------------------------------------------------------------

/**
 * validate() with a verdict log.
 *
 * Every call records exactly one VerdictLog entry, whatever the outcome,
 * before returning the verdict unchanged. The registry fingerprint is
 * computed once at construction.
 *
 * The clock is injectable so tests get deterministic timestamps.
 */
export class MediaTypeGate {
  private readonly logger: VerdictLogger;
  readonly fingerprint: RegistryFingerprint;

  constructor(
    readonly registry: MediaTypeRegistry = DEFAULT_REGISTRY,
    sink?: VerdictSink,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.logger = new VerdictLogger(sink);
    this.fingerprint = registryFingerprint(registry);
  }

  /**
   * Validate a raw media-type string and record the verdict.
   *
   * @param raw - The media-type string exactly as submitted
   * @returns The same Verdict validate() would return
   */
  validate(raw: string): Verdict {
    const verdict = validate(raw, this.registry);

    const entry: VerdictLog = verdict.ok
      ? {
          input: raw,
          input_hash: computeInputHash(raw),
          registry_fingerprint: this.fingerprint,
          outcome: 'accepted',
          canonical: verdict.canonical,
          admission: verdict.admission,
          reject_kind: null,
          token: null,
          timestamp: this.clock().toISOString(),
        }
      : {
          input: raw,
          input_hash: computeInputHash(raw),
          registry_fingerprint: this.fingerprint,
          outcome: 'rejected',
          canonical: null,
          admission: null,
          reject_kind: verdict.reason.kind,
          token: verdict.reason.token,
          timestamp: this.clock().toISOString(),
        };

    this.logger.record(entry);
    return verdict;
  }
}

/**
 * SHA-256 hex of the raw input's UTF-8 bytes, for verdict log attribution.
 *
 * @internal
 */
export function computeInputHash(raw: string): string {
  return createHash('sha256').update(raw, 'utf8').digest('hex');
}
