/**
 * mediagate Kernel: Error Types
 *
 * Thrown-error forms for callers that prefer exceptions over result unions.
 * The pure validation path never throws these; they are raised only by the
 * explicit require/replay wrappers and by registry construction.
 */

import type { RejectKind, RejectReason, ValidationError } from '@mediagate/media-type';

/**
 * A media type was rejected at the request boundary.
 *
 * Carries the typed reason so the request layer can name the offending
 * token in its client-facing response.
 */
export class MediaTypeRejectedError extends Error {
  readonly kind: RejectKind;
  readonly token: string;

  constructor(
    readonly input: string,
    readonly reason: RejectReason,
  ) {
    super(`Rejected media type ${JSON.stringify(input)}: ${reason.message}`);
    this.name = 'MediaTypeRejectedError';
    this.kind = reason.kind;
    this.token = reason.token;
  }
}

/**
 * A media type taken from already-embedded chain data was rejected on replay.
 *
 * This is never a recoverable condition. Data that reached the chain was
 * accepted when it was first processed; a rejection now means validation
 * or canonicalization has drifted from history and the node's digests can
 * no longer be trusted.
 */
export class ReplayDivergenceError extends Error {
  constructor(
    readonly input: string,
    readonly reason: RejectReason,
  ) {
    super(
      `Replay divergence: previously accepted media type ${JSON.stringify(input)} ` +
        `is now rejected (${reason.kind}: ${reason.message})`,
    );
    this.name = 'ReplayDivergenceError';
  }
}

/**
 * Registry data is malformed. Raised at construction time, before any
 * validation runs against the table.
 */
export class RegistryError extends Error {
  constructor(readonly errors: ReadonlyArray<ValidationError>) {
    super(
      `Invalid media type registry (${errors.length} error${errors.length === 1 ? '' : 's'}): ` +
        errors.map((e) => (e.context !== undefined ? `${e.context}: ${e.message}` : e.message)).join('; '),
    );
    this.name = 'RegistryError';
  }
}
