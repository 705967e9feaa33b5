/**
 * mediagate Kernel: Verdict Types
 *
 * Defines the outcome of a validation call and the verdict log entry
 * structure.
 *
 * A verdict is a pure function of (raw input, registry). The log entry
 * adds only attribution: when the call happened and which registry
 * fingerprint produced it.
 */

import type { CanonicalMediaType, ParsedMediaType, RejectKind, RejectReason } from '@mediagate/media-type';
import type { RegistryFingerprint } from './registry.js';

// ---------------------------------------------------------------------------
// Admission
// ---------------------------------------------------------------------------

/**
 * How an accepted media type got through the policy evaluator.
 */
export enum Admission {
  /** Matched a registry entry (with or without parameters). */
  Registry = 'registry',
  /**
   * Parameter-free and not in the registry. Admitted by the legacy rule
   * that keeps every historically accepted bare type/subtype valid.
   */
  Passthrough = 'passthrough',
  /** The empty string: no media type declared. */
  Undeclared = 'undeclared',
}

// ---------------------------------------------------------------------------
// Policy Result
// ---------------------------------------------------------------------------

/**
 * Result of evaluating a parsed media type against the registry.
 *
 * On success, `value` carries the parameters with values folded per their
 * constraints, ready for canonicalization.
 */
export type PolicyResult =
  | {
      readonly ok: true;
      readonly value: ParsedMediaType;
      readonly admission: Admission.Registry | Admission.Passthrough;
    }
  | { readonly ok: false; readonly reason: RejectReason };

// ---------------------------------------------------------------------------
// Verdict
// ---------------------------------------------------------------------------

/** An accepted media type with its canonical bytes. */
export interface AcceptedMediaType {
  readonly ok: true;
  readonly canonical: CanonicalMediaType;
  readonly admission: Admission.Registry | Admission.Passthrough;
}

/** The empty input: accepted, with no media type to embed. */
export interface UndeclaredMediaType {
  readonly ok: true;
  readonly canonical: null;
  readonly admission: Admission.Undeclared;
}

/** A rejected input and the stage-specific reason. */
export interface RejectedMediaType {
  readonly ok: false;
  readonly reason: RejectReason;
}

/**
 * The result of validate().
 *
 * `canonical` is the value handed to the metadata-storage layer; `null` is
 * the "no type" sentinel.
 */
export type Verdict = AcceptedMediaType | UndeclaredMediaType | RejectedMediaType;

// ---------------------------------------------------------------------------
// Verdict Log Entry
// ---------------------------------------------------------------------------

/**
 * A structured log entry for a single gated validation.
 *
 * Given `input` and `registry_fingerprint`, the verdict must be
 * reproducible on any node.
 */
export interface VerdictLog {
  /** The raw input exactly as received. */
  readonly input: string;
  /** SHA-256 hex of the raw input's UTF-8 bytes. */
  readonly input_hash: string;
  /** Fingerprint of the registry the verdict was reached under. */
  readonly registry_fingerprint: RegistryFingerprint;
  readonly outcome: 'accepted' | 'rejected';
  /** Canonical form when accepted; null when undeclared or rejected. */
  readonly canonical: string | null;
  /** Admission path when accepted; null when rejected. */
  readonly admission: Admission | null;
  /** Rejection kind when rejected; null when accepted. */
  readonly reject_kind: RejectKind | null;
  /** Offending token when rejected; null when accepted. */
  readonly token: string | null;
  /** ISO 8601 timestamp of the call. */
  readonly timestamp: string;
}
