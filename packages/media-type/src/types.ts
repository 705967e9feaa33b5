/**
 * mediagate Media Type: Core Type Definitions
 *
 * This module defines the parsed media-type model, the rejection taxonomy,
 * and the result unions shared by the tokenizer, the canonical serializer,
 * and the kernel.
 *
 * These types are the base layer of the mediagate type system. The kernel
 * depends on this package; this package has no internal dependencies.
 */

// ---------------------------------------------------------------------------
// Limits
// ---------------------------------------------------------------------------

/**
 * Maximum accepted input length, in UTF-8 bytes.
 *
 * Longer input is rejected before any parsing work. This bounds the cost
 * of a single validation call.
 */
export const MAX_MEDIA_TYPE_BYTES = 255;

// ---------------------------------------------------------------------------
// Rejection Taxonomy
// ---------------------------------------------------------------------------

/**
 * Every reason a media-type string can be rejected.
 *
 * All kinds are terminal: validation is a pure function of its input, so
 * re-invocation never changes the outcome.
 */
export enum RejectKind {
  /** Input exceeds MAX_MEDIA_TYPE_BYTES. Checked before parsing. */
  TooLong = 'TooLong',
  /** Malformed grammar. The accompanying ParseErrorCode names the defect. */
  ParseError = 'ParseError',
  /** The same parameter name appears more than once (case-insensitive). */
  DuplicateParameter = 'DuplicateParameter',
  /** Parameters were supplied for a type/subtype with no registry entry. */
  UnregisteredTypeWithParameters = 'UnregisteredTypeWithParameters',
  /** A parameter name is not in the registry entry's allow-list. */
  DisallowedParameter = 'DisallowedParameter',
  /** A parameter value fails its registry constraint. */
  InvalidParameterValue = 'InvalidParameterValue',
}

/**
 * The specific grammar defect behind a RejectKind.ParseError.
 */
export enum ParseErrorCode {
  /** No `/` between type and subtype. */
  MissingSeparator = 'MissingSeparator',
  /** Nothing before the `/`. */
  EmptyType = 'EmptyType',
  /** Nothing after the `/`. */
  EmptySubtype = 'EmptySubtype',
  /** A character outside the token alphabet where a token is required. */
  IllegalCharacter = 'IllegalCharacter',
  /** A quoted value with no closing `"`. */
  UnterminatedQuote = 'UnterminatedQuote',
  /** A backslash inside a quoted value followed by something other than `"` or `\`. */
  InvalidEscape = 'InvalidEscape',
  /** A parameter with no `=` or with nothing after it. */
  MissingParameterValue = 'MissingParameterValue',
  /** A `;` with no parameter after it. */
  EmptyParameter = 'EmptyParameter',
}

/**
 * A typed rejection. `token` names the offending piece of input so the
 * request layer can surface it to the client.
 */
export type RejectReason =
  | {
      readonly kind: RejectKind.ParseError;
      readonly code: ParseErrorCode;
      readonly message: string;
      readonly token: string;
      /** Zero-based character offset into the raw input. */
      readonly position: number;
    }
  | {
      readonly kind: Exclude<RejectKind, RejectKind.ParseError>;
      readonly message: string;
      readonly token: string;
    };

// ---------------------------------------------------------------------------
// Parsed Model
// ---------------------------------------------------------------------------

/**
 * A single `name=value` parameter.
 *
 * `name` is stored ASCII-lowercased. `value` is the unquoted, unescaped
 * value exactly as supplied; case folding of values is a registry policy
 * decision, not a tokenizer one.
 */
export interface MediaTypeParameter {
  readonly name: string;
  readonly value: string;
  /** Whether the value appeared as a quoted string in the input. */
  readonly quoted: boolean;
}

/**
 * A tokenized media type.
 *
 * `type` and `subtype` are ASCII-lowercased. Parameters keep their order of
 * appearance and are unique by name.
 */
export interface ParsedMediaType {
  readonly type: string;
  readonly subtype: string;
  readonly parameters: ReadonlyArray<MediaTypeParameter>;
}

/**
 * The canonical serialization of an accepted media type.
 *
 * Branded so that only the canonical serializer can produce one; a plain
 * string cannot be passed where agreed-upon bytes are required.
 */
export type CanonicalMediaType = string & { readonly __brand: 'CanonicalMediaType' };

// ---------------------------------------------------------------------------
// Result Types
// ---------------------------------------------------------------------------

/**
 * Result of tokenizing a raw media-type string.
 *
 * `parsed: null` is the distinguished "no media type declared" outcome
 * for the empty string.
 */
export type TokenizeResult =
  | { readonly ok: true; readonly parsed: ParsedMediaType | null }
  | { readonly ok: false; readonly reason: RejectReason };

/**
 * A structural validation error for data that is not a media type itself
 * (registry documents, constraint tables).
 */
export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value (structural validation only)
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
