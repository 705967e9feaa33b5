/**
 * mediagate Kernel: Registry Types
 *
 * Defines the Type Registry: the immutable table of known type/subtype
 * pairs and, for each, the parameters permitted when parameters are present.
 *
 * The table is the single place that encodes which media types the
 * embedding pipeline treats as meaningful. It is reviewed as data, not as
 * conditional logic scattered through the evaluator.
 */

// ---------------------------------------------------------------------------
// Value Constraints
// ---------------------------------------------------------------------------

/**
 * The accepted-value constraint for one parameter.
 *
 * `caseInsensitive` is declared per constraint, never inferred. When true,
 * the supplied value is ASCII-lowercased before comparison and the
 * lowercased form is what gets canonicalized. When false, comparison and
 * canonical output are byte-for-byte.
 */
export type ValueConstraint =
  | { readonly kind: 'exact'; readonly value: string; readonly caseInsensitive: boolean }
  | {
      readonly kind: 'enum';
      readonly values: ReadonlyArray<string>;
      readonly caseInsensitive: boolean;
    }
  /** Any value that is a bare token (quoted or not in the input). */
  | { readonly kind: 'token'; readonly caseInsensitive: boolean };

/** Allowed parameter name (lowercase) → constraint on its value. */
export type ParameterPolicy = Readonly<Record<string, ValueConstraint>>;

// ---------------------------------------------------------------------------
// Registry Entries
// ---------------------------------------------------------------------------

/**
 * Author-facing form of a registry entry, as written in the static table
 * or a registry document. Names may use any case; buildRegistry() folds them.
 */
export interface RegistryEntryInit {
  readonly type: string;
  readonly subtype: string;
  readonly parameters: ParameterPolicy;
  readonly description?: string | undefined;
}

/**
 * A frozen registry entry keyed by its lowercase `type/subtype`.
 *
 * An entry with an empty parameter policy admits the type only in its
 * parameter-free form.
 */
export interface RegistryEntry {
  /** Lowercase `type/subtype`. */
  readonly key: string;
  readonly type: string;
  readonly subtype: string;
  readonly parameters: ParameterPolicy;
  readonly description: string | null;
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/**
 * Opaque brand symbol for RegistryFingerprint.
 * Prevents plain strings from being used as registry fingerprints.
 */
declare const __registryFingerprintBrand: unique symbol;

/**
 * SHA-256 over the canonical JSON of a registry's sorted entries.
 *
 * Two nodes with the same fingerprint hold the same table and therefore
 * reach the same verdict for every input.
 */
export type RegistryFingerprint = string & {
  readonly [__registryFingerprintBrand]: 'RegistryFingerprint';
};

/**
 * Read-only view of a built registry.
 *
 * Implementations are frozen after construction and safe to share between
 * any number of concurrent callers without coordination.
 */
export interface MediaTypeRegistry {
  /** Look up a type/subtype pair. Arguments are compared case-insensitively. */
  lookup(type: string, subtype: string): RegistryEntry | undefined;
  /** All entries, sorted by key. */
  entries(): ReadonlyArray<RegistryEntry>;
  /** Number of entries. */
  readonly size: number;
}
