/**
 * mediagate Kernel: Registry Fingerprint
 *
 * SHA-256 over the canonical JSON of a registry's entries. Operators compare
 * fingerprints to confirm that two nodes hold the same table.
 *
 * Only the fields that influence a verdict are hashed: the key and the
 * parameter policy. Descriptions are excluded.
 */

import { createHash } from 'node:crypto';
import type { MediaTypeRegistry, RegistryFingerprint, ValueConstraint } from '../types/registry.js';

// ---------------------------------------------------------------------------
// Internal: Canonical JSON for deterministic hashing
// ---------------------------------------------------------------------------

type CanonicalValue =
  | string
  | boolean
  | null
  | CanonicalValue[]
  | { readonly [key: string]: CanonicalValue };

/**
 * Produces a JSON string with object keys sorted at every level, so that
 * property insertion order never reaches the hash.
 *
 * @internal
 */
export function canonicalJson(value: CanonicalValue): string {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalJson).join(',') + ']';
  }
  const pairs = Object.keys(value)
    .sort()
    .map((k) => {
      const v = value[k];
      return `${JSON.stringify(k)}:${v === undefined ? 'null' : canonicalJson(v)}`;
    });
  return '{' + pairs.join(',') + '}';
}

function constraintValue(constraint: ValueConstraint): CanonicalValue {
  switch (constraint.kind) {
    case 'exact':
      return { kind: 'exact', value: constraint.value, case_insensitive: constraint.caseInsensitive };
    case 'enum':
      return { kind: 'enum', values: [...constraint.values], case_insensitive: constraint.caseInsensitive };
    case 'token':
      return { kind: 'token', case_insensitive: constraint.caseInsensitive };
  }
}

// ---------------------------------------------------------------------------
// Fingerprint
// ---------------------------------------------------------------------------

/**
 * Compute the fingerprint of a built registry.
 *
 * Entries are already sorted by key and their constraint values already
 * folded, so two tables that differ only in ordering or in the case of
 * case-insensitive values share a fingerprint.
 *
 * @example
 * registryFingerprint(DEFAULT_REGISTRY) // 64 lowercase hex characters
 */
export function registryFingerprint(registry: MediaTypeRegistry): RegistryFingerprint {
  const entries: CanonicalValue[] = registry.entries().map((entry) => {
    const parameters: Record<string, CanonicalValue> = {};
    for (const [name, constraint] of Object.entries(entry.parameters)) {
      parameters[name] = constraintValue(constraint);
    }
    return { key: entry.key, parameters };
  });
  const hex = createHash('sha256').update(canonicalJson(entries)).digest('hex');
  // Type assertion is the authorized path for producing a RegistryFingerprint.
  return hex as RegistryFingerprint;
}
