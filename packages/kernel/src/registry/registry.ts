/**
 * mediagate Kernel: Type Registry
 *
 * Builds the immutable media type registry from a table of entries.
 *
 * The registry is assembled once at process start and never mutated. There
 * is no add() or remove(): a different table means a different registry
 * object, with a different fingerprint.
 *
 * Construction folds every type, subtype, parameter name, and
 * case-insensitive constraint value to ASCII lowercase, so lookups and
 * comparisons never depend on how the table was written.
 */

import { asciiLower, compareCodeUnits, isToken } from '@mediagate/media-type';
import type { ValidationError, ValidationResult } from '@mediagate/media-type';
import type {
  MediaTypeRegistry,
  ParameterPolicy,
  RegistryEntry,
  RegistryEntryInit,
  ValueConstraint,
} from '../types/registry.js';
import { RegistryError } from '../errors.js';

/** Printable ASCII: the characters a constraint value may contain. */
function isPrintableAscii(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code < 0x20 || code > 0x7e) return false;
  }
  return true;
}

function registryKey(type: string, subtype: string): string {
  return `${asciiLower(type)}/${asciiLower(subtype)}`;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateConstraint(
  constraint: ValueConstraint,
  context: string,
  errors: ValidationError[],
): void {
  const checkValue = (value: string): void => {
    if (value === '' || !isPrintableAscii(value)) {
      errors.push({
        message: `Constraint value ${JSON.stringify(value)} must be non-empty printable ASCII`,
        context,
      });
    }
  };

  switch (constraint.kind) {
    case 'exact':
      checkValue(constraint.value);
      break;
    case 'enum': {
      if (constraint.values.length === 0) {
        errors.push({ message: 'Enumerated constraint has no values', context });
      }
      const seen = new Set<string>();
      for (const value of constraint.values) {
        checkValue(value);
        const folded = constraint.caseInsensitive ? asciiLower(value) : value;
        if (seen.has(folded)) {
          errors.push({ message: `Enumerated value ${JSON.stringify(value)} is listed twice`, context });
        }
        seen.add(folded);
      }
      break;
    }
    case 'token':
      break;
  }
}

/**
 * Validate a registry table without building it.
 *
 * Checks:
 * - type, subtype, and parameter names are tokens
 * - no two entries share a type/subtype (case-insensitive)
 * - no entry names the same parameter twice (case-insensitive)
 * - constraint values are non-empty printable ASCII and enum sets are
 *   non-empty without duplicates
 *
 * @param entries - Author-facing entries to check
 * @returns ValidationResult<void>: ok if the table can be built, errors otherwise
 */
export function validateRegistryEntries(
  entries: ReadonlyArray<RegistryEntryInit>,
): ValidationResult<void> {
  const errors: ValidationError[] = [];
  const keys = new Set<string>();

  for (const entry of entries) {
    const key = registryKey(entry.type, entry.subtype);

    if (!isToken(entry.type)) {
      errors.push({ message: `Type ${JSON.stringify(entry.type)} is not a token`, context: key });
    }
    if (!isToken(entry.subtype)) {
      errors.push({ message: `Subtype ${JSON.stringify(entry.subtype)} is not a token`, context: key });
    }
    if (keys.has(key)) {
      errors.push({ message: 'Duplicate registry entry', context: key });
    }
    keys.add(key);

    const names = new Set<string>();
    for (const [name, constraint] of Object.entries(entry.parameters)) {
      const context = `${key};${name}`;
      if (!isToken(name)) {
        errors.push({ message: `Parameter name ${JSON.stringify(name)} is not a token`, context });
      }
      const folded = asciiLower(name);
      if (names.has(folded)) {
        errors.push({ message: 'Parameter is declared twice', context });
      }
      names.add(folded);
      validateConstraint(constraint, context, errors);
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true };
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function freezeConstraint(constraint: ValueConstraint): ValueConstraint {
  switch (constraint.kind) {
    case 'exact':
      return Object.freeze({
        kind: 'exact',
        value: constraint.caseInsensitive ? asciiLower(constraint.value) : constraint.value,
        caseInsensitive: constraint.caseInsensitive,
      });
    case 'enum':
      return Object.freeze({
        kind: 'enum',
        values: Object.freeze(
          constraint.values
            .map((v) => (constraint.caseInsensitive ? asciiLower(v) : v))
            .sort(compareCodeUnits),
        ),
        caseInsensitive: constraint.caseInsensitive,
      });
    case 'token':
      return Object.freeze({ kind: 'token', caseInsensitive: constraint.caseInsensitive });
  }
}

function freezeEntry(init: RegistryEntryInit): RegistryEntry {
  // fromEntries defines own properties, so a parameter named __proto__ stays data.
  const policy: ParameterPolicy = Object.freeze(
    Object.fromEntries(
      Object.entries(init.parameters)
        .map(([name, constraint]): [string, ValueConstraint] => [
          asciiLower(name),
          freezeConstraint(constraint),
        ])
        .sort(([a], [b]) => compareCodeUnits(a, b)),
    ),
  );

  return Object.freeze({
    key: registryKey(init.type, init.subtype),
    type: asciiLower(init.type),
    subtype: asciiLower(init.subtype),
    parameters: policy,
    description: init.description ?? null,
  });
}

/**
 * A frozen registry. The backing map is private and never exposed.
 *
 * @internal
 */
class FrozenRegistry implements MediaTypeRegistry {
  private readonly byKey: ReadonlyMap<string, RegistryEntry>;
  private readonly sorted: ReadonlyArray<RegistryEntry>;

  constructor(entries: ReadonlyArray<RegistryEntry>) {
    this.sorted = Object.freeze([...entries].sort((a, b) => compareCodeUnits(a.key, b.key)));
    this.byKey = new Map(this.sorted.map((e) => [e.key, e]));
    Object.freeze(this);
  }

  get size(): number {
    return this.sorted.length;
  }

  lookup(type: string, subtype: string): RegistryEntry | undefined {
    return this.byKey.get(registryKey(type, subtype));
  }

  entries(): ReadonlyArray<RegistryEntry> {
    return this.sorted;
  }
}

/**
 * Build an immutable registry from a table of entries.
 *
 * The table is validated in full first; on any error nothing is built.
 *
 * @param entries - Author-facing entries (static table or loaded document)
 * @returns A frozen MediaTypeRegistry
 * @throws {RegistryError} If validateRegistryEntries() reports errors
 *
 * @example
 * const registry = buildRegistry([
 *   { type: 'audio', subtype: 'ogg',
 *     parameters: { codecs: { kind: 'enum', values: ['opus'], caseInsensitive: true } } },
 * ]);
 * registry.lookup('Audio', 'OGG')?.key // 'audio/ogg'
 */
export function buildRegistry(entries: ReadonlyArray<RegistryEntryInit>): MediaTypeRegistry {
  const result = validateRegistryEntries(entries);
  if (!result.ok) {
    throw new RegistryError(result.errors);
  }
  return new FrozenRegistry(entries.map(freezeEntry));
}
