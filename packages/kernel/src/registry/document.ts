/**
 * mediagate Kernel: Registry Documents
 *
 * Structural validation of registry documents: the JSON form of a registry
 * table that a node may load at start in place of the compiled-in default.
 *
 * Document shape:
 *
 *   {
 *     "version": 1,
 *     "entries": [
 *       {
 *         "type": "audio",
 *         "subtype": "ogg",
 *         "description": "optional",
 *         "parameters": {
 *           "codecs": { "kind": "enum", "values": ["opus"], "caseInsensitive": true }
 *         }
 *       }
 *     ]
 *   }
 *
 * `parameters` may be omitted (no parameters allowed). `caseInsensitive`
 * may be omitted and defaults to false.
 */

import type { ValidationError, ValidationResult } from '@mediagate/media-type';
import type { RegistryEntryInit, ValueConstraint } from '../types/registry.js';
import { validateRegistryEntries } from './registry.js';

/** The only registry document version this build understands. */
export const REGISTRY_DOCUMENT_VERSION = 1;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseConstraint(
  raw: unknown,
  context: string,
  errors: ValidationError[],
): ValueConstraint | undefined {
  if (!isRecord(raw)) {
    errors.push({ message: 'Constraint must be an object', context });
    return undefined;
  }

  let caseInsensitive = false;
  if (raw['caseInsensitive'] !== undefined) {
    if (typeof raw['caseInsensitive'] !== 'boolean') {
      errors.push({ message: '"caseInsensitive" must be a boolean', context });
      return undefined;
    }
    caseInsensitive = raw['caseInsensitive'];
  }

  const kind = raw['kind'];
  switch (kind) {
    case 'exact': {
      const value = raw['value'];
      if (typeof value !== 'string') {
        errors.push({ message: 'Exact constraint requires a string "value"', context });
        return undefined;
      }
      return { kind: 'exact', value, caseInsensitive };
    }
    case 'enum': {
      const values = raw['values'];
      if (!Array.isArray(values)) {
        errors.push({ message: 'Enumerated constraint requires a "values" array', context });
        return undefined;
      }
      const strings: string[] = [];
      for (const v of values) {
        if (typeof v !== 'string') {
          errors.push({ message: 'Enumerated values must be strings', context });
          return undefined;
        }
        strings.push(v);
      }
      return { kind: 'enum', values: strings, caseInsensitive };
    }
    case 'token':
      return { kind: 'token', caseInsensitive };
    default:
      errors.push({
        message: `Unknown constraint kind ${JSON.stringify(kind)} (expected "exact", "enum" or "token")`,
        context,
      });
      return undefined;
  }
}

function parseEntry(
  raw: unknown,
  index: number,
  errors: ValidationError[],
): RegistryEntryInit | undefined {
  const context = `entries[${index}]`;
  if (!isRecord(raw)) {
    errors.push({ message: 'Entry must be an object', context });
    return undefined;
  }

  const type = raw['type'];
  const subtype = raw['subtype'];
  if (typeof type !== 'string' || typeof subtype !== 'string') {
    errors.push({ message: 'Entry requires string "type" and "subtype"', context });
    return undefined;
  }

  const rawDescription = raw['description'];
  let description: string | undefined;
  if (typeof rawDescription === 'string') {
    description = rawDescription;
  } else if (rawDescription !== undefined) {
    errors.push({ message: '"description" must be a string', context: `${type}/${subtype}` });
    return undefined;
  }

  const rawParameters = raw['parameters'] ?? {};
  if (!isRecord(rawParameters)) {
    errors.push({ message: '"parameters" must be an object', context: `${type}/${subtype}` });
    return undefined;
  }

  const parameters: Array<[string, ValueConstraint]> = [];
  let failed = false;
  for (const [name, rawConstraint] of Object.entries(rawParameters)) {
    const constraint = parseConstraint(rawConstraint, `${type}/${subtype};${name}`, errors);
    if (constraint === undefined) {
      failed = true;
    } else {
      parameters.push([name, constraint]);
    }
  }
  if (failed) return undefined;

  return { type, subtype, parameters: Object.fromEntries(parameters), description };
}

/**
 * Validate an unknown value (typically parsed JSON) as a registry document.
 *
 * Structural errors are reported per entry; when the structure is sound the
 * entries are also run through validateRegistryEntries(), so a document that
 * passes here is guaranteed to build.
 *
 * @param document - Unknown value to validate
 * @returns ValidationResult<RegistryEntryInit[]>: typed entries on success, every error found on failure
 */
export function parseRegistryDocument(document: unknown): ValidationResult<RegistryEntryInit[]> {
  if (!isRecord(document)) {
    return { ok: false, errors: [{ message: 'Registry document must be a JSON object' }] };
  }
  if (document['version'] !== REGISTRY_DOCUMENT_VERSION) {
    return {
      ok: false,
      errors: [
        {
          message: `Unsupported registry document version ${JSON.stringify(document['version'])} ` +
            `(expected ${REGISTRY_DOCUMENT_VERSION})`,
        },
      ],
    };
  }
  const rawEntries = document['entries'];
  if (!Array.isArray(rawEntries)) {
    return { ok: false, errors: [{ message: 'Registry document requires an "entries" array' }] };
  }

  const errors: ValidationError[] = [];
  const entries: RegistryEntryInit[] = [];
  rawEntries.forEach((raw: unknown, index) => {
    const entry = parseEntry(raw, index, errors);
    if (entry !== undefined) entries.push(entry);
  });

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const semantic = validateRegistryEntries(entries);
  if (!semantic.ok) {
    return { ok: false, errors: semantic.errors };
  }
  return { ok: true, value: entries };
}
