/**
 * mediagate Kernel: Policy Evaluator
 *
 * Decides whether a tokenized media type is acceptable under a registry.
 *
 * Rules, in order:
 * 1. No parameters: accepted for any type/subtype. Registered types are
 *    admitted by the registry; everything else by the legacy passthrough.
 * 2. Parameters on a type with no registry entry: rejected.
 * 3. Each parameter, in order of appearance: its name must be in the
 *    entry's policy and its value must satisfy the constraint.
 *
 * Fail-closed: the first bad parameter rejects the whole type. Nothing is
 * stripped or rewritten other than case folding of values whose constraint
 * is declared case-insensitive.
 */

import { RejectKind, asciiLower, isToken } from '@mediagate/media-type';
import type { MediaTypeParameter, ParsedMediaType } from '@mediagate/media-type';
import type { MediaTypeRegistry, ValueConstraint } from '../types/registry.js';
import type { PolicyResult } from '../types/verdict.js';
import { Admission } from '../types/verdict.js';

/**
 * Test a value against a constraint, returning the value to canonicalize
 * on success or undefined when the constraint is not satisfied.
 *
 * Registry constraint values are already folded at build time, so only the
 * supplied value needs folding here.
 */
export function applyConstraint(value: string, constraint: ValueConstraint): string | undefined {
  const folded = constraint.caseInsensitive ? asciiLower(value) : value;
  switch (constraint.kind) {
    case 'exact':
      return folded === constraint.value ? folded : undefined;
    case 'enum':
      return constraint.values.includes(folded) ? folded : undefined;
    case 'token':
      return isToken(folded) ? folded : undefined;
  }
}

/**
 * Evaluate a parsed media type against a registry.
 *
 * Pure: reads the registry, never mutates it, and allocates only the
 * folded parameter list.
 *
 * @param parsed - Output of tokenize()
 * @param registry - The frozen registry to evaluate against
 * @returns PolicyResult: the folded value and its admission path, or the rejection reason
 */
export function evaluatePolicy(parsed: ParsedMediaType, registry: MediaTypeRegistry): PolicyResult {
  const fullType = `${parsed.type}/${parsed.subtype}`;
  const entry = registry.lookup(parsed.type, parsed.subtype);

  if (parsed.parameters.length === 0) {
    return {
      ok: true,
      value: parsed,
      admission: entry !== undefined ? Admission.Registry : Admission.Passthrough,
    };
  }

  if (entry === undefined) {
    return {
      ok: false,
      reason: {
        kind: RejectKind.UnregisteredTypeWithParameters,
        message: `Parameters are not permitted on unregistered type ${fullType}`,
        token: fullType,
      },
    };
  }

  const folded: MediaTypeParameter[] = [];
  for (const parameter of parsed.parameters) {
    const constraint = Object.hasOwn(entry.parameters, parameter.name)
      ? entry.parameters[parameter.name]
      : undefined;
    if (constraint === undefined) {
      return {
        ok: false,
        reason: {
          kind: RejectKind.DisallowedParameter,
          message: `Parameter "${parameter.name}" is not permitted for ${entry.key}`,
          token: parameter.name,
        },
      };
    }

    const value = applyConstraint(parameter.value, constraint);
    if (value === undefined) {
      return {
        ok: false,
        reason: {
          kind: RejectKind.InvalidParameterValue,
          message: `Value ${JSON.stringify(parameter.value)} is not permitted for parameter ` +
            `"${parameter.name}" of ${entry.key}`,
          token: parameter.value,
        },
      };
    }
    folded.push({ name: parameter.name, value, quoted: parameter.quoted });
  }

  return {
    ok: true,
    value: { type: parsed.type, subtype: parsed.subtype, parameters: folded },
    admission: Admission.Registry,
  };
}
