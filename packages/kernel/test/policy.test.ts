/**
 * mediagate Kernel: Policy Evaluator Tests
 */

import { describe, it, expect } from 'vitest';
import { RejectKind } from '@mediagate/media-type';
import type { ParsedMediaType } from '@mediagate/media-type';
import { Admission, applyConstraint, buildRegistry, evaluatePolicy } from '../src/index.js';

const registry = buildRegistry([
  {
    type: 'audio',
    subtype: 'ogg',
    parameters: {
      codecs: { kind: 'enum', values: ['opus', 'vorbis'], caseInsensitive: true },
      rate: { kind: 'exact', value: '48000', caseInsensitive: false },
    },
  },
  { type: 'audio', subtype: 'opus', parameters: {} },
  {
    type: 'video',
    subtype: 'mp4',
    parameters: { codecs: { kind: 'token', caseInsensitive: false } },
  },
]);

function parsed(type: string, subtype: string, params: Array<[string, string]> = []): ParsedMediaType {
  return {
    type,
    subtype,
    parameters: params.map(([name, value]) => ({ name, value, quoted: false })),
  };
}

describe('applyConstraint', () => {
  it('folds the value only for case-insensitive constraints', () => {
    expect(applyConstraint('OPUS', { kind: 'enum', values: ['opus'], caseInsensitive: true })).toBe('opus');
    expect(applyConstraint('OPUS', { kind: 'enum', values: ['opus'], caseInsensitive: false })).toBeUndefined();
  });

  it('matches exact values byte for byte when case-sensitive', () => {
    expect(applyConstraint('High', { kind: 'exact', value: 'High', caseInsensitive: false })).toBe('High');
    expect(applyConstraint('high', { kind: 'exact', value: 'High', caseInsensitive: false })).toBeUndefined();
  });

  it('accepts any token for token constraints', () => {
    expect(applyConstraint('avc1.64001F', { kind: 'token', caseInsensitive: false })).toBe('avc1.64001F');
    expect(applyConstraint('avc1.64001F', { kind: 'token', caseInsensitive: true })).toBe('avc1.64001f');
    expect(applyConstraint('a b', { kind: 'token', caseInsensitive: false })).toBeUndefined();
    expect(applyConstraint('', { kind: 'token', caseInsensitive: false })).toBeUndefined();
  });
});

describe('evaluatePolicy: parameter-free types', () => {
  it('admits a registered type through the registry', () => {
    expect(evaluatePolicy(parsed('audio', 'opus'), registry)).toEqual({
      ok: true,
      value: parsed('audio', 'opus'),
      admission: Admission.Registry,
    });
  });

  it('admits an unregistered type through the passthrough', () => {
    expect(evaluatePolicy(parsed('image', 'jpeg'), registry)).toEqual({
      ok: true,
      value: parsed('image', 'jpeg'),
      admission: Admission.Passthrough,
    });
  });
});

describe('evaluatePolicy: parameters', () => {
  it('returns folded values in their original order', () => {
    const result = evaluatePolicy(parsed('audio', 'ogg', [['rate', '48000'], ['codecs', 'Vorbis']]), registry);
    expect(result).toEqual({
      ok: true,
      value: parsed('audio', 'ogg', [['rate', '48000'], ['codecs', 'vorbis']]),
      admission: Admission.Registry,
    });
  });

  it('preserves the quoted flag', () => {
    const input: ParsedMediaType = {
      type: 'audio',
      subtype: 'ogg',
      parameters: [{ name: 'codecs', value: 'OPUS', quoted: true }],
    };
    const result = evaluatePolicy(input, registry);
    expect(result.ok && result.value.parameters).toEqual([{ name: 'codecs', value: 'opus', quoted: true }]);
  });

  it('rejects parameters on an unregistered type', () => {
    expect(evaluatePolicy(parsed('image', 'jpeg', [['quality', '90']]), registry)).toEqual({
      ok: false,
      reason: {
        kind: RejectKind.UnregisteredTypeWithParameters,
        message: 'Parameters are not permitted on unregistered type image/jpeg',
        token: 'image/jpeg',
      },
    });
  });

  it('rejects a parameter outside the allow-list', () => {
    expect(evaluatePolicy(parsed('audio', 'opus', [['codecs', 'opus']]), registry)).toEqual({
      ok: false,
      reason: {
        kind: RejectKind.DisallowedParameter,
        message: 'Parameter "codecs" is not permitted for audio/opus',
        token: 'codecs',
      },
    });
  });

  it('rejects a value that fails its constraint', () => {
    expect(evaluatePolicy(parsed('audio', 'ogg', [['codecs', 'mp3']]), registry)).toEqual({
      ok: false,
      reason: {
        kind: RejectKind.InvalidParameterValue,
        message: 'Value "mp3" is not permitted for parameter "codecs" of audio/ogg',
        token: 'mp3',
      },
    });
  });

  it('fails closed: one bad parameter rejects the whole type', () => {
    const result = evaluatePolicy(parsed('audio', 'ogg', [['codecs', 'opus'], ['rate', '44100']]), registry);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason.kind).toBe(RejectKind.InvalidParameterValue);
      expect(result.reason.token).toBe('44100');
    }
  });

  it('reports the first failing parameter in order of appearance', () => {
    const result = evaluatePolicy(parsed('audio', 'ogg', [['extra', '1'], ['codecs', 'mp3']]), registry);
    expect(!result.ok && result.reason.kind).toBe(RejectKind.DisallowedParameter);
  });

  it('does not resolve parameter names through the object prototype', () => {
    const result = evaluatePolicy(parsed('audio', 'ogg', [['constructor', 'x']]), registry);
    expect(!result.ok && result.reason.kind).toBe(RejectKind.DisallowedParameter);
  });
});
