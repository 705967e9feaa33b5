/**
 * mediagate Kernel: Validation Gate Tests
 *
 * End-to-end scenarios through validate(), the throwing wrappers, and the
 * audited MediaTypeGate.
 */

import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import { ParseErrorCode, RejectKind } from '@mediagate/media-type';
import {
  Admission,
  DEFAULT_REGISTRY,
  MediaTypeGate,
  MediaTypeRejectedError,
  ReplayDivergenceError,
  buildRegistry,
  computeInputHash,
  registryFingerprint,
  requireValidMediaType,
  validate,
  validateForReplay,
} from '../src/index.js';
import type { Verdict, VerdictLog, VerdictSink } from '../src/index.js';

function rejectKind(verdict: Verdict): RejectKind | undefined {
  return verdict.ok ? undefined : verdict.reason.kind;
}

// ---------------------------------------------------------------------------
// validate()
// ---------------------------------------------------------------------------

describe('validate: accepted input', () => {
  it('accepts audio/ogg;codecs=opus unchanged', () => {
    expect(validate('audio/ogg;codecs=opus')).toEqual({
      ok: true,
      canonical: 'audio/ogg;codecs=opus',
      admission: Admission.Registry,
    });
  });

  it('folds a case-insensitive codec value', () => {
    expect(validate('audio/ogg;codecs=OPUS')).toEqual({
      ok: true,
      canonical: 'audio/ogg;codecs=opus',
      admission: Admission.Registry,
    });
  });

  it('accepts an unregistered parameter-free type through the passthrough', () => {
    expect(validate('image/jpeg')).toEqual({
      ok: true,
      canonical: 'image/jpeg',
      admission: Admission.Passthrough,
    });
  });

  it('returns the no-type sentinel for the empty string', () => {
    expect(validate('')).toEqual({ ok: true, canonical: null, admission: Admission.Undeclared });
  });

  it('lowercases a registered type written in upper case', () => {
    expect(validate('AUDIO/OGG')).toEqual({
      ok: true,
      canonical: 'audio/ogg',
      admission: Admission.Registry,
    });
  });

  it('normalizes whitespace and quoting', () => {
    const verdict = validate('Audio/Ogg ; codecs="Opus"');
    expect(verdict.ok && verdict.canonical).toBe('audio/ogg;codecs=opus');
  });

  it('keeps case in values whose constraint is case-sensitive', () => {
    const verdict = validate('video/mp4;codecs=avc1.64001F');
    expect(verdict.ok && verdict.canonical).toBe('video/mp4;codecs=avc1.64001F');
  });
});

describe('validate: rejected input', () => {
  it('rejects a parameter outside the allow-list', () => {
    const verdict = validate('audio/ogg;codecs=opus;unexpected=1');
    expect(rejectKind(verdict)).toBe(RejectKind.DisallowedParameter);
    expect(!verdict.ok && verdict.reason.token).toBe('unexpected');
  });

  it('rejects a codec outside the enumerated set', () => {
    expect(rejectKind(validate('audio/ogg;codecs=mp3'))).toBe(RejectKind.InvalidParameterValue);
  });

  it('rejects parameters on an unregistered type', () => {
    expect(rejectKind(validate('image/jpeg;quality=90'))).toBe(RejectKind.UnregisteredTypeWithParameters);
  });

  it('rejects parameters on a registered type with an empty policy', () => {
    expect(rejectKind(validate('audio/opus;codecs=opus'))).toBe(RejectKind.DisallowedParameter);
  });

  it('rejects a duplicated parameter', () => {
    expect(rejectKind(validate('audio/ogg;codecs=opus;codecs=opus'))).toBe(RejectKind.DuplicateParameter);
  });

  it('rejects 256 bytes as TooLong', () => {
    expect(rejectKind(validate('a'.repeat(256)))).toBe(RejectKind.TooLong);
  });

  it('rejects malformed grammar with the parse error code', () => {
    const verdict = validate('audio/ogg;codecs');
    expect(verdict).toEqual({
      ok: false,
      reason: {
        kind: RejectKind.ParseError,
        code: ParseErrorCode.MissingParameterValue,
        message: 'Parameter "codecs" has no value',
        token: 'codecs',
        position: 10,
      },
    });
  });

  it('rejects a non-token value for a token constraint', () => {
    expect(rejectKind(validate('video/mp4;codecs="a b"'))).toBe(RejectKind.InvalidParameterValue);
  });
});

describe('validate: explicit registry', () => {
  const registry = buildRegistry([
    {
      type: 'text',
      subtype: 'plain',
      parameters: { charset: { kind: 'enum', values: ['utf-8', 'us-ascii'], caseInsensitive: true } },
    },
  ]);

  it('evaluates against the supplied registry, not the default', () => {
    expect(validate('text/plain;charset=UTF-8', registry)).toEqual({
      ok: true,
      canonical: 'text/plain;charset=utf-8',
      admission: Admission.Registry,
    });
    expect(rejectKind(validate('text/plain;charset=utf-8'))).toBe(RejectKind.UnregisteredTypeWithParameters);
    expect(rejectKind(validate('audio/ogg;codecs=opus', registry))).toBe(
      RejectKind.UnregisteredTypeWithParameters,
    );
  });
});

// ---------------------------------------------------------------------------
// Throwing wrappers
// ---------------------------------------------------------------------------

describe('requireValidMediaType', () => {
  it('returns the canonical form or null', () => {
    expect(requireValidMediaType('audio/ogg;codecs=OPUS')).toBe('audio/ogg;codecs=opus');
    expect(requireValidMediaType('')).toBeNull();
  });

  it('throws MediaTypeRejectedError naming the offending token', () => {
    let caught: unknown;
    try {
      requireValidMediaType('audio/ogg;codecs=mp3');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MediaTypeRejectedError);
    if (caught instanceof MediaTypeRejectedError) {
      expect(caught.kind).toBe(RejectKind.InvalidParameterValue);
      expect(caught.token).toBe('mp3');
      expect(caught.input).toBe('audio/ogg;codecs=mp3');
      expect(caught.message).toBe(
        'Rejected media type "audio/ogg;codecs=mp3": ' +
          'Value "mp3" is not permitted for parameter "codecs" of audio/ogg',
      );
    }
  });
});

describe('validateForReplay', () => {
  it('returns the canonical form of historically accepted input', () => {
    expect(validateForReplay('image/png')).toBe('image/png');
    expect(validateForReplay('')).toBeNull();
  });

  it('throws ReplayDivergenceError when embedded input no longer validates', () => {
    expect(() => validateForReplay('audio/ogg;codecs=mp3')).toThrow(ReplayDivergenceError);
    expect(() => validateForReplay('audio/ogg;codecs=mp3')).toThrow(
      'Replay divergence: previously accepted media type "audio/ogg;codecs=mp3" is now rejected ' +
        '(InvalidParameterValue: Value "mp3" is not permitted for parameter "codecs" of audio/ogg)',
    );
  });
});

// ---------------------------------------------------------------------------
// MediaTypeGate
// ---------------------------------------------------------------------------

class MemoryVerdictSink implements VerdictSink {
  readonly entries: VerdictLog[] = [];
  append(entry: VerdictLog): void {
    this.entries.push(entry);
  }
}

const FIXED_CLOCK = () => new Date('2026-01-01T00:00:00.000Z');

describe('MediaTypeGate', () => {
  it('records one entry per call, accepted or rejected', () => {
    const sink = new MemoryVerdictSink();
    const gate = new MediaTypeGate(DEFAULT_REGISTRY, sink, FIXED_CLOCK);

    gate.validate('audio/ogg;codecs=OPUS');
    gate.validate('audio/ogg;codecs=mp3');
    gate.validate('');

    expect(sink.entries.map((e) => e.outcome)).toEqual(['accepted', 'rejected', 'accepted']);
  });

  it('records the accepted canonical form and admission', () => {
    const sink = new MemoryVerdictSink();
    const gate = new MediaTypeGate(DEFAULT_REGISTRY, sink, FIXED_CLOCK);

    gate.validate('image/jpeg');

    expect(sink.entries[0]).toEqual({
      input: 'image/jpeg',
      input_hash: createHash('sha256').update('image/jpeg').digest('hex'),
      registry_fingerprint: registryFingerprint(DEFAULT_REGISTRY),
      outcome: 'accepted',
      canonical: 'image/jpeg',
      admission: Admission.Passthrough,
      reject_kind: null,
      token: null,
      timestamp: '2026-01-01T00:00:00.000Z',
    });
  });

  it('records the rejection kind and token', () => {
    const sink = new MemoryVerdictSink();
    const gate = new MediaTypeGate(DEFAULT_REGISTRY, sink, FIXED_CLOCK);

    gate.validate('audio/ogg;codecs=opus;unexpected=1');

    expect(sink.entries[0]).toMatchObject({
      outcome: 'rejected',
      canonical: null,
      admission: null,
      reject_kind: RejectKind.DisallowedParameter,
      token: 'unexpected',
    });
  });

  it('returns exactly what validate() returns', () => {
    const gate = new MediaTypeGate();
    for (const raw of ['audio/ogg;codecs=OPUS', 'image/jpeg;q=1', '', 'x']) {
      expect(gate.validate(raw)).toEqual(validate(raw));
    }
  });

  it('exposes the fingerprint of its registry', () => {
    const gate = new MediaTypeGate();
    expect(gate.fingerprint).toBe(registryFingerprint(DEFAULT_REGISTRY));
  });
});

describe('computeInputHash', () => {
  it('hashes the UTF-8 bytes of the raw input', () => {
    expect(computeInputHash('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});
