/**
 * mediagate CLI: Output Formatting Tests
 *
 * Renderers are pure; chalk's level is forced to 0 so assertions compare
 * plain text.
 */

import { beforeAll, describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { Admission, DEFAULT_REGISTRY, validate } from '@mediagate/kernel';
import type { RegistryEntry } from '@mediagate/kernel';
import type { VerdictRecord } from '@mediagate/runtime-host';
import {
  formatConstraint,
  formatRegistryEntry,
  formatValidationErrors,
  formatVerdict,
  formatVerdictRecord,
  verdictToJson,
} from '../src/output/format.js';

beforeAll(() => {
  chalk.level = 0;
});

function entry(key: string): RegistryEntry {
  const [type = '', subtype = ''] = key.split('/');
  const found = DEFAULT_REGISTRY.lookup(type, subtype);
  if (found === undefined) throw new Error(`no default entry ${key}`);
  return found;
}

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

describe('formatVerdict', () => {
  it('prints the canonical form and admission path of an accepted input', () => {
    expect(formatVerdict('audio/ogg;codecs=OPUS', validate('audio/ogg;codecs=OPUS'))).toBe(
      'accepted  audio/ogg;codecs=opus  registry',
    );
    expect(formatVerdict('IMAGE/JPEG', validate('IMAGE/JPEG'))).toBe('accepted  image/jpeg  passthrough');
  });

  it('prints (none) for the undeclared empty input', () => {
    expect(formatVerdict('', validate(''))).toBe('accepted  (none)  undeclared');
  });

  it('quotes the rejected input and names the reason', () => {
    expect(formatVerdict('audio/ogg;codecs=mp3', validate('audio/ogg;codecs=mp3'))).toBe(
      'rejected  "audio/ogg;codecs=mp3"  InvalidParameterValue: ' +
        'Value "mp3" is not permitted for parameter "codecs" of audio/ogg',
    );
  });

  it('includes the grammar defect code for parse errors', () => {
    expect(formatVerdict('audio/ogg;codecs', validate('audio/ogg;codecs'))).toBe(
      'rejected  "audio/ogg;codecs"  ParseError(MissingParameterValue): Parameter "codecs" has no value',
    );
  });
});

describe('verdictToJson', () => {
  it('uses verdict log field names with nulls for the other outcome', () => {
    expect(verdictToJson('audio/ogg', validate('audio/ogg'))).toEqual({
      input: 'audio/ogg',
      outcome: 'accepted',
      canonical: 'audio/ogg',
      admission: Admission.Registry,
      reject_kind: null,
      token: null,
      message: null,
    });
    expect(verdictToJson('image/jpeg;q=1', validate('image/jpeg;q=1'))).toEqual({
      input: 'image/jpeg;q=1',
      outcome: 'rejected',
      canonical: null,
      admission: null,
      reject_kind: 'UnregisteredTypeWithParameters',
      token: 'image/jpeg',
      message: 'Parameters are not permitted on unregistered type image/jpeg',
    });
  });
});

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

describe('formatConstraint', () => {
  it('renders each constraint kind', () => {
    expect(formatConstraint({ kind: 'exact', value: '1', caseInsensitive: false })).toBe('= 1');
    expect(formatConstraint({ kind: 'enum', values: ['opus', 'vorbis'], caseInsensitive: true })).toBe(
      'one of opus, vorbis (case-insensitive)',
    );
    expect(formatConstraint({ kind: 'token', caseInsensitive: false })).toBe('any token');
  });
});

describe('formatRegistryEntry', () => {
  it('lists each parameter under the entry', () => {
    expect(formatRegistryEntry(entry('audio/ogg'))).toEqual([
      '  audio/ogg  Ogg container carrying Opus audio',
      '    codecs  one of opus (case-insensitive)',
    ]);
  });

  it('marks an entry that admits no parameters', () => {
    expect(formatRegistryEntry(entry('audio/opus'))).toEqual([
      '  audio/opus  Raw Opus stream',
      '    (no parameters)',
    ]);
  });
});

describe('formatValidationErrors', () => {
  it('prefixes the context when present', () => {
    expect(
      formatValidationErrors([
        { message: 'Duplicate registry entry', context: 'audio/ogg' },
        { message: 'Registry document must be a JSON object' },
      ]),
    ).toEqual(['  audio/ogg  Duplicate registry entry', '  Registry document must be a JSON object']);
  });
});

// ---------------------------------------------------------------------------
// Verdict log
// ---------------------------------------------------------------------------

describe('formatVerdictRecord', () => {
  const base = {
    event_id: '01J0000000000000000000000A',
    timestamp: '2026-01-01T00:00:00.000Z',
    input_hash: 'placeholder-hash',
    registry_fingerprint: 'placeholder-fingerprint',
  };

  it('shows the canonical form of an accepted record', () => {
    const record: VerdictRecord = {
      ...base,
      input: 'AUDIO/OGG',
      outcome: 'accepted',
      canonical: 'audio/ogg',
      admission: 'registry',
      reject_kind: null,
      token: null,
    };
    expect(formatVerdictRecord(record)).toBe('2026-01-01T00:00:00.000Z  accepted  "AUDIO/OGG"  audio/ogg');
  });

  it('shows the reject kind and token of a rejected record', () => {
    const record: VerdictRecord = {
      ...base,
      input: 'audio/ogg;codecs=mp3',
      outcome: 'rejected',
      canonical: null,
      admission: null,
      reject_kind: 'InvalidParameterValue',
      token: 'mp3',
    };
    expect(formatVerdictRecord(record)).toBe(
      '2026-01-01T00:00:00.000Z  rejected  "audio/ogg;codecs=mp3"  InvalidParameterValue at "mp3"',
    );
  });
});
