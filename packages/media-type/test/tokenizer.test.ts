/**
 * mediagate Media Type: Tokenizer Tests
 *
 * Grammar acceptance, named parse failures with their token and position,
 * duplicate detection, and the length cap.
 */

import { describe, it, expect } from 'vitest';
import { ParseErrorCode, RejectKind, tokenize } from '../src/index.js';
import type { RejectReason, TokenizeResult } from '../src/index.js';

function rejection(result: TokenizeResult): RejectReason {
  if (result.ok) {
    throw new Error(`expected rejection, got ${JSON.stringify(result.parsed)}`);
  }
  return result.reason;
}

function parseFailure(raw: string): { code: ParseErrorCode; token: string; position: number } {
  const reason = rejection(tokenize(raw));
  if (reason.kind !== RejectKind.ParseError) {
    throw new Error(`expected ParseError, got ${reason.kind}`);
  }
  return { code: reason.code, token: reason.token, position: reason.position };
}

// ---------------------------------------------------------------------------
// Accepted input
// ---------------------------------------------------------------------------

describe('tokenize: well-formed input', () => {
  it('returns parsed: null for the empty string', () => {
    expect(tokenize('')).toEqual({ ok: true, parsed: null });
  });

  it('lowercases type, subtype and parameter names but not values', () => {
    expect(tokenize('Audio/Ogg; Codecs=OPUS')).toEqual({
      ok: true,
      parsed: {
        type: 'audio',
        subtype: 'ogg',
        parameters: [{ name: 'codecs', value: 'OPUS', quoted: false }],
      },
    });
  });

  it('accepts a bare type/subtype', () => {
    expect(tokenize('image/jpeg')).toEqual({
      ok: true,
      parsed: { type: 'image', subtype: 'jpeg', parameters: [] },
    });
  });

  it('accepts spaces and tabs around the semicolon', () => {
    const result = tokenize('audio/ogg\t;\tcodecs=opus ; rate=48000');
    expect(result.ok && result.parsed?.parameters).toEqual([
      { name: 'codecs', value: 'opus', quoted: false },
      { name: 'rate', value: '48000', quoted: false },
    ]);
  });

  it('unescapes \\" and \\\\ inside quoted values', () => {
    const result = tokenize('text/plain;title="a \\"b\\" \\\\c"');
    expect(result.ok && result.parsed?.parameters).toEqual([
      { name: 'title', value: 'a "b" \\c', quoted: true },
    ]);
  });

  it('accepts an empty quoted value', () => {
    const result = tokenize('text/plain;title=""');
    expect(result.ok && result.parsed?.parameters).toEqual([{ name: 'title', value: '', quoted: true }]);
  });

  it('keeps parameters in order of appearance', () => {
    const result = tokenize('text/plain;b=2;a=1');
    expect(result.ok && result.parsed?.parameters.map((p) => p.name)).toEqual(['b', 'a']);
  });

  it('accepts token punctuation in every position', () => {
    const result = tokenize('application/vnd.api+json;x-v_1=a.b!#$&^');
    expect(result.ok && result.parsed).toEqual({
      type: 'application',
      subtype: 'vnd.api+json',
      parameters: [{ name: 'x-v_1', value: 'a.b!#$&^', quoted: false }],
    });
  });
});

// ---------------------------------------------------------------------------
// Parse errors
// ---------------------------------------------------------------------------

describe('tokenize: parse errors', () => {
  it('reports MissingSeparator when there is no "/"', () => {
    expect(parseFailure('audio')).toEqual({
      code: ParseErrorCode.MissingSeparator,
      token: 'audio',
      position: 5,
    });
  });

  it('reports EmptyType when nothing precedes "/"', () => {
    expect(parseFailure('/ogg')).toEqual({ code: ParseErrorCode.EmptyType, token: '/', position: 0 });
  });

  it('reports EmptySubtype when nothing follows "/"', () => {
    expect(parseFailure('audio/')).toEqual({
      code: ParseErrorCode.EmptySubtype,
      token: 'audio/',
      position: 6,
    });
    expect(parseFailure('audio/;codecs=opus').code).toBe(ParseErrorCode.EmptySubtype);
  });

  it('reports IllegalCharacter in the type', () => {
    expect(parseFailure('aud(io/ogg')).toEqual({
      code: ParseErrorCode.IllegalCharacter,
      token: '(',
      position: 3,
    });
  });

  it('reports IllegalCharacter for a second "/"', () => {
    expect(parseFailure('audio/ogg/x')).toEqual({
      code: ParseErrorCode.IllegalCharacter,
      token: '/',
      position: 9,
    });
  });

  it('reports IllegalCharacter for whitespace inside the subtype', () => {
    expect(parseFailure('audio/og g')).toEqual({
      code: ParseErrorCode.IllegalCharacter,
      token: ' ',
      position: 8,
    });
  });

  it('reports IllegalCharacter for trailing whitespace', () => {
    expect(parseFailure('audio/ogg ')).toEqual({
      code: ParseErrorCode.IllegalCharacter,
      token: ' ',
      position: 9,
    });
  });

  it('reports IllegalCharacter for whitespace around "="', () => {
    expect(parseFailure('audio/ogg; codecs = opus')).toEqual({
      code: ParseErrorCode.IllegalCharacter,
      token: ' ',
      position: 17,
    });
  });

  it('reports EmptyParameter for a trailing or doubled ";"', () => {
    expect(parseFailure('audio/ogg;')).toEqual({
      code: ParseErrorCode.EmptyParameter,
      token: ';',
      position: 9,
    });
    expect(parseFailure('audio/ogg;;codecs=opus')).toEqual({
      code: ParseErrorCode.EmptyParameter,
      token: ';',
      position: 9,
    });
  });

  it('reports MissingParameterValue for a name without "=" or value', () => {
    expect(parseFailure('audio/ogg;codecs')).toEqual({
      code: ParseErrorCode.MissingParameterValue,
      token: 'codecs',
      position: 10,
    });
    expect(parseFailure('audio/ogg;codecs=')).toEqual({
      code: ParseErrorCode.MissingParameterValue,
      token: 'codecs',
      position: 10,
    });
    expect(parseFailure('audio/ogg;codecs=;rate=1').code).toBe(ParseErrorCode.MissingParameterValue);
  });

  it('reports UnterminatedQuote at the opening quote', () => {
    expect(parseFailure('audio/ogg;codecs="opus')).toEqual({
      code: ParseErrorCode.UnterminatedQuote,
      token: '"opus',
      position: 17,
    });
  });

  it('reports UnterminatedQuote when the input ends on a backslash', () => {
    expect(parseFailure('audio/ogg;codecs="opus\\').code).toBe(ParseErrorCode.UnterminatedQuote);
  });

  it('reports InvalidEscape for any escape other than \\" and \\\\', () => {
    expect(parseFailure('audio/ogg;codecs="op\\us"')).toEqual({
      code: ParseErrorCode.InvalidEscape,
      token: '\\u',
      position: 20,
    });
  });

  it('reports IllegalCharacter for a control character inside quotes', () => {
    expect(parseFailure('text/plain;title="a\nb"')).toEqual({
      code: ParseErrorCode.IllegalCharacter,
      token: '\n',
      position: 19,
    });
  });

  it('reports the first defect in scan order', () => {
    expect(parseFailure('audio/ogg;codecs;;').code).toBe(ParseErrorCode.MissingParameterValue);
  });
});

// ---------------------------------------------------------------------------
// Duplicates and length
// ---------------------------------------------------------------------------

describe('tokenize: duplicate parameters', () => {
  it('rejects a repeated name with DuplicateParameter', () => {
    const reason = rejection(tokenize('audio/ogg;codecs=opus;codecs=opus'));
    expect(reason.kind).toBe(RejectKind.DuplicateParameter);
    expect(reason.token).toBe('codecs');
  });

  it('compares names case-insensitively and reports the name as written', () => {
    const reason = rejection(tokenize('audio/ogg;codecs=opus;CODECS=vorbis'));
    expect(reason.kind).toBe(RejectKind.DuplicateParameter);
    expect(reason.token).toBe('CODECS');
  });
});

describe('tokenize: length cap', () => {
  it('accepts exactly 255 bytes', () => {
    const raw = 'a/' + 'b'.repeat(253);
    expect(raw.length).toBe(255);
    expect(tokenize(raw).ok).toBe(true);
  });

  it('rejects 256 bytes with TooLong before parsing', () => {
    const reason = rejection(tokenize('a'.repeat(256)));
    expect(reason.kind).toBe(RejectKind.TooLong);
    expect(reason.token).toBe('a'.repeat(32));
  });

  it('counts UTF-8 bytes, not characters', () => {
    const raw = 'text/plain;x="' + 'é'.repeat(121) + '"';
    expect(raw.length).toBe(136);
    expect(rejection(tokenize(raw)).kind).toBe(RejectKind.TooLong);
  });
});
