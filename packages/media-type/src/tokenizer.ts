/**
 * mediagate Media Type: Tokenizer
 *
 * Parses a raw media-type string into a ParsedMediaType.
 *
 * Grammar:
 *
 *   media-type = type "/" subtype *( OWS ";" OWS parameter )
 *   type       = token
 *   subtype    = token
 *   parameter  = attribute "=" value
 *   attribute  = token
 *   value      = token / quoted-string
 *   OWS        = *( SP / HTAB )
 *
 * Tokenizer guarantees:
 * - Bounded: input over MAX_MEDIA_TYPE_BYTES is rejected before scanning
 * - Deterministic: identical input produces identical output
 * - Rejecting: malformed input produces a RejectReason, never a partial parse
 * - Left-to-right: the first defect in scan order is the one reported
 *
 * The tokenizer does not consult the registry. Whether parameters are
 * permitted is the policy evaluator's concern.
 */

import { asciiLower, isTokenChar, utf8ByteLength } from './ascii.js';
import type { MediaTypeParameter, RejectReason, TokenizeResult } from './types.js';
import { MAX_MEDIA_TYPE_BYTES, ParseErrorCode, RejectKind } from './types.js';

/** Number of leading characters echoed back when input is too long. */
const TOO_LONG_ECHO = 32;

function isOws(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

/** Visible ASCII, SP, or HTAB: the characters a quoted string may carry. */
function isQuotedTextChar(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code === 0x09 || (code >= 0x20 && code <= 0x7e);
}

/** Thrown inside the scanner, caught once at the tokenize() boundary. */
class ScanFailure extends Error {
  constructor(readonly reason: RejectReason) {
    super(reason.message);
    this.name = 'ScanFailure';
  }
}

function fail(code: ParseErrorCode, message: string, token: string, position: number): ScanFailure {
  return new ScanFailure({ kind: RejectKind.ParseError, code, message, token, position });
}

/**
 * Single-pass cursor over the raw input.
 *
 * @internal
 */
class Scanner {
  pos = 0;

  constructor(private readonly src: string) {}

  get done(): boolean {
    return this.pos >= this.src.length;
  }

  peek(): string {
    return this.src.charAt(this.pos);
  }

  /** Consume a (possibly empty) run of token characters. */
  readToken(): string {
    const start = this.pos;
    while (!this.done && isTokenChar(this.peek())) {
      this.pos++;
    }
    return this.src.slice(start, this.pos);
  }

  /** Consume OWS. Returns the offset where it started, or -1 if there was none. */
  skipOws(): number {
    const start = this.pos;
    while (!this.done && isOws(this.peek())) {
      this.pos++;
    }
    return this.pos > start ? start : -1;
  }

  illegal(at: number = this.pos): ScanFailure {
    const ch = this.src.charAt(at);
    return fail(
      ParseErrorCode.IllegalCharacter,
      `Illegal character ${JSON.stringify(ch)} at position ${at}`,
      ch,
      at,
    );
  }

  /** Consume a quoted string. The cursor must be on the opening quote. */
  readQuoted(): string {
    const open = this.pos;
    this.pos++;
    let value = '';
    while (!this.done) {
      const ch = this.peek();
      if (ch === '"') {
        this.pos++;
        return value;
      }
      if (ch === '\\') {
        if (this.pos + 1 >= this.src.length) break;
        const next = this.src.charAt(this.pos + 1);
        if (next !== '"' && next !== '\\') {
          throw fail(
            ParseErrorCode.InvalidEscape,
            `Invalid escape ${JSON.stringify('\\' + next)} at position ${this.pos}; ` +
              'only \\" and \\\\ may be escaped',
            '\\' + next,
            this.pos,
          );
        }
        value += next;
        this.pos += 2;
        continue;
      }
      if (!isQuotedTextChar(ch)) {
        throw this.illegal();
      }
      value += ch;
      this.pos++;
    }
    throw fail(
      ParseErrorCode.UnterminatedQuote,
      `Unterminated quoted value starting at position ${open}`,
      this.src.slice(open),
      open,
    );
  }
}

/**
 * Tokenize a raw media-type string.
 *
 * Returns a discriminated union:
 * - `{ ok: true, parsed: null }` for the empty string (no media type declared)
 * - `{ ok: true, parsed }` for a well-formed media type
 * - `{ ok: false, reason }` for anything else
 *
 * Parameter names are unique after ASCII case folding; a repeated name is
 * rejected with RejectKind.DuplicateParameter rather than overwritten.
 *
 * @example
 * tokenize('Audio/Ogg; Codecs=opus')
 * // { ok: true, parsed: { type: 'audio', subtype: 'ogg',
 * //   parameters: [{ name: 'codecs', value: 'opus', quoted: false }] } }
 */
export function tokenize(raw: string): TokenizeResult {
  // Length check first, before any scanning. A string with more code units
  // than the cap cannot fit in the cap's worth of UTF-8 bytes.
  if (raw.length > MAX_MEDIA_TYPE_BYTES || utf8ByteLength(raw) > MAX_MEDIA_TYPE_BYTES) {
    return {
      ok: false,
      reason: {
        kind: RejectKind.TooLong,
        message: `Media type exceeds ${MAX_MEDIA_TYPE_BYTES} bytes`,
        token: raw.slice(0, TOO_LONG_ECHO),
      },
    };
  }

  if (raw === '') {
    return { ok: true, parsed: null };
  }

  try {
    return { ok: true, parsed: scan(raw) };
  } catch (err: unknown) {
    if (err instanceof ScanFailure) {
      return { ok: false, reason: err.reason };
    }
    throw err;
  }
}

function scan(raw: string): { type: string; subtype: string; parameters: MediaTypeParameter[] } {
  const s = new Scanner(raw);

  // type "/"
  const type = s.readToken();
  if (s.done) {
    throw fail(
      ParseErrorCode.MissingSeparator,
      `Missing "/" between type and subtype in ${JSON.stringify(raw)}`,
      raw,
      s.pos,
    );
  }
  if (s.peek() !== '/') {
    throw s.illegal();
  }
  if (type === '') {
    throw fail(ParseErrorCode.EmptyType, 'Media type has an empty type before "/"', '/', 0);
  }
  s.pos++;

  // subtype
  const subtypeStart = s.pos;
  const subtype = s.readToken();
  if (subtype === '' && (s.done || s.peek() === ';' || isOws(s.peek()))) {
    throw fail(
      ParseErrorCode.EmptySubtype,
      `Media type has an empty subtype after "${type}/"`,
      `${type}/`,
      subtypeStart,
    );
  }

  const parameters: MediaTypeParameter[] = [];
  const seen = new Set<string>();

  while (!s.done) {
    // OWS ";"
    const wsAt = s.skipOws();
    if (s.done) {
      throw s.illegal(wsAt);
    }
    if (s.peek() !== ';') {
      throw s.illegal(wsAt >= 0 ? wsAt : s.pos);
    }
    const semicolonAt = s.pos;
    s.pos++;

    // OWS parameter
    s.skipOws();
    if (s.done || s.peek() === ';') {
      throw fail(
        ParseErrorCode.EmptyParameter,
        `Empty parameter after ";" at position ${semicolonAt}`,
        ';',
        semicolonAt,
      );
    }

    const nameAt = s.pos;
    const attribute = s.readToken();
    if (attribute === '') {
      throw s.illegal();
    }
    if (s.done || s.peek() === ';') {
      throw fail(
        ParseErrorCode.MissingParameterValue,
        `Parameter "${attribute}" has no value`,
        attribute,
        nameAt,
      );
    }
    if (s.peek() !== '=') {
      throw s.illegal();
    }
    s.pos++;

    let value: string;
    let quoted = false;
    if (!s.done && s.peek() === '"') {
      value = s.readQuoted();
      quoted = true;
    } else {
      value = s.readToken();
      if (value === '') {
        if (s.done || s.peek() === ';' || isOws(s.peek())) {
          throw fail(
            ParseErrorCode.MissingParameterValue,
            `Parameter "${attribute}" has no value`,
            attribute,
            nameAt,
          );
        }
        throw s.illegal();
      }
    }

    const name = asciiLower(attribute);
    if (seen.has(name)) {
      throw new ScanFailure({
        kind: RejectKind.DuplicateParameter,
        message: `Parameter "${name}" appears more than once`,
        token: attribute,
      });
    }
    seen.add(name);
    parameters.push({ name, value, quoted });
  }

  return { type: asciiLower(type), subtype: asciiLower(subtype), parameters };
}
