/**
 * mediagate Kernel: Content Classification
 *
 * Decides whether the payload for a media type travels as text or as
 * hex-encoded binary. Only the base type/subtype is consulted; parameters
 * such as `codecs` never change the class.
 */

import { asciiLower } from '@mediagate/media-type';

export type ContentClass = 'text' | 'binary';

/** application/* subtypes carried as text. */
const TEXT_APPLICATION_SUBTYPES: ReadonlySet<string> = new Set([
  'xml',
  'javascript',
  'json',
  'manifest+json',
  'x-python-code',
  'x-sh',
  'x-csh',
  'x-tex',
  'x-latex',
]);

/**
 * The lowercase `type/subtype` of a media-type string, parameters and
 * surrounding whitespace removed.
 *
 * @example
 * baseMediaType('Audio/OGG; codecs=opus') // 'audio/ogg'
 */
export function baseMediaType(mediaType: string): string {
  const semicolon = mediaType.indexOf(';');
  const base = semicolon === -1 ? mediaType : mediaType.slice(0, semicolon);
  return asciiLower(base.trim());
}

/**
 * Classify a media type as text or binary.
 *
 * Text: `text/*`, `message/*`, any `+xml` suffix, and the application
 * subtypes in TEXT_APPLICATION_SUBTYPES. Everything else is binary.
 *
 * @example
 * classifyMediaType('text/plain;charset=utf-8') // 'text'
 * classifyMediaType('audio/ogg;codecs=opus')    // 'binary'
 */
export function classifyMediaType(mediaType: string): ContentClass {
  const base = baseMediaType(mediaType);
  if (base.startsWith('text/') || base.startsWith('message/') || base.endsWith('+xml')) {
    return 'text';
  }
  if (base.startsWith('application/') && TEXT_APPLICATION_SUBTYPES.has(base.slice('application/'.length))) {
    return 'text';
  }
  return 'binary';
}
