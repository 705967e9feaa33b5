/**
 * mediagate Kernel: Content Check
 *
 * Pre-flight check of a (media type, payload) pair before it is composed
 * into an issuance. Reports every problem found rather than stopping at the
 * first.
 */

import type { MediaTypeRegistry } from '../types/registry.js';
import { DEFAULT_REGISTRY } from '../registry/default-table.js';
import { validate } from '../validation/gate.js';
import { ContentEncodingError, contentToBytes } from './encoding.js';

/** Media type assumed when none is supplied. */
export const DEFAULT_CONTENT_MEDIA_TYPE = 'text/plain';

/**
 * Check a payload against its media type.
 *
 * @param mediaType - The submitted media type; null or empty means text/plain
 * @param content - The submitted payload (text, or hex for binary types)
 * @param registry - Registry for the media-type check
 * @returns Problem descriptions; empty when the pair is acceptable
 *
 * @example
 * checkContent('image/jpeg', '48656c6c6f') // []
 * checkContent('audio/ogg;codecs=mp3', 'abc')
 * // ['Invalid mime type: audio/ogg;codecs=mp3',
 * //  'Error converting description to bytes: Odd-length string']
 */
export function checkContent(
  mediaType: string | null,
  content: string,
  registry: MediaTypeRegistry = DEFAULT_REGISTRY,
): string[] {
  const mime = mediaType === null || mediaType === '' ? DEFAULT_CONTENT_MEDIA_TYPE : mediaType;
  const problems: string[] = [];

  if (!validate(mime, registry).ok) {
    problems.push(`Invalid mime type: ${mime}`);
  }

  try {
    contentToBytes(content, mime);
  } catch (err) {
    if (!(err instanceof ContentEncodingError)) throw err;
    problems.push(`Error converting description to bytes: ${err.message}`);
  }

  return problems;
}
