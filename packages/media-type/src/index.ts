/**
 * @mediagate/media-type
 *
 * Media-type tokenizer, canonical serializer, and type definitions.
 *
 * This package is the base layer of the mediagate type system. It defines:
 * - The parsed media-type model (ParsedMediaType, MediaTypeParameter)
 * - The rejection taxonomy (RejectKind, ParseErrorCode, RejectReason)
 * - The tokenize() and canonicalize() functions
 * - ASCII-only character rules shared with the kernel
 *
 * All other mediagate packages depend on this package. This package has no
 * internal dependencies.
 */

// Types
export type {
  CanonicalMediaType,
  MediaTypeParameter,
  ParsedMediaType,
  RejectReason,
  TokenizeResult,
  ValidationError,
  ValidationResult,
} from './types.js';

export { MAX_MEDIA_TYPE_BYTES, ParseErrorCode, RejectKind } from './types.js';

// Functions
export { tokenize } from './tokenizer.js';
export { canonicalize, renderValue } from './canonical.js';
export { asciiLower, compareCodeUnits, isToken, isTokenChar, utf8ByteLength } from './ascii.js';
