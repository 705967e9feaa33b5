/**
 * @mediagate/kernel
 *
 * Media-type validation kernel: type registry, policy evaluator,
 * validation gate, registry fingerprints, content rules, and the verdict
 * log contract.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API.
 * node:crypto is used for deterministic hashing (pure computation, not I/O).
 *
 * Verdict log persistence and registry document loading live in
 * @mediagate/runtime-host.
 */

// Types
export type {
  AcceptedMediaType,
  MediaTypeRegistry,
  ParameterPolicy,
  PolicyResult,
  RegistryEntry,
  RegistryEntryInit,
  RegistryFingerprint,
  RejectedMediaType,
  UndeclaredMediaType,
  ValueConstraint,
  Verdict,
  VerdictLog,
} from './types/index.js';
export { Admission } from './types/index.js';

// Errors
export { MediaTypeRejectedError, RegistryError, ReplayDivergenceError } from './errors.js';

// Registry
export { buildRegistry, validateRegistryEntries } from './registry/registry.js';
export { DEFAULT_REGISTRY, DEFAULT_REGISTRY_ENTRIES } from './registry/default-table.js';
export { REGISTRY_DOCUMENT_VERSION, parseRegistryDocument } from './registry/document.js';
export { registryFingerprint } from './registry/fingerprint.js';

// Policy
export { applyConstraint, evaluatePolicy } from './policy/evaluator.js';

// Validation
export {
  MediaTypeGate,
  computeInputHash,
  requireValidMediaType,
  validate,
  validateForReplay,
} from './validation/gate.js';

// Logging
export type { VerdictSink } from './logging/verdict-sink.js';
export { VerdictLogger } from './logging/verdict-log.js';

// Content
export type { ContentClass } from './content/classify.js';
export { baseMediaType, classifyMediaType } from './content/classify.js';
export {
  ContentEncodingError,
  bytesToContent,
  contentToBytes,
  decodeHex,
  encodeHex,
} from './content/encoding.js';
export { DEFAULT_CONTENT_MEDIA_TYPE, checkContent } from './content/check.js';
