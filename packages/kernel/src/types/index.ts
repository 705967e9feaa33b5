/**
 * mediagate Kernel: Type Exports
 *
 * Re-exports all kernel types from a single entry point.
 * No logic lives in this file.
 */

export type {
  MediaTypeRegistry,
  ParameterPolicy,
  RegistryEntry,
  RegistryEntryInit,
  RegistryFingerprint,
  ValueConstraint,
} from './registry.js';

export type {
  AcceptedMediaType,
  PolicyResult,
  RejectedMediaType,
  UndeclaredMediaType,
  Verdict,
  VerdictLog,
} from './verdict.js';

export { Admission } from './verdict.js';
