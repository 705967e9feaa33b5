/**
 * mediagate Kernel: Default Registry Table
 *
 * The compiled-in registry used when no registry document is configured.
 *
 * Each entry lists the parameters a type may carry. A type absent from this
 * table is still accepted in its parameter-free form (legacy passthrough);
 * it only needs an entry here to accept parameters.
 *
 * Changing this table changes the registry fingerprint. Entries may be added;
 * an existing constraint must never be narrowed, since values accepted under
 * it may already be embedded in chain data.
 */

import type { RegistryEntryInit } from '../types/registry.js';
import { buildRegistry } from './registry.js';

export const DEFAULT_REGISTRY_ENTRIES: ReadonlyArray<RegistryEntryInit> = [
  {
    type: 'audio',
    subtype: 'ogg',
    parameters: {
      codecs: { kind: 'enum', values: ['opus'], caseInsensitive: true },
    },
    description: 'Ogg container carrying Opus audio',
  },
  {
    type: 'audio',
    subtype: 'opus',
    parameters: {},
    description: 'Raw Opus stream',
  },
  {
    type: 'audio',
    subtype: 'webm',
    parameters: {
      codecs: { kind: 'enum', values: ['opus', 'vorbis'], caseInsensitive: true },
    },
  },
  {
    type: 'video',
    subtype: 'webm',
    parameters: {
      codecs: { kind: 'enum', values: ['av1', 'opus', 'vorbis', 'vp8', 'vp9'], caseInsensitive: true },
    },
  },
  {
    type: 'video',
    subtype: 'ogg',
    parameters: {
      codecs: { kind: 'enum', values: ['opus', 'theora', 'vorbis'], caseInsensitive: true },
    },
  },
  {
    type: 'application',
    subtype: 'ogg',
    parameters: {},
  },
  {
    type: 'audio',
    subtype: 'mp4',
    parameters: {
      codecs: { kind: 'enum', values: ['flac', 'mp4a.40.2', 'opus'], caseInsensitive: true },
    },
  },
  {
    type: 'video',
    subtype: 'mp4',
    parameters: {
      // Codec strings such as avc1.64001F carry case-significant profile data.
      codecs: { kind: 'token', caseInsensitive: false },
    },
  },
  {
    type: 'audio',
    subtype: 'flac',
    parameters: {},
    description: 'Native FLAC stream',
  },
];

/** The frozen registry built from DEFAULT_REGISTRY_ENTRIES. */
export const DEFAULT_REGISTRY = buildRegistry(DEFAULT_REGISTRY_ENTRIES);
