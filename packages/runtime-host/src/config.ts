/**
 * mediagate Runtime Host: Configuration and Registry Loading
 *
 * Resolves which registry a node runs with, and loads registry documents
 * from disk. The registry is loaded once at process start; nothing here
 * reloads or patches a registry after it is built.
 *
 * Registry source precedence (highest to lowest):
 *   1. Explicit `registry` option (the --registry CLI flag)
 *   2. MEDIAGATE_REGISTRY environment variable
 *   3. `registry` key of `<home>/config.json` (relative paths resolve
 *      against the home directory)
 *   4. The compiled-in DEFAULT_REGISTRY
 */

import { readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import {
  DEFAULT_REGISTRY,
  buildRegistry,
  parseRegistryDocument,
  type MediaTypeRegistry,
  type RegistryEntryInit,
} from '@mediagate/kernel';
import type { ValidationError, ValidationResult } from '@mediagate/media-type';
import type { StateIO } from './state/state-io.js';
import { isNodeError } from './state/state-io.js';

/** Environment variable naming a registry document. */
export const REGISTRY_ENV_VAR = 'MEDIAGATE_REGISTRY';

/** Node configuration file, relative to the home directory. */
export const CONFIG_FILENAME = 'config.json';

// ---------------------------------------------------------------------------
// Config file
// ---------------------------------------------------------------------------

/** Contents of `<home>/config.json`. Every key is optional. */
export interface MediagateConfig {
  /** Path to a registry document. */
  readonly registry?: string | undefined;
}

/** The node configuration is present but unusable. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read `<home>/config.json`.
 *
 * @returns The parsed configuration; an empty one if the file does not exist
 * @throws {ConfigError} If the file is not a JSON object or a key has the wrong type
 */
export function readConfig(stateIO: StateIO): MediagateConfig {
  const raw = stateIO.readJson(CONFIG_FILENAME);
  if (raw === undefined) return {};
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${CONFIG_FILENAME} must contain a JSON object`);
  }
  const registry: unknown = 'registry' in raw ? raw.registry : undefined;
  if (registry !== undefined && typeof registry !== 'string') {
    throw new ConfigError(`"registry" in ${CONFIG_FILENAME} must be a string`);
  }
  return { registry };
}

// ---------------------------------------------------------------------------
// Registry source resolution
// ---------------------------------------------------------------------------

/** Where the active registry comes from. */
export type RegistrySource =
  | { readonly kind: 'default' }
  | { readonly kind: 'file'; readonly path: string; readonly origin: 'flag' | 'env' | 'config' };

export interface ResolveRegistryOptions {
  /** Explicit override (the --registry CLI flag). */
  readonly registry?: string | undefined;
  /** Resolved home directory, for `config.json` and relative config paths. */
  readonly home: string;
  /** I/O bound to the home directory. */
  readonly stateIO: StateIO;
  /** Environment to consult. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Decide which registry to load.
 *
 * @throws {ConfigError} If `config.json` is malformed
 */
export function resolveRegistrySource(opts: ResolveRegistryOptions): RegistrySource {
  const env = opts.env ?? process.env;

  if (typeof opts.registry === 'string' && opts.registry !== '') {
    return { kind: 'file', path: resolve(opts.registry), origin: 'flag' };
  }

  const fromEnv = env[REGISTRY_ENV_VAR];
  if (typeof fromEnv === 'string' && fromEnv !== '') {
    return { kind: 'file', path: resolve(fromEnv), origin: 'env' };
  }

  const config = readConfig(opts.stateIO);
  if (config.registry !== undefined && config.registry !== '') {
    const path = isAbsolute(config.registry) ? config.registry : join(opts.home, config.registry);
    return { kind: 'file', path, origin: 'config' };
  }

  return { kind: 'default' };
}

// ---------------------------------------------------------------------------
// Registry documents
// ---------------------------------------------------------------------------

/** A registry document could not be read, parsed, or built. */
export class RegistryLoadError extends Error {
  constructor(
    readonly path: string,
    readonly errors: ReadonlyArray<ValidationError>,
  ) {
    super(
      `Cannot load registry ${path}: ` +
        errors.map((e) => (e.context !== undefined ? `${e.context}: ${e.message}` : e.message)).join('; '),
    );
    this.name = 'RegistryLoadError';
  }
}

/**
 * Read and structurally validate a registry document without building it.
 *
 * Missing files and malformed JSON are reported as validation errors so
 * that `registry check` can print them alongside structural problems.
 */
export function readRegistryFile(path: string): ValidationResult<RegistryEntryInit[]> {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      return { ok: false, errors: [{ message: 'File not found', context: path }] };
    }
    throw err;
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err: unknown) {
    return {
      ok: false,
      errors: [{ message: `Malformed JSON: ${err instanceof Error ? err.message : String(err)}`, context: path }],
    };
  }

  return parseRegistryDocument(document);
}

/**
 * Load a registry document and build a frozen registry from it.
 *
 * @throws {RegistryLoadError} If the document cannot be read or is invalid
 */
export function loadRegistryFile(path: string): MediaTypeRegistry {
  const result = readRegistryFile(path);
  if (!result.ok) {
    throw new RegistryLoadError(path, result.errors);
  }
  return buildRegistry(result.value);
}

/** Load the registry named by a RegistrySource. */
export function loadRegistry(source: RegistrySource): MediaTypeRegistry {
  return source.kind === 'default' ? DEFAULT_REGISTRY : loadRegistryFile(source.path);
}
