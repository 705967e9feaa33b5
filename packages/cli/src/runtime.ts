/**
 * runtime.ts: Build the per-invocation runtime from global options.
 *
 * Resolution order:
 *   home      --home → MEDIAGATE_HOME → ~/.mediagate
 *   registry  --registry → MEDIAGATE_REGISTRY → config.json → built-in table
 *
 * Nothing here is cached between invocations: each command builds what it
 * needs, uses it, and exits.
 */

import { MediaTypeGate } from '@mediagate/kernel';
import type { MediaTypeRegistry } from '@mediagate/kernel';
import {
  FileStateIO,
  FileVerdictSink,
  loadRegistry,
  resolveMediagateHome,
  resolveRegistrySource,
} from '@mediagate/runtime-host';
import type { RegistrySource, StateIO } from '@mediagate/runtime-host';

/** Options declared on the root program and inherited by every command. */
export interface GlobalOptions {
  readonly home?: string | undefined;
  readonly registry?: string | undefined;
  /** False when --no-log is given. */
  readonly log?: boolean | undefined;
}

export interface CliRuntime {
  readonly home: string;
  readonly stateIO: StateIO;
  readonly source: RegistrySource;
  readonly registry: MediaTypeRegistry;
  /** Audited gate. Records to `<home>/logs/verdicts.jsonl` unless --no-log. */
  readonly gate: MediaTypeGate;
}

/**
 * @throws {ConfigError} If `<home>/config.json` is malformed
 * @throws {RegistryLoadError} If the selected registry document cannot be loaded
 */
export function buildRuntime(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
  stateIOFor: (home: string) => StateIO = (home) => new FileStateIO(home),
): CliRuntime {
  const home = resolveMediagateHome({ home: options.home, env });
  const stateIO = stateIOFor(home);
  const source = resolveRegistrySource({ registry: options.registry, home, stateIO, env });
  const registry = loadRegistry(source);
  const sink = options.log === false ? undefined : new FileVerdictSink(stateIO);
  return { home, stateIO, source, registry, gate: new MediaTypeGate(registry, sink) };
}

/** Human-readable origin of the active registry. */
export function describeSource(source: RegistrySource): string {
  return source.kind === 'default' ? 'built-in' : `${source.path} (from ${source.origin})`;
}
