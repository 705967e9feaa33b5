/**
 * @mediagate/runtime-host
 *
 * Side-effectful host for the mediagate kernel: home and configuration
 * resolution, registry document loading, and verdict log persistence.
 * Depends on @mediagate/kernel (interfaces); implements them with Node.js
 * built-ins.
 *
 * No kernel code imports from this package.
 */

// Home directory resolution
export type { ResolveHomeOptions } from './home.js';
export { DEFAULT_HOME_DIRNAME, HOME_ENV_VAR, resolveMediagateHome } from './home.js';

// Configuration and registry loading
export type {
  MediagateConfig,
  RegistrySource,
  ResolveRegistryOptions,
} from './config.js';
export {
  CONFIG_FILENAME,
  ConfigError,
  REGISTRY_ENV_VAR,
  RegistryLoadError,
  loadRegistry,
  loadRegistryFile,
  readConfig,
  readRegistryFile,
  resolveRegistrySource,
} from './config.js';

// StateIO: home-scoped I/O abstraction
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO, StateFileError } from './state/state-io.js';

// Verdict log
export { FileVerdictSink, VERDICT_LOG_FILENAME } from './logging/verdict-sink.js';
export type { UlidSources } from './logging/ulid.js';
export { createUlid, ulid } from './logging/ulid.js';
export type {
  LogEvent,
  LogReadResult,
  LogReadStats,
  VerdictFilter,
  VerdictRecord,
} from './logging/log-reader.js';
export { filterVerdicts, readLog, readVerdictLog } from './logging/log-reader.js';
