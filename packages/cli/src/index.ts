/**
 * mediagate CLI: Operator command-line interface
 *
 * Usage:
 *   mediagate --help
 *   mediagate validate <media-type...> [--json]
 *   mediagate registry list [--json]
 *   mediagate registry fingerprint
 *   mediagate registry check <file>
 *   mediagate classify <media-type>
 *   mediagate content <media-type> <content>
 *   mediagate log [--outcome accepted|rejected] [--limit n] [--json]
 *
 * Global options: --home <dir>, --registry <file>, --no-log
 */

export { program } from './commands/index.js';
export type { CliRuntime, GlobalOptions } from './runtime.js';
export { buildRuntime, describeSource } from './runtime.js';
export type { VerdictJson } from './output/format.js';
export {
  describeReason,
  formatConstraint,
  formatRegistryEntry,
  formatValidationErrors,
  formatVerdict,
  formatVerdictRecord,
  registryToJson,
  verdictToJson,
} from './output/format.js';
