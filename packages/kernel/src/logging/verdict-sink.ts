/**
 * mediagate Kernel: Verdict Sink Interface
 *
 * Defines the injection point for verdict log persistence.
 *
 * The kernel owns the contract (this interface) and the VerdictLogger class.
 * Concrete implementations live in the runtime host layer and are injected
 * at construction time; the kernel never writes to disk directly.
 */

import type { VerdictLog } from '../types/verdict.js';

/**
 * A sink that receives and persists verdict log entries.
 *
 * append() must complete before the gate returns. Implementations must not
 * silently discard entries.
 */
export interface VerdictSink {
  append(entry: VerdictLog): void;
}
