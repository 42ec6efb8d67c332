/**
 * hpikit Engine: Log Sink Interface
 *
 * The injection point for build event persistence. The engine owns the
 * contract and the BuildLogger; concrete sinks live in the runtime host and
 * are injected at construction time. The engine never writes to disk.
 */

import type { BuildEvent } from './build-log.js';

/**
 * Receives and persists build events. Implementations must not silently
 * discard entries.
 */
export interface LogSink {
  append(event: BuildEvent): void;
}
