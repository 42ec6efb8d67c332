/**
 * hpikit Runtime Host: Build Event Sink
 *
 * Appends each engine BuildEvent as one JSONL line to the project's
 * `logs/build-events.jsonl`. Every line carries an `event_id` ULID so logs
 * copied from several machines can be merged and deduplicated.
 *
 * Writes are synchronous: an event is on disk before the engine moves on.
 */

import type { BuildEvent, LogSink } from '@hpikit/engine';
import type { StateIO } from '../state/state-io.js';
import type { UlidFactory } from './ulid.js';
import { ulid } from './ulid.js';

export const BUILD_EVENTS_LOG = 'build-events.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: UlidFactory = ulid,
  ) {}

  append(event: BuildEvent): void {
    const line = JSON.stringify({
      event_id: this.nextId(),
      timestamp: event.timestamp,
      kind: event.kind,
      ...(event.role !== undefined ? { role: event.role } : {}),
      detail: event.detail,
    });
    this.stateIO.appendLine(BUILD_EVENTS_LOG, line);
  }
}

/**
 * Fans one event out to several sinks, in order. Used to mirror the
 * persisted log on the console.
 */
export class TeeLogSink implements LogSink {
  private readonly sinks: ReadonlyArray<LogSink>;

  constructor(...sinks: LogSink[]) {
    this.sinks = sinks;
  }

  append(event: BuildEvent): void {
    for (const sink of this.sinks) sink.append(event);
  }
}
