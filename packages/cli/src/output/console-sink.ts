/**
 * Mirrors build events on stderr for `--verbose` runs.
 */

import type { BuildEvent, LogSink } from '@hpikit/engine';
import { eventColor, t } from '../theme.js';

export class ConsoleLogSink implements LogSink {
  constructor(private readonly write: (line: string) => void = (line) => process.stderr.write(line + '\n')) {}

  append(event: BuildEvent): void {
    const role = event.role !== undefined ? t.muted(` [${event.role}]`) : '';
    this.write(`${eventColor(event.kind)(event.kind)}${role} ${event.detail}`);
  }
}
