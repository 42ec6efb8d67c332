/**
 * hpikit Engine: Build Logger
 *
 * Records structured events for every decision the engine takes that
 * affects classpath or bundle contents: roles frozen, rewrites added or
 * skipped as duplicates, roles resolved, fingerprints recorded, archives
 * written.
 *
 * The sink is optional. Without one (tests, embedded use) record() is a
 * no-op.
 */

import type { RoleId } from '../types/role.js';
import type { LogSink } from './log-sink.js';

export enum BuildEventKind {
  ConfigurationFrozen = 'configuration.frozen',
  RewriteAdded = 'rewrite.added',
  RewriteDuplicate = 'rewrite.duplicate',
  RoleResolved = 'role.resolved',
  ManifestFingerprint = 'manifest.fingerprint',
  PackageWritten = 'package.written',
  ArtifactExcluded = 'package.excluded',
}

export interface BuildEvent {
  readonly kind: BuildEventKind;
  /** ISO-8601 timestamp. */
  readonly timestamp: string;
  readonly role?: RoleId | undefined;
  readonly detail: string;
}

export class BuildLogger {
  constructor(
    private readonly sink?: LogSink,
    private readonly clockFn: () => string = () => new Date().toISOString(),
  ) {}

  record(kind: BuildEventKind, detail: string, role?: RoleId): void {
    this.sink?.append({ kind, timestamp: this.clockFn(), role, detail });
  }
}
