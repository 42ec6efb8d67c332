/**
 * hpikit Engine: Capability Interfaces
 *
 * The engine never touches the network or the filesystem. Everything with
 * a side effect is reached through one of these interfaces; concrete
 * implementations live in @hpikit/runtime-host, and tests inject in-memory
 * fakes.
 *
 *   ArtifactResolver: resolve a role's lineage declarations into artifacts
 *   ArchiveWriter   : write an ordered list of entries as a zip container
 *   LicenseReport   : enumerate the files of a generated license report
 *   BuildInputStore : persist build-input fingerprints between runs
 */

import type { ResolutionError } from '../errors.js';
import type { DependencyDeclaration, ResolvedArtifact } from '../types/coordinate.js';
import type { ExclusionRule, RoleId } from '../types/role.js';

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

/**
 * The declarations of a role and of every role extending into it. The
 * resolver selects one version per module across the whole request; roles
 * are requested one at a time so that adding rewritten declarations to a
 * role never forces re-resolution of unrelated roles.
 */
export interface ResolutionRequest {
  readonly role: RoleId;
  readonly dependencies: ReadonlyArray<DependencyDeclaration>;
  /** Modules to drop anywhere in this request's transitive closure, from every lineage role. */
  readonly exclusions: ReadonlyArray<ExclusionRule>;
}

/**
 * Resolver output. A non-empty `errors` list fails the owning role; the
 * session raises the first error unchanged.
 */
export interface ResolutionResult {
  readonly artifacts: ReadonlyArray<ResolvedArtifact>;
  readonly errors: ReadonlyArray<ResolutionError>;
}

export interface ArtifactResolver {
  resolve(request: ResolutionRequest): Promise<ResolutionResult>;
}

// ---------------------------------------------------------------------------
// Archive writer
// ---------------------------------------------------------------------------

/**
 * A single entry of an archive. Paths use forward slashes; directory paths
 * end with `/`.
 */
export type ArchiveEntry =
  | { readonly kind: 'directory'; readonly path: string }
  | { readonly kind: 'file'; readonly path: string; readonly source: string }
  | { readonly kind: 'content'; readonly path: string; readonly data: Uint8Array | string };

/**
 * Writes entries, in the given order, to a zip container at `outputPath`.
 *
 * Implementations must not leave a partial file at `outputPath` when they
 * fail, and must produce byte-identical output for identical entries.
 */
export interface ArchiveWriter {
  write(outputPath: string, entries: ReadonlyArray<ArchiveEntry>): Promise<void>;
}

// ---------------------------------------------------------------------------
// License report
// ---------------------------------------------------------------------------

export interface LicenseReportEntry {
  /** Path relative to the report root, forward slashes. */
  readonly path: string;
  /** Absolute path of the file on disk. */
  readonly file: string;
}

/**
 * A generated license report. Its files are copied verbatim into the
 * container's metadata directory.
 */
export interface LicenseReport {
  entries(): Promise<ReadonlyArray<LicenseReportEntry>>;
}

/** A report with no files, for projects that do not generate one. */
export const EMPTY_LICENSE_REPORT: LicenseReport = {
  entries: () => Promise.resolve([]),
};

// ---------------------------------------------------------------------------
// Build inputs
// ---------------------------------------------------------------------------

/**
 * Persists build-input fingerprints keyed by `<step>:<input>`.
 * `read` returns undefined when no fingerprint was recorded.
 */
export interface BuildInputStore {
  read(key: string): string | undefined;
  record(key: string, fingerprint: string): void;
}
