/**
 * hpikit Engine: Coordinate and Artifact Types
 *
 * A module is identified by `group:name`. A coordinate adds the version.
 * Dependency declarations name a coordinate plus how it should be resolved;
 * resolved artifacts are what the resolver hands back for a declaration.
 */

// ---------------------------------------------------------------------------
// Coordinates
// ---------------------------------------------------------------------------

/** A versioned module coordinate (`group:name:version`). */
export interface ModuleCoordinate {
  readonly group: string;
  readonly name: string;
  readonly version: string;
}

/**
 * Module identity: `group:name`. Two coordinates that differ only in
 * version are the same module.
 */
export function moduleId(coordinate: Pick<ModuleCoordinate, 'group' | 'name'>): string {
  return `${coordinate.group}:${coordinate.name}`;
}

export function formatCoordinate(coordinate: ModuleCoordinate): string {
  return `${coordinate.group}:${coordinate.name}:${coordinate.version}`;
}

/**
 * Parse `group:name:version[:classifier][@extension]` notation.
 *
 * Returns null when the notation has fewer than three segments or any
 * segment is empty.
 */
export function parseDependencyNotation(notation: string): DependencyDeclaration | null {
  const [body, extension] = splitOnce(notation.trim(), '@');
  const parts = body.split(':');
  if (parts.length < 3 || parts.length > 4 || parts.some((p) => p === '')) {
    return null;
  }
  const [group, name, version, classifier] = parts;
  if (group === undefined || name === undefined || version === undefined) {
    return null;
  }
  if (extension !== undefined && extension === '') {
    return null;
  }
  return {
    coordinate: { group, name, version },
    classifier,
    extension,
    // Artifact-only notation (`@ext`) never pulls transitive dependencies.
    transitive: extension === undefined,
  };
}

function splitOnce(value: string, separator: string): [string, string | undefined] {
  const index = value.indexOf(separator);
  if (index < 0) return [value, undefined];
  return [value.slice(0, index), value.slice(index + 1)];
}

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

/**
 * A dependency declared on a role, either by the project author or by the
 * scope rewriter.
 */
export interface DependencyDeclaration {
  readonly coordinate: ModuleCoordinate;
  /** Artifact classifier (e.g. `tests`). */
  readonly classifier?: string | undefined;
  /**
   * Requested artifact extension. When set, only that artifact of the module
   * is requested (`@jar` notation).
   */
  readonly extension?: string | undefined;
  /** Whether the module's own dependencies are resolved too. */
  readonly transitive: boolean;
  /** Free-text provenance shown in diagnostics. */
  readonly reason?: string | undefined;
}

// ---------------------------------------------------------------------------
// Resolved Artifacts
// ---------------------------------------------------------------------------

/**
 * A single artifact produced by the resolver. Immutable once resolution
 * completes.
 */
export interface ResolvedArtifact {
  readonly coordinate: ModuleCoordinate;
  /**
   * Declared packaging type of the module (`jar`, `hpi`, `jpi`, `war`, ...).
   * This is what the classifier looks at.
   */
  readonly type: string;
  readonly classifier?: string | undefined;
  /** File extension of the artifact actually delivered (`jar`, `hpi`, ...). */
  readonly extension: string;
  /** Absolute path of the artifact file. */
  readonly file: string;
}

/**
 * The conventional file name of an artifact: `<name>-<version>[-<classifier>].<ext>`.
 */
export function artifactFileName(artifact: ResolvedArtifact): string {
  const { name, version } = artifact.coordinate;
  const classifier = artifact.classifier !== undefined ? `-${artifact.classifier}` : '';
  return `${name}-${version}${classifier}.${artifact.extension}`;
}
