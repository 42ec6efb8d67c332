/**
 * In-memory stand-ins for the engine's capability interfaces. No I/O.
 */

import { ResolutionError } from '../src/errors.js';
import type {
  ArchiveEntry,
  ArchiveWriter,
  ArtifactResolver,
  ResolutionRequest,
  ResolutionResult,
} from '../src/adapters/index.js';
import type { ModuleCoordinate, ResolvedArtifact } from '../src/types/coordinate.js';
import { formatCoordinate, moduleId, parseDependencyNotation } from '../src/types/coordinate.js';
import { compareVersions } from '../src/resolution/version-compare.js';

export const FIXED_CLOCK = (): string => '2026-01-01T00:00:00.000Z';

export interface FakeModule {
  /** `group:name:version` */
  readonly notation: string;
  /** Packaging type; defaults to `jar`. */
  readonly type?: string;
  readonly dependencies?: ReadonlyArray<string>;
}

interface StoredModule {
  readonly coordinate: ModuleCoordinate;
  readonly type: string;
  readonly dependencies: ReadonlyArray<ModuleCoordinate>;
}

function coordinateOf(notation: string): ModuleCoordinate {
  const parsed = parseDependencyNotation(notation);
  if (parsed === null) throw new Error(`bad fixture notation: ${notation}`);
  return parsed.coordinate;
}

/**
 * Resolves against a fixed module list. Artifact files are
 * `/repo/<name>-<version>.<extension>`; a plain declaration delivers the
 * module's packaging type, an `@ext` declaration that extension. The
 * highest version of a module seen anywhere in a request is the one
 * delivered, and only its dependencies are followed.
 */
export class MemoryArtifactResolver implements ArtifactResolver {
  readonly requests: ResolutionRequest[] = [];
  private readonly modules = new Map<string, StoredModule>();

  constructor(modules: ReadonlyArray<FakeModule>) {
    for (const m of modules) {
      const coordinate = coordinateOf(m.notation);
      this.modules.set(formatCoordinate(coordinate), {
        coordinate,
        type: m.type ?? 'jar',
        dependencies: (m.dependencies ?? []).map(coordinateOf),
      });
    }
  }

  resolve(request: ResolutionRequest): Promise<ResolutionResult> {
    this.requests.push(request);
    const artifacts: ResolvedArtifact[] = [];
    const errors: ResolutionError[] = [];
    const excluded = (c: ModuleCoordinate): boolean =>
      request.exclusions.some((e) => e.group === c.group && e.module === c.name);

    const selected = new Map<string, string>();
    const walked = new Set<string>();
    const collect = (coordinate: ModuleCoordinate, transitive: boolean): void => {
      if (excluded(coordinate)) return;
      const id = moduleId(coordinate);
      const current = selected.get(id);
      if (current === undefined || compareVersions(coordinate.version, current) > 0) {
        selected.set(id, coordinate.version);
      }
      const key = formatCoordinate(coordinate);
      if (!transitive || walked.has(key)) return;
      walked.add(key);
      for (const dep of this.modules.get(key)?.dependencies ?? []) collect(dep, true);
    };
    for (const d of request.dependencies) collect(d.coordinate, d.transitive);

    const seen = new Set<string>();
    const visit = (requested: ModuleCoordinate, extension: string | undefined, transitive: boolean): void => {
      if (excluded(requested)) return;
      const coordinate = { ...requested, version: selected.get(moduleId(requested)) ?? requested.version };
      const key = `${formatCoordinate(coordinate)}@${extension ?? ''}`;
      if (seen.has(key)) return;
      seen.add(key);

      const module = this.modules.get(formatCoordinate(coordinate));
      if (module === undefined) {
        errors.push(new ResolutionError(coordinate, request.role, 'not in the test repository'));
        return;
      }
      const ext = extension ?? module.type;
      artifacts.push({
        coordinate,
        type: module.type,
        extension: ext,
        file: `/repo/${coordinate.name}-${coordinate.version}.${ext}`,
      });
      if (transitive) {
        for (const dep of module.dependencies) visit(dep, undefined, true);
      }
    };

    for (const d of request.dependencies) visit(d.coordinate, d.extension, d.transitive);
    return Promise.resolve({ artifacts, errors });
  }

  /** Roles the resolver was asked about, in request order. */
  requestedRoles(): string[] {
    return this.requests.map((r) => r.role);
  }
}

/** Records every write; optionally fails them. */
export class MemoryArchiveWriter implements ArchiveWriter {
  readonly written = new Map<string, ReadonlyArray<ArchiveEntry>>();

  constructor(private readonly failure?: Error) {}

  write(outputPath: string, entries: ReadonlyArray<ArchiveEntry>): Promise<void> {
    if (this.failure !== undefined) return Promise.reject(this.failure);
    this.written.set(outputPath, entries);
    return Promise.resolve();
  }
}
