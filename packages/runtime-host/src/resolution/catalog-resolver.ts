/**
 * hpikit Runtime Host: Catalog Resolver
 *
 * ArtifactResolver over a list of catalog repositories, searched in order;
 * the first repository that lists a coordinate supplies it.
 *
 * Each request is resolved in two passes:
 * 1. walk the declarations and their non-optional dependencies, noting
 *    every version requested for each module
 * 2. pick one version per module (the highest, or fail when the project
 *    asks for conflicts to be fatal) and emit the artifacts of the picked
 *    versions
 *
 * A declaration with an extension (`@jar`) yields that artifact only and is
 * never expanded. Exclusions drop a module and everything reached only
 * through it, at any depth.
 */

import { stat } from 'node:fs/promises';
import { ResolutionError, compareVersions, formatCoordinate, moduleId } from '@hpikit/engine';
import type {
  ArtifactResolver,
  ExclusionRule,
  ModuleCoordinate,
  ResolutionRequest,
  ResolutionResult,
  ResolvedArtifact,
} from '@hpikit/engine';
import type { Catalog, CatalogModule } from './catalog.js';
import { artifactKey, loadCatalog } from './catalog.js';
import { isNodeError } from '../state/state-io.js';

/** Packaging type of a module that has no artifact of its own. */
const POM_TYPE = 'pom';

export interface CatalogResolverOptions {
  /** Fail instead of picking the highest version when requests disagree. */
  readonly failOnVersionConflict?: boolean | undefined;
}

export class CatalogResolver implements ArtifactResolver {
  private index: Promise<ReadonlyMap<string, CatalogModule>> | undefined;

  constructor(
    private readonly repositories: ReadonlyArray<string>,
    private readonly options: CatalogResolverOptions = {},
  ) {}

  async resolve(request: ResolutionRequest): Promise<ResolutionResult> {
    const modules = await this.modules();
    const { role } = request;
    const errors: ResolutionError[] = [];
    const excluded = (c: ModuleCoordinate): boolean => isExcluded(c, request.exclusions);

    // Pass 1: requested versions per module.
    const requested = new Map<string, ModuleCoordinate[]>();
    const walked = new Set<string>();
    const walk = (coordinate: ModuleCoordinate, transitive: boolean): void => {
      const id = moduleId(coordinate);
      const versions = requested.get(id) ?? [];
      if (!versions.some((v) => v.version === coordinate.version)) versions.push(coordinate);
      requested.set(id, versions);

      const key = formatCoordinate(coordinate);
      if (!transitive || walked.has(key)) return;
      walked.add(key);
      for (const dep of modules.get(key)?.dependencies ?? []) {
        if (!dep.optional && !excluded(dep.coordinate)) walk(dep.coordinate, true);
      }
    };
    for (const d of request.dependencies) {
      if (!excluded(d.coordinate)) walk(d.coordinate, d.transitive && d.extension === undefined);
    }

    const selected = new Map<string, string>();
    for (const [id, versions] of requested) {
      const [first, ...rest] = versions;
      if (first === undefined) continue;
      if (rest.length > 0 && this.options.failOnVersionConflict === true) {
        errors.push(
          new ResolutionError(
            first,
            role,
            `version conflict on ${id}: ${versions.map((v) => v.version).join(', ')}`,
          ),
        );
      }
      const best = rest.reduce((a, b) => (compareVersions(b.version, a.version) > 0 ? b : a), first);
      selected.set(id, best.version);
    }
    if (errors.length > 0) return { artifacts: [], errors };

    // Pass 2: artifacts of the selected versions.
    const artifacts = new Map<string, ResolvedArtifact>();
    const expanded = new Set<string>();
    const emit = (
      requestedCoordinate: ModuleCoordinate,
      classifier: string | undefined,
      extension: string | undefined,
      transitive: boolean,
    ): void => {
      const id = moduleId(requestedCoordinate);
      const coordinate = { ...requestedCoordinate, version: selected.get(id) ?? requestedCoordinate.version };
      const module = modules.get(formatCoordinate(coordinate));
      if (module === undefined) {
        errors.push(new ResolutionError(coordinate, role, `not found in ${this.describeRepositories()}`));
        return;
      }

      if (extension !== undefined || classifier !== undefined || module.type !== POM_TYPE) {
        const ext = extension ?? primaryExtension(module);
        const key = artifactKey(ext, classifier);
        const file = module.artifacts.get(key);
        if (file === undefined) {
          errors.push(new ResolutionError(coordinate, role, `no '${key}' artifact in the catalog`));
        } else if (!artifacts.has(`${id}:${key}`)) {
          artifacts.set(`${id}:${key}`, { coordinate, type: module.type, classifier, extension: ext, file });
        }
      }

      if (!transitive || expanded.has(id)) return;
      expanded.add(id);
      for (const dep of module.dependencies) {
        if (!dep.optional && !excluded(dep.coordinate)) emit(dep.coordinate, undefined, undefined, true);
      }
    };
    for (const d of request.dependencies) {
      if (!excluded(d.coordinate)) {
        emit(d.coordinate, d.classifier, d.extension, d.transitive && d.extension === undefined);
      }
    }

    const resolved = Array.from(artifacts.values());
    await Promise.all(
      resolved.map(async (artifact) => {
        if (!(await fileExists(artifact.file))) {
          errors.push(new ResolutionError(artifact.coordinate, role, `artifact file missing: ${artifact.file}`));
        }
      }),
    );
    return { artifacts: resolved, errors };
  }

  private modules(): Promise<ReadonlyMap<string, CatalogModule>> {
    this.index ??= Promise.all(this.repositories.map((r) => loadCatalog(r))).then(indexCatalogs);
    return this.index;
  }

  private describeRepositories(): string {
    return this.repositories.length === 0
      ? 'any repository (none configured)'
      : `repositories: ${this.repositories.join(', ')}`;
  }
}

function indexCatalogs(catalogs: ReadonlyArray<Catalog>): ReadonlyMap<string, CatalogModule> {
  const index = new Map<string, CatalogModule>();
  for (const catalog of catalogs) {
    for (const module of catalog.modules) {
      const key = formatCoordinate(module.coordinate);
      if (!index.has(key)) index.set(key, module);
    }
  }
  return index;
}

/** The module's own artifact: its packaging type when it has one, else its jar. */
function primaryExtension(module: CatalogModule): string {
  return module.artifacts.has(module.type) ? module.type : 'jar';
}

function isExcluded(coordinate: ModuleCoordinate, rules: ReadonlyArray<ExclusionRule>): boolean {
  return rules.some((r) => r.group === coordinate.group && r.module === coordinate.name);
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return false;
    throw err;
  }
}
