/**
 * hpikit Engine: Build Configuration
 *
 * The single explicit configuration object passed into resolution and
 * assembly. It holds the role graph, the project metadata, the packaging
 * options, every dependency declared on a role, and the deferred scope
 * rewrites.
 *
 * Two phases:
 *   1. declare: declarations, rewrites and option changes accumulate
 *   2. frozen : freeze() is called once; every later mutation raises a
 *      ConfigurationError instead of being silently ignored
 *
 * Nothing in the engine reads ambient global state; a second project in
 * the same process gets its own BuildConfiguration.
 */

import { ConfigurationError } from '../errors.js';
import { createStandardRoleGraph, PLUGIN_RESOURCE_SOURCES, STANDARD_REWRITES } from '../roles/standard-roles.js';
import type { RewritePair } from '../roles/standard-roles.js';
import type { RoleGraph } from '../roles/role-graph.js';
import type { DependencyDeclaration } from '../types/coordinate.js';
import { formatCoordinate, parseDependencyNotation } from '../types/coordinate.js';
import type { PackagingOptions, ProjectMetadata } from '../types/project.js';
import { DEFAULT_PACKAGING_OPTIONS } from '../types/project.js';
import { RoleId } from '../types/role.js';

export interface BuildConfigurationInit {
  readonly project: ProjectMetadata;
  readonly options?: Partial<PackagingOptions> | undefined;
  /** Defaults to the standard role graph with the standard rewrites. */
  readonly roles?: RoleGraph | undefined;
}

export class BuildConfiguration {
  readonly roles: RoleGraph;
  private projectMetadata: ProjectMetadata;
  private packagingOptions: PackagingOptions;
  private readonly declarations: Map<RoleId, DependencyDeclaration[]> = new Map();
  private readonly rewrites: RewritePair[] = [];
  private frozen = false;

  constructor(init: BuildConfigurationInit) {
    this.projectMetadata = init.project;
    this.packagingOptions = { ...DEFAULT_PACKAGING_OPTIONS, ...init.options };
    if (init.roles !== undefined) {
      this.roles = init.roles;
    } else {
      this.roles = createStandardRoleGraph();
      for (const pair of STANDARD_REWRITES) {
        this.rewrite(pair.source, pair.target);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Declare phase
  // -------------------------------------------------------------------------

  /**
   * Declare a dependency on a role. Accepts a declaration or
   * `group:name:version[:classifier][@ext]` notation. Declaring the same
   * artifact twice on one role keeps the first declaration.
   *
   * @throws {ConfigurationError} If frozen, the role is unknown, or the
   *   notation is malformed
   */
  declare(role: RoleId, dependency: DependencyDeclaration | string): void {
    this.assertMutable(`declare a dependency on '${role}'`);
    this.roles.get(role);

    const declaration = typeof dependency === 'string'
      ? parseDependencyNotation(dependency)
      : dependency;
    if (declaration === null) {
      throw new ConfigurationError(
        `Malformed dependency notation on '${role}': "${String(dependency)}". ` +
          `Expected group:name:version[:classifier][@extension].`,
      );
    }

    const existing = this.declarations.get(role) ?? [];
    if (!existing.some((d) => sameArtifact(d, declaration))) {
      existing.push(declaration);
    }
    this.declarations.set(role, existing);
  }

  /**
   * Register a deferred scope rewrite. It fires the first time `target`'s
   * dependency set is read after freeze(). Registering a pair twice has no
   * effect.
   */
  rewrite(source: RoleId, target: RoleId): void {
    this.assertMutable(`register a rewrite from '${source}' into '${target}'`);
    this.roles.get(source);
    this.roles.get(target);
    if (!this.rewrites.some((r) => r.source === source && r.target === target)) {
      this.rewrites.push({ source, target });
    }
  }

  /** Replace project metadata fields. */
  updateProject(patch: Partial<ProjectMetadata>): void {
    this.assertMutable('update project metadata');
    this.projectMetadata = { ...this.projectMetadata, ...patch };
  }

  /** Replace packaging options. */
  updateOptions(patch: Partial<PackagingOptions>): void {
    this.assertMutable('update packaging options');
    this.packagingOptions = { ...this.packagingOptions, ...patch };
  }

  /**
   * End the declare phase.
   *
   * Before freezing, every direct dependency of the plugin roles is
   * re-declared on pluginResources as plain `group:name:version`, so the
   * test harness sees exactly the extension archives the build declared.
   * Idempotent.
   */
  freeze(): void {
    if (this.frozen) return;
    if (this.roles.has(RoleId.PluginResources)) {
      for (const source of PLUGIN_RESOURCE_SOURCES) {
        if (!this.roles.has(source)) continue;
        for (const d of this.dependencies(source)) {
          this.declare(RoleId.PluginResources, {
            coordinate: d.coordinate,
            transitive: true,
            reason: `declared on ${source}`,
          });
        }
      }
    }
    this.frozen = true;
    this.roles.freeze();
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  get isFrozen(): boolean {
    return this.frozen;
  }

  get project(): ProjectMetadata {
    return this.projectMetadata;
  }

  get options(): PackagingOptions {
    return this.packagingOptions;
  }

  /** Declarations made directly on `role` (not inherited). */
  dependencies(role: RoleId): ReadonlyArray<DependencyDeclaration> {
    this.roles.get(role);
    return [...(this.declarations.get(role) ?? [])];
  }

  /** Rewrites that feed into `target`, in registration order. */
  rewritesInto(target: RoleId): ReadonlyArray<RewritePair> {
    return this.rewrites.filter((r) => r.target === target);
  }

  /** All registered rewrites, in registration order. */
  listRewrites(): ReadonlyArray<RewritePair> {
    return [...this.rewrites];
  }

  private assertMutable(action: string): void {
    if (this.frozen) {
      throw new ConfigurationError(
        `Cannot ${action}: the build configuration is frozen. ` +
          `Declarations must be complete before resolution starts.`,
      );
    }
  }
}

function sameArtifact(a: DependencyDeclaration, b: DependencyDeclaration): boolean {
  return formatCoordinate(a.coordinate) === formatCoordinate(b.coordinate) &&
    a.classifier === b.classifier &&
    a.extension === b.extension;
}
