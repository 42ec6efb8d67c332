/**
 * hpikit Engine: Resolution Session
 *
 * Resolves roles of a frozen BuildConfiguration.
 *
 * Reading a role's dependency set is what triggers its deferred rewrites:
 * the first resolve() that touches a role with registered rewrites runs
 * them, exactly once, before that role's declarations go to the resolver.
 *
 * A role is resolved as one request covering its whole lineage:
 * - the declarations of every lineage role (own plus rewritten), in
 *   lineage order, duplicates dropped
 * - the exclusions of every lineage role, so a rule on a role holds on
 *   every role it extends into
 * - the resolver selects one version per module across the lineage, so a
 *   losing version's own dependencies never reach the result
 *
 * Artifacts are then keyed by module identity, classifier and extension;
 * should a resolver still deliver two versions of one key, the newer wins.
 */

import type { ArtifactResolver } from '../adapters/index.js';
import type { BuildConfiguration } from '../configuration/build-configuration.js';
import { ConfigurationError } from '../errors.js';
import { BuildEventKind, BuildLogger } from '../logging/build-log.js';
import { ScopeRewriter } from '../rewrite/scope-rewriter.js';
import type { RewrittenDependency } from '../rewrite/scope-rewriter.js';
import type { DependencyDeclaration, ResolvedArtifact } from '../types/coordinate.js';
import { formatCoordinate, moduleId } from '../types/coordinate.js';
import type { ExclusionRule, RoleId } from '../types/role.js';
import { compareVersions } from './version-compare.js';

/**
 * The resolved contents of a role, including everything inherited through
 * the role graph.
 */
export interface ResolvedRole {
  readonly role: RoleId;
  readonly artifacts: ReadonlyArray<ResolvedArtifact>;
}

/**
 * Files of a resolved role that belong on a classpath: jar artifacts only.
 * Host-extension archives (`.hpi`, `.jpi`) are not class containers; their
 * jars reach the classpath through rewritten `@jar` declarations.
 */
export function classpathOf(resolved: ResolvedRole): ReadonlyArray<string> {
  return resolved.artifacts.filter((a) => a.extension === 'jar').map((a) => a.file);
}

export class ResolutionSession {
  private readonly rewriter: ScopeRewriter;
  private readonly fired: Map<RoleId, Promise<void>> = new Map();
  private readonly merged: Map<RoleId, Promise<ResolvedRole>> = new Map();

  /**
   * @throws {ConfigurationError} If the configuration is not frozen, or a
   *   rewrite's source can see its own target (it would wait on itself)
   */
  constructor(
    private readonly configuration: BuildConfiguration,
    private readonly resolver: ArtifactResolver,
    private readonly logger: BuildLogger = new BuildLogger(),
  ) {
    if (!configuration.isFrozen) {
      throw new ConfigurationError(
        'The build configuration must be frozen before resolution starts.',
      );
    }
    for (const pair of configuration.listRewrites()) {
      if (configuration.roles.lineage(pair.source).includes(pair.target)) {
        throw new ConfigurationError(
          `Rewrite from '${pair.source}' into '${pair.target}' reads its own target.`,
        );
      }
    }
    this.rewriter = new ScopeRewriter(
      async (role) => (await this.resolve(role)).artifacts,
      logger,
    );
    logger.record(
      BuildEventKind.ConfigurationFrozen,
      `${configuration.roles.list().length} role(s), ${configuration.listRewrites().length} deferred rewrite(s)`,
    );
  }

  /**
   * Resolve a role and everything visible through it. Memoized: resolving
   * the same role twice returns the same result.
   *
   * @throws {ResolutionError} Unchanged from the resolver
   */
  resolve(role: RoleId): Promise<ResolvedRole> {
    const cached = this.merged.get(role);
    if (cached !== undefined) return cached;
    const pending = this.resolveLineage(role);
    this.merged.set(role, pending);
    return pending;
  }

  /** Classpath files of `role` (jar artifacts, lineage included). */
  async classpath(role: RoleId): Promise<ReadonlyArray<string>> {
    return classpathOf(await this.resolve(role));
  }

  /** Declarations made on `role` itself, rewritten ones included. */
  async declarationsOf(role: RoleId): Promise<ReadonlyArray<DependencyDeclaration>> {
    await this.fireRewrites(role);
    return [...this.configuration.dependencies(role), ...this.rewriter.rewrittenFor(role)];
  }

  /** Rewritten declarations on `role`; fires its rewrites if needed. */
  async rewrittenFor(role: RoleId): Promise<ReadonlyArray<RewrittenDependency>> {
    await this.fireRewrites(role);
    return this.rewriter.rewrittenFor(role);
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private async resolveLineage(role: RoleId): Promise<ResolvedRole> {
    const lineage = this.configuration.roles.lineage(role);
    const perRole = await Promise.all(lineage.map((r) => this.declarationsOf(r)));
    const dependencies = uniqueDeclarations(perRole.flat());
    if (dependencies.length === 0) {
      this.logger.record(BuildEventKind.RoleResolved, '0 artifact(s)', role);
      return { role, artifacts: [] };
    }

    const result = await this.resolver.resolve({
      role,
      dependencies,
      exclusions: uniqueExclusions(lineage.flatMap((r) => this.configuration.roles.get(r).exclusions)),
    });
    const [firstError] = result.errors;
    if (firstError !== undefined) throw firstError;

    const byKey = new Map<string, ResolvedArtifact>();
    for (const artifact of result.artifacts) {
      const key = artifactKey(artifact);
      const current = byKey.get(key);
      if (
        current === undefined ||
        compareVersions(artifact.coordinate.version, current.coordinate.version) > 0
      ) {
        byKey.set(key, artifact);
      }
    }

    const artifacts = Array.from(byKey.values());
    this.logger.record(BuildEventKind.RoleResolved, `${artifacts.length} artifact(s)`, role);
    return { role, artifacts };
  }

  /** Fire the deferred rewrites into `target`, exactly once. */
  private fireRewrites(target: RoleId): Promise<void> {
    const cached = this.fired.get(target);
    if (cached !== undefined) return cached;

    const pairs = this.configuration.rewritesInto(target);
    const pending = pairs.length === 0
      ? Promise.resolve()
      : this.rewriter.rewriteAll(pairs).then(() => undefined);
    this.fired.set(target, pending);
    return pending;
  }
}

function artifactKey(artifact: ResolvedArtifact): string {
  return `${moduleId(artifact.coordinate)}:${artifact.classifier ?? ''}@${artifact.extension}`;
}

function uniqueDeclarations(
  declarations: ReadonlyArray<DependencyDeclaration>,
): ReadonlyArray<DependencyDeclaration> {
  const seen = new Set<string>();
  return declarations.filter((d) => {
    const key = `${formatCoordinate(d.coordinate)}:${d.classifier ?? ''}@${d.extension ?? ''}:${String(d.transitive)}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function uniqueExclusions(rules: ReadonlyArray<ExclusionRule>): ReadonlyArray<ExclusionRule> {
  const seen = new Set<string>();
  return rules.filter((rule) => {
    const key = `${rule.group}:${rule.module}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
