/**
 * hpikit Engine: Scope Rewriter
 *
 * Turns host extensions resolved for a source role into compile-visible,
 * non-bundled declarations on a target role.
 *
 * For every (source, target) rewrite:
 *   1. resolve `source` fully, through the injected resolve function;
 *      resolution errors propagate unchanged and are never retried
 *   2. classify each artifact and discard ordinary libraries
 *   3. declare each surviving host extension on `target` as
 *      `group:name:version@jar`, non-transitive, with provenance naming
 *      the source role
 *   4. keep one rewritten declaration per module per target; the first
 *      writer wins
 *
 * Extensions are compiled against but never bundled: the host supplies them
 * at run time, and bundling them would duplicate classes already present in
 * the running host.
 *
 * Writes to a target's rewritten set go through one queue per target, so
 * concurrent rewrites into the same target never interleave.
 */

import { isHostExtension } from '../classify/classifier.js';
import { BuildEventKind, BuildLogger } from '../logging/build-log.js';
import type { RewritePair } from '../roles/standard-roles.js';
import type { DependencyDeclaration, ModuleCoordinate, ResolvedArtifact } from '../types/coordinate.js';
import { formatCoordinate, moduleId } from '../types/coordinate.js';
import type { RoleId } from '../types/role.js';

/**
 * A declaration added by the rewriter. Never mutated after creation.
 */
export interface RewrittenDependency extends DependencyDeclaration {
  readonly extension: 'jar';
  readonly transitive: false;
  readonly reason: string;
  readonly sourceRole: RoleId;
  readonly targetRole: RoleId;
}

/** Resolves a role fully (transitively) and returns its artifacts. */
export type RoleResolveFn = (role: RoleId) => Promise<ReadonlyArray<ResolvedArtifact>>;

export function rewrittenReason(source: RoleId): string {
  return `added jar for compilation support (plugin present on ${source})`;
}

export class ScopeRewriter {
  // target → (module id → rewritten declaration), insertion ordered
  private readonly rewritten: Map<RoleId, Map<string, RewrittenDependency>> = new Map();
  private readonly queues: Map<RoleId, Promise<void>> = new Map();

  constructor(
    private readonly resolveRole: RoleResolveFn,
    private readonly logger: BuildLogger = new BuildLogger(),
  ) {}

  /**
   * Rewrite one (source, target) pair. Running the same pair again adds
   * nothing: every module it would produce is already present.
   *
   * @returns The declarations this call added (empty on a re-run)
   */
  async rewrite(source: RoleId, target: RoleId): Promise<ReadonlyArray<RewrittenDependency>> {
    const artifacts = await this.resolveRole(source);
    return this.enqueue(target, () => this.commit(source, target, artifacts));
  }

  /**
   * Run several rewrites. Sources are resolved concurrently; commits are
   * applied in the order the pairs are given, so when two sources produce
   * the same module for one target, the earlier pair wins.
   */
  async rewriteAll(pairs: ReadonlyArray<RewritePair>): Promise<ReadonlyArray<RewrittenDependency>> {
    const sources = [...new Set(pairs.map((p) => p.source))];
    const resolved = await Promise.all(sources.map((s) => this.resolveRole(s)));
    const bySource = new Map<RoleId, ReadonlyArray<ResolvedArtifact>>();
    sources.forEach((s, i) => bySource.set(s, resolved[i] ?? []));

    const added: RewrittenDependency[] = [];
    for (const pair of pairs) {
      const artifacts = bySource.get(pair.source) ?? [];
      added.push(...await this.enqueue(pair.target, () => this.commit(pair.source, pair.target, artifacts)));
    }
    return added;
  }

  /** Rewritten declarations on `target`, in the order they were added. */
  rewrittenFor(target: RoleId): ReadonlyArray<RewrittenDependency> {
    return Array.from(this.rewritten.get(target)?.values() ?? []);
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private commit(
    source: RoleId,
    target: RoleId,
    artifacts: ReadonlyArray<ResolvedArtifact>,
  ): ReadonlyArray<RewrittenDependency> {
    const existing = this.rewritten.get(target) ?? new Map<string, RewrittenDependency>();
    this.rewritten.set(target, existing);

    const added: RewrittenDependency[] = [];
    for (const artifact of artifacts) {
      if (!isHostExtension(artifact)) continue;

      const id = moduleId(artifact.coordinate);
      const winner = existing.get(id);
      if (winner !== undefined) {
        if (winner.sourceRole !== source || formatCoordinate(winner.coordinate) !== formatCoordinate(artifact.coordinate)) {
          this.logger.record(
            BuildEventKind.RewriteDuplicate,
            `${formatCoordinate(artifact.coordinate)} from ${source} already added from ${winner.sourceRole}`,
            target,
          );
        }
        continue;
      }

      const dependency = toRewrittenDependency(artifact.coordinate, source, target);
      existing.set(id, dependency);
      added.push(dependency);
      this.logger.record(
        BuildEventKind.RewriteAdded,
        `${formatCoordinate(dependency.coordinate)}@jar: ${dependency.reason}`,
        target,
      );
    }
    return added;
  }

  /**
   * Chain `work` after everything already queued for `target`. A failed
   * step does not poison the queue for later callers.
   */
  private enqueue<T>(target: RoleId, work: () => T): Promise<T> {
    const previous = this.queues.get(target) ?? Promise.resolve();
    const current = previous.then(work);
    this.queues.set(target, current.then(() => undefined, () => undefined));
    return current;
  }
}

function toRewrittenDependency(
  coordinate: ModuleCoordinate,
  sourceRole: RoleId,
  targetRole: RoleId,
): RewrittenDependency {
  return {
    coordinate: { group: coordinate.group, name: coordinate.name, version: coordinate.version },
    extension: 'jar',
    transitive: false,
    reason: rewrittenReason(sourceRole),
    sourceRole,
    targetRole,
  };
}
