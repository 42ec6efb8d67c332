/**
 * hpikit Engine: Role Graph
 *
 * A small, fixed, directed graph over RoleId. An edge `role → target`
 * ("role extends into target") means that everything resolved for `role`
 * is also visible wherever `target` is resolved.
 *
 * Graph invariants:
 * - A role is declared exactly once
 * - Edges never form a cycle. Every declareExtends() checks reachability
 *   before recording the edge, so a cycle is rejected at construction time,
 *   long before any resolution is attempted.
 * - After freeze() the graph is immutable
 */

import { ConfigurationError } from '../errors.js';
import type { ExclusionRule, RoleHandle } from '../types/role.js';
import { RoleId, RoleVisibility } from '../types/role.js';

interface RoleEntry {
  readonly id: RoleId;
  readonly visibility: RoleVisibility;
  readonly description: string;
  readonly extendsInto: RoleId[];
  readonly exclusions: ExclusionRule[];
}

/**
 * Adjacency-list role graph with construction-time cycle detection.
 */
export class RoleGraph {
  // Map iteration order is insertion order: this is the declaration order
  // used for every deterministic tie-break in the engine.
  private readonly roles: Map<RoleId, RoleEntry> = new Map();
  private frozen = false;

  /**
   * Declare a role.
   *
   * @throws {ConfigurationError} If the role already exists or the graph is frozen
   */
  defineRole(
    id: RoleId,
    visibility: RoleVisibility = RoleVisibility.Hidden,
    description = '',
  ): RoleHandle {
    this.assertMutable(`define role '${id}'`);
    if (this.roles.has(id)) {
      throw new ConfigurationError(`Role already declared: ${id}`);
    }
    const entry: RoleEntry = { id, visibility, description, extendsInto: [], exclusions: [] };
    this.roles.set(id, entry);
    return toHandle(entry);
  }

  /**
   * Record that `role`'s resolved dependencies are re-exposed through
   * `target`. Declaring an existing edge again has no effect.
   *
   * @throws {ConfigurationError} If either role is undeclared, the graph is
   *   frozen, or the edge would close a cycle
   */
  declareExtends(role: RoleId, target: RoleId): void {
    this.assertMutable(`declare '${role}' extends into '${target}'`);
    const source = this.entry(role);
    this.entry(target);

    if (source.extendsInto.includes(target)) return;

    // A new edge role → target closes a cycle iff role is already
    // reachable from target.
    const path = this.findPath(target, role);
    if (path !== null) {
      throw new ConfigurationError(
        `Role graph cycle: ${[role, ...path].join(' -> ')}. ` +
          `'${role}' cannot extend into '${target}'.`,
      );
    }
    source.extendsInto.push(target);
  }

  /**
   * Drop a module from everything `role` contributes to a resolution.
   */
  excludeModule(role: RoleId, rule: ExclusionRule): void {
    this.assertMutable(`add exclusion to '${role}'`);
    const entry = this.entry(role);
    const exists = entry.exclusions.some(
      (e) => e.group === rule.group && e.module === rule.module,
    );
    if (!exists) {
      entry.exclusions.push({ group: rule.group, module: rule.module });
    }
  }

  /**
   * Look up a declared role.
   *
   * @throws {ConfigurationError} If the role was never declared
   */
  get(id: RoleId): RoleHandle {
    return toHandle(this.entry(id));
  }

  has(id: RoleId): boolean {
    return this.roles.has(id);
  }

  /** All roles, in declaration order. */
  list(): ReadonlyArray<RoleHandle> {
    return Array.from(this.roles.values()).map(toHandle);
  }

  /**
   * Every role whose dependencies are visible through `target`: the target
   * itself and all roles that reach it along extends edges. Returned in
   * declaration order.
   */
  lineage(target: RoleId): ReadonlyArray<RoleId> {
    this.entry(target);
    const reaching = new Set<RoleId>([target]);
    let changed = true;
    while (changed) {
      changed = false;
      for (const entry of this.roles.values()) {
        if (reaching.has(entry.id)) continue;
        if (entry.extendsInto.some((t) => reaching.has(t))) {
          reaching.add(entry.id);
          changed = true;
        }
      }
    }
    return Array.from(this.roles.keys()).filter((id) => reaching.has(id));
  }

  /**
   * Roles ordered sources-before-targets (Kahn's algorithm). Ties are broken
   * by declaration order, so the result is stable.
   */
  topologicalOrder(): ReadonlyArray<RoleId> {
    const inDegree = new Map<RoleId, number>();
    for (const id of this.roles.keys()) inDegree.set(id, 0);
    for (const entry of this.roles.values()) {
      for (const target of entry.extendsInto) {
        inDegree.set(target, (inDegree.get(target) ?? 0) + 1);
      }
    }

    const order: RoleId[] = [];
    const ready = Array.from(this.roles.keys()).filter((id) => inDegree.get(id) === 0);
    while (ready.length > 0) {
      const current = ready.shift();
      if (current === undefined) break;
      order.push(current);
      for (const target of this.entry(current).extendsInto) {
        const degree = (inDegree.get(target) ?? 0) - 1;
        inDegree.set(target, degree);
        if (degree === 0) ready.push(target);
      }
    }
    return order;
  }

  /**
   * Mark the graph as immutable. Idempotent.
   */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private entry(id: RoleId): RoleEntry {
    const entry = this.roles.get(id);
    if (entry === undefined) {
      throw new ConfigurationError(`Unknown role: ${id}`);
    }
    return entry;
  }

  private assertMutable(action: string): void {
    if (this.frozen) {
      throw new ConfigurationError(`Cannot ${action}: the role graph is frozen`);
    }
  }

  /**
   * Depth-first search for a path `from → ... → to` along extends edges.
   * Returns the path including both endpoints, or null.
   */
  private findPath(from: RoleId, to: RoleId): RoleId[] | null {
    const visited = new Set<RoleId>();
    const walk = (current: RoleId): RoleId[] | null => {
      if (current === to) return [current];
      if (visited.has(current)) return null;
      visited.add(current);
      for (const next of this.entry(current).extendsInto) {
        const rest = walk(next);
        if (rest !== null) return [current, ...rest];
      }
      return null;
    };
    return walk(from);
  }
}

function toHandle(entry: RoleEntry): RoleHandle {
  return {
    id: entry.id,
    visibility: entry.visibility,
    description: entry.description,
    extendsInto: [...entry.extendsInto],
    exclusions: [...entry.exclusions],
  };
}
