/**
 * hpikit Engine: Role Types
 *
 * A role is a named dependency bucket. The set of roles is fixed: it is an
 * enumeration, not an open-ended registry. Relationships between roles are
 * explicit adjacency lists held by the RoleGraph.
 */

// ---------------------------------------------------------------------------
// Role Identifiers
// ---------------------------------------------------------------------------

/**
 * Every role known to hpikit.
 *
 * The first group describes the extension's relationship with the host
 * platform. The second group is the standard compile/runtime/test layout
 * the extension roles feed into.
 */
export enum RoleId {
  // Host platform roles
  /** Host core version the extension is built against. */
  Core = 'jenkinsCore',
  /** Required host extensions. */
  Plugins = 'jenkinsPlugins',
  /** Optional host extensions. */
  OptionalPlugins = 'optionalJenkinsPlugins',
  /** Extensions installed into an ephemeral development instance. */
  ServerPlugins = 'jenkinsServer',
  /** Host extensions needed only by tests. */
  TestPlugins = 'jenkinsTest',
  /** The host's runnable war. Test scope only. */
  War = 'jenkinsWar',
  /** Every extension archive the tests need installed. */
  PluginResources = 'pluginResources',

  // Standard build roles
  Implementation = 'implementation',
  RuntimeOnly = 'runtimeOnly',
  /** Compile-visible, supplied by the host at run time, never bundled. */
  ProvidedCompile = 'providedCompile',
  ProvidedRuntime = 'providedRuntime',
  TestImplementation = 'testImplementation',
  TestRuntimeOnly = 'testRuntimeOnly',
  CompileClasspath = 'compileClasspath',
  RuntimeClasspath = 'runtimeClasspath',
  TestCompileClasspath = 'testCompileClasspath',
  TestRuntimeClasspath = 'testRuntimeClasspath',
}

const ROLE_IDS = new Set<string>(Object.values(RoleId));

/** Narrow an arbitrary string to a RoleId. */
export function isRoleId(value: string): value is RoleId {
  return ROLE_IDS.has(value);
}

// ---------------------------------------------------------------------------
// Role Attributes
// ---------------------------------------------------------------------------

/**
 * Whether a role is shown to consumers of the project. All host platform
 * roles are hidden: they never leak into a published dependency listing.
 */
export enum RoleVisibility {
  Hidden = 'hidden',
  Exposed = 'exposed',
}

/** A module that is always dropped from a role's resolution. */
export interface ExclusionRule {
  readonly group: string;
  readonly module: string;
}

/**
 * Read-only view of a declared role.
 */
export interface RoleHandle {
  readonly id: RoleId;
  readonly visibility: RoleVisibility;
  readonly description: string;
  /** Roles through which this role's dependencies are re-exposed. */
  readonly extendsInto: ReadonlyArray<RoleId>;
  readonly exclusions: ReadonlyArray<ExclusionRule>;
}
