/**
 * hpikit Engine: Standard Role Layout
 *
 * The fixed role configuration every extension build starts from.
 *
 *   jenkinsCore ───────────┐
 *   jenkinsPlugins ────────┼─▶ providedCompile ─▶ compileClasspath ─▶ testCompileClasspath
 *   optionalJenkinsPlugins ┘         │
 *                                    ▼
 *                            providedRuntime ─▶ runtimeClasspath ─▶ testRuntimeClasspath
 *
 *   jenkinsTest ─▶ testImplementation ─▶ testCompileClasspath, testRuntimeClasspath
 *
 * jenkinsServer, jenkinsWar and pluginResources are never classpath-visible.
 */

import { RoleGraph } from './role-graph.js';
import { RoleId, RoleVisibility } from '../types/role.js';

/** A deferred (source, target) scope rewrite. */
export interface RewritePair {
  readonly source: RoleId;
  readonly target: RoleId;
}

/**
 * The three rewrites of the standard layout. Host extensions declared on
 * the source role are compiled against but never bundled: the host supplies
 * them at run time through its own extension-dependency mechanism.
 */
export const STANDARD_REWRITES: ReadonlyArray<RewritePair> = [
  { source: RoleId.Plugins, target: RoleId.ProvidedCompile },
  { source: RoleId.OptionalPlugins, target: RoleId.ProvidedCompile },
  { source: RoleId.TestPlugins, target: RoleId.TestImplementation },
];

/**
 * Roles whose direct dependencies are re-declared on pluginResources so the
 * test harness can install them.
 */
export const PLUGIN_RESOURCE_SOURCES: ReadonlyArray<RoleId> = [
  RoleId.Plugins,
  RoleId.OptionalPlugins,
  RoleId.ServerPlugins,
  RoleId.TestPlugins,
];

/** Modules the host's test role must never pull in. */
export const TEST_ROLE_EXCLUSIONS = [
  { group: 'org.jenkins-ci.modules', module: 'ssh-cli-auth' },
  { group: 'org.jenkins-ci.modules', module: 'sshd' },
] as const;

/**
 * Build the standard role graph. The returned graph is not frozen; callers
 * may still add roles or edges before handing it to a BuildConfiguration.
 */
export function createStandardRoleGraph(): RoleGraph {
  const graph = new RoleGraph();
  const { Hidden, Exposed } = RoleVisibility;

  // Standard build roles first: declaration order is resolution order.
  graph.defineRole(RoleId.Implementation, Exposed, 'Implementation dependencies, bundled');
  graph.defineRole(RoleId.RuntimeOnly, Exposed, 'Runtime-only dependencies, bundled');
  graph.defineRole(RoleId.ProvidedCompile, Hidden, 'Compile-visible dependencies supplied by the host');
  graph.defineRole(RoleId.ProvidedRuntime, Hidden, 'Runtime dependencies supplied by the host');
  graph.defineRole(RoleId.TestImplementation, Exposed, 'Test dependencies');
  graph.defineRole(RoleId.TestRuntimeOnly, Exposed, 'Test runtime-only dependencies');
  graph.defineRole(RoleId.CompileClasspath, Hidden, 'Compile classpath');
  graph.defineRole(RoleId.RuntimeClasspath, Hidden, 'Runtime classpath');
  graph.defineRole(RoleId.TestCompileClasspath, Hidden, 'Test compile classpath');
  graph.defineRole(RoleId.TestRuntimeClasspath, Hidden, 'Test runtime classpath');

  graph.defineRole(RoleId.Core, Hidden, 'Jenkins core that your plugin is built against');
  graph.defineRole(RoleId.Plugins, Hidden, 'Jenkins plugins which your plugin is built against');
  graph.defineRole(
    RoleId.OptionalPlugins,
    Hidden,
    'Optional Jenkins plugins dependencies which your plugin is built against',
  );
  graph.defineRole(RoleId.ServerPlugins, Hidden, 'Jenkins plugins which will be installed by the server task');
  graph.defineRole(RoleId.TestPlugins, Hidden, 'Jenkins plugin test dependencies.');
  graph.defineRole(RoleId.War, Hidden, 'Jenkins war that corresponds to the Jenkins core');
  graph.defineRole(RoleId.PluginResources, Hidden, 'Jenkins plugins installed for the test harness');

  for (const rule of TEST_ROLE_EXCLUSIONS) {
    graph.excludeModule(RoleId.TestPlugins, rule);
  }

  graph.declareExtends(RoleId.Implementation, RoleId.CompileClasspath);
  graph.declareExtends(RoleId.Implementation, RoleId.RuntimeClasspath);
  graph.declareExtends(RoleId.Implementation, RoleId.TestImplementation);
  graph.declareExtends(RoleId.RuntimeOnly, RoleId.RuntimeClasspath);
  graph.declareExtends(RoleId.ProvidedCompile, RoleId.CompileClasspath);
  graph.declareExtends(RoleId.ProvidedCompile, RoleId.ProvidedRuntime);
  graph.declareExtends(RoleId.ProvidedRuntime, RoleId.RuntimeClasspath);
  graph.declareExtends(RoleId.TestImplementation, RoleId.TestCompileClasspath);
  graph.declareExtends(RoleId.TestImplementation, RoleId.TestRuntimeClasspath);
  graph.declareExtends(RoleId.TestRuntimeOnly, RoleId.TestRuntimeClasspath);
  graph.declareExtends(RoleId.CompileClasspath, RoleId.TestCompileClasspath);
  graph.declareExtends(RoleId.RuntimeClasspath, RoleId.TestRuntimeClasspath);

  graph.declareExtends(RoleId.Core, RoleId.ProvidedCompile);
  graph.declareExtends(RoleId.Plugins, RoleId.ProvidedCompile);
  graph.declareExtends(RoleId.OptionalPlugins, RoleId.ProvidedCompile);
  graph.declareExtends(RoleId.TestPlugins, RoleId.TestImplementation);

  return graph;
}
