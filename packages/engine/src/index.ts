/**
 * @hpikit/engine
 *
 * Dependency-role resolution and archive planning for host-platform
 * extensions: role graph, artifact classifier, scope rewriter, resolution
 * session, manifest assembler and package assembler.
 *
 * This package performs no filesystem or network I/O. node:crypto is used
 * for fingerprint hashing (pure computation). Resolvers, archive writers
 * and license reports are reached through the capability interfaces in
 * adapters/; @hpikit/runtime-host implements them.
 */

// Types
export * from './types/index.js';

// Errors
export { AssemblyError, ConfigurationError, HpikitError, ResolutionError } from './errors.js';

// Capability interfaces
export type {
  ArchiveEntry,
  ArchiveWriter,
  ArtifactResolver,
  BuildInputStore,
  LicenseReport,
  LicenseReportEntry,
  ResolutionRequest,
  ResolutionResult,
} from './adapters/index.js';
export { EMPTY_LICENSE_REPORT } from './adapters/index.js';

// Logging
export type { BuildEvent } from './logging/build-log.js';
export { BuildEventKind, BuildLogger } from './logging/build-log.js';
export type { LogSink } from './logging/log-sink.js';

// Role graph
export { RoleGraph } from './roles/role-graph.js';
export type { RewritePair } from './roles/standard-roles.js';
export {
  PLUGIN_RESOURCE_SOURCES,
  STANDARD_REWRITES,
  TEST_ROLE_EXCLUSIONS,
  createStandardRoleGraph,
} from './roles/standard-roles.js';

// Classification
export { ArtifactKind, HOST_EXTENSION_TYPES, classify, isHostExtension } from './classify/classifier.js';

// Configuration and resolution
export type { BuildConfigurationInit } from './configuration/build-configuration.js';
export { BuildConfiguration } from './configuration/build-configuration.js';
export type { RewrittenDependency, RoleResolveFn } from './rewrite/scope-rewriter.js';
export { ScopeRewriter, rewrittenReason } from './rewrite/scope-rewriter.js';
export type { ResolvedRole } from './resolution/session.js';
export { ResolutionSession, classpathOf } from './resolution/session.js';
export { compareVersions, newerVersion } from './resolution/version-compare.js';

// Manifest
export type { Fingerprint } from './manifest/fingerprint.js';
export { canonicalize, fingerprint } from './manifest/fingerprint.js';
export type { ManifestAttributes } from './manifest/manifest-format.js';
export { getAttribute, mergeAttributes, parseManifest, renderManifest } from './manifest/manifest-format.js';
export type {
  ManifestApplication,
  ManifestMetadata,
  PluginDependency,
} from './manifest/manifest-assembler.js';
export {
  ArchiveManifest,
  MANIFEST_INPUT,
  ManifestAssembler,
  manifestMetadataOf,
} from './manifest/manifest-assembler.js';

// Packaging
export type { PackageDescriptor } from './package/descriptor.js';
export {
  PLUGIN_NAME_SUFFIX,
  createPackageDescriptor,
  descriptorFor,
  excludedModules,
  resolveShortName,
} from './package/descriptor.js';
export type {
  AssembledPackage,
  PackageInputs,
  PackagePlan,
} from './package/package-assembler.js';
export {
  LIBRARY_DIR,
  MANIFEST_PATH,
  METADATA_DIR,
  PackageAssembler,
} from './package/package-assembler.js';
export type { TestDependencyCopy, TestDependencyPlan } from './package/test-dependencies.js';
export { TEST_DEPENDENCIES_INDEX, planTestDependencies } from './package/test-dependencies.js';
export type { TestHplLayout } from './package/test-hpl.js';
export { TEST_HPL_NAME, renderTestHpl } from './package/test-hpl.js';
