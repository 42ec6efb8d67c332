/**
 * @hpikit/runtime-host
 *
 * Side-effecting implementations of the engine's capability interfaces,
 * plus project loading and the build pipeline. Depends on @hpikit/engine;
 * the engine never imports from here.
 */

// Archives
export { FIXED_ENTRY_DATE, ZipArchiveWriter, listZipEntries, readZipEntry } from './archive/zip-archive-writer.js';
export type { ZipWriterOptions } from './archive/zip-archive-writer.js';
export { buildLibraryJar, readExistingManifest } from './archive/library-jar.js';
export type { LibraryJarInputs } from './archive/library-jar.js';
export { writeTestDependencies } from './archive/test-dependencies.js';
export { DirectoryLicenseReport } from './license/directory-license-report.js';

// Resolution
export { CATALOG_FILE, loadCatalog, validateCatalog } from './resolution/catalog.js';
export type { Catalog, CatalogDependency, CatalogModule } from './resolution/catalog.js';
export { CatalogResolver } from './resolution/catalog-resolver.js';
export type { CatalogResolverOptions } from './resolution/catalog-resolver.js';
export { repositoriesFor } from './resolution/repositories.js';

// Configuration
export {
  PROJECT_DESCRIPTOR,
  ProjectConfigValidator,
  loadProjectConfig,
  toBuildConfiguration,
} from './config/project-config.js';
export type { ProjectConfig, ProjectOverrides, ProjectPaths, RoleDeclaration } from './config/project-config.js';
export { HOME_ENV_VAR, PROJECT_STATE_DIR, REPOSITORY_DIR, projectStateDir, resolveHpikitHome } from './home.js';
export type { ResolveHomeOptions } from './home.js';

// State and logging
export { FileStateIO, MemoryStateIO } from './state/state-io.js';
export type { StateIO } from './state/state-io.js';
export { BUILD_INPUTS_FILE, StateBuildInputStore } from './state/build-input-store.js';
export { BUILD_EVENTS_LOG, FileLogSink, TeeLogSink } from './logging/file-log-sink.js';
export { monotonicUlid, ulid } from './logging/ulid.js';
export type { UlidFactory } from './logging/ulid.js';

// Pipeline
export {
  openProject,
  packagePlugin,
  previewManifest,
  writeProjectTestDependencies,
  writeTestHpl,
} from './pipeline/build.js';
export type { BuildContext, OpenProjectOptions, PackageResult } from './pipeline/build.js';
