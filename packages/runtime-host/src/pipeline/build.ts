/**
 * hpikit Runtime Host: Build Pipeline
 *
 * Wires the engine to the file system for one project:
 *
 *   openProject()          descriptor → frozen configuration → session
 *   packagePlugin()        library jar + container archive
 *   writeProjectTestDependencies()  test-dependencies/ directory
 *   writeTestHpl()         the.hpl for in-place testing
 *   previewManifest()      manifest text, nothing recorded
 *
 * Each step resolves only the roles it needs; the session memoizes, so
 * running several steps on one context resolves each role once.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ArchiveManifest,
  BuildLogger,
  ManifestAssembler,
  PackageAssembler,
  ResolutionSession,
  RoleId,
  TEST_HPL_NAME,
  classpathOf,
  descriptorFor,
  excludedModules,
  manifestMetadataOf,
  moduleId,
  planTestDependencies,
  renderManifest,
  renderTestHpl,
} from '@hpikit/engine';
import type {
  ArchiveWriter,
  ArtifactResolver,
  AssembledPackage,
  BuildConfiguration,
  Fingerprint,
  LogSink,
  PackageDescriptor,
} from '@hpikit/engine';
import { buildLibraryJar, readExistingManifest } from '../archive/library-jar.js';
import { writeTestDependencies } from '../archive/test-dependencies.js';
import { ZipArchiveWriter } from '../archive/zip-archive-writer.js';
import { loadProjectConfig, toBuildConfiguration } from '../config/project-config.js';
import type { ProjectConfig, ProjectOverrides } from '../config/project-config.js';
import { projectStateDir, resolveHpikitHome } from '../home.js';
import { DirectoryLicenseReport } from '../license/directory-license-report.js';
import { FileLogSink, TeeLogSink } from '../logging/file-log-sink.js';
import { CatalogResolver } from '../resolution/catalog-resolver.js';
import { repositoriesFor } from '../resolution/repositories.js';
import { StateBuildInputStore } from '../state/build-input-store.js';
import { FileStateIO } from '../state/state-io.js';
import type { StateIO } from '../state/state-io.js';

export interface OpenProjectOptions {
  readonly projectDir: string;
  readonly home?: string | undefined;
  readonly overrides?: ProjectOverrides | undefined;
  /** Defaults to FileStateIO under `<projectDir>/.hpikit`. */
  readonly stateIO?: StateIO | undefined;
  /** Receives every build event besides the persisted log. */
  readonly sink?: LogSink | undefined;
  /** Defaults to a CatalogResolver over the project's repositories. */
  readonly resolver?: ArtifactResolver | undefined;
}

export interface BuildContext {
  readonly config: ProjectConfig;
  readonly configuration: BuildConfiguration;
  readonly descriptor: PackageDescriptor;
  readonly session: ResolutionSession;
  readonly logger: BuildLogger;
  readonly stateIO: StateIO;
  readonly repositories: ReadonlyArray<string>;
}

/**
 * Load the descriptor and freeze its configuration.
 *
 * @throws {ConfigurationError} On any descriptor or override problem
 */
export async function openProject(opts: OpenProjectOptions): Promise<BuildContext> {
  const config = await loadProjectConfig(opts.projectDir);
  const configuration = toBuildConfiguration(config, opts.overrides);
  const descriptor = descriptorFor(configuration);
  configuration.freeze();

  const stateIO = opts.stateIO ?? new FileStateIO(projectStateDir(config.projectDir));
  const fileSink = new FileLogSink(stateIO);
  const logger = new BuildLogger(opts.sink !== undefined ? new TeeLogSink(fileSink, opts.sink) : fileSink);
  const repositories = repositoriesFor(config, resolveHpikitHome({ home: opts.home }));
  const resolver =
    opts.resolver ?? new CatalogResolver(repositories, { failOnVersionConflict: config.failOnVersionConflict });

  return {
    config,
    configuration,
    descriptor,
    session: new ResolutionSession(configuration, resolver, logger),
    logger,
    stateIO,
    repositories,
  };
}

export interface PackageResult {
  readonly archive: AssembledPackage;
  readonly libraryJar: string;
  readonly fingerprint: Fingerprint;
  /** Archives whose manifest input changed since the previous run. */
  readonly stale: ReadonlyArray<string>;
}

/**
 * Build the library jar, then the container archive around it. Manifest
 * fingerprints are stored only once both archives are written.
 *
 * @throws {ResolutionError} If a runtime or provided role fails to resolve
 * @throws {AssemblyError} If either archive cannot be written
 */
export async function packagePlugin(
  ctx: BuildContext,
  writer: ArchiveWriter = new ZipArchiveWriter(),
): Promise<PackageResult> {
  const { config, configuration, descriptor, session, logger } = ctx;
  const [runtime, provided] = await Promise.all([
    session.resolve(RoleId.RuntimeClasspath),
    session.resolve(RoleId.ProvidedRuntime),
  ]);

  const assembler = new ManifestAssembler(new StateBuildInputStore(ctx.stateIO), logger);
  const attributes = assembler.assemble(manifestMetadataOf(configuration));
  const jarRoots = [...config.paths.classes, config.paths.resources];
  const jarManifest = new ArchiveManifest(descriptor.libraryJarName, await readExistingManifest(jarRoots));
  const containerManifest = new ArchiveManifest(descriptor.archiveName);
  const applied = assembler.apply(attributes, [jarManifest, containerManifest]);

  const libraryJar = join(config.paths.output, descriptor.libraryJarName);
  await buildLibraryJar(writer, { roots: jarRoots, manifest: jarManifest }, libraryJar);

  const archive = await new PackageAssembler(writer, logger).assemble(
    {
      descriptor,
      compiledJar: libraryJar,
      manifest: containerManifest,
      runtimeArtifacts: runtime.artifacts,
      excludedModules: excludedModules(provided.artifacts),
      licenseReport: new DirectoryLicenseReport(config.paths.licenses),
      projectModule: moduleId(config.project),
    },
    config.paths.output,
  );
  assembler.commit(applied);
  return { archive, libraryJar, fingerprint: applied.fingerprint, stale: applied.stale };
}

/** Copy host-extension test dependencies; returns the files written. */
export async function writeProjectTestDependencies(ctx: BuildContext): Promise<string[]> {
  const resolved = await ctx.session.resolve(RoleId.PluginResources);
  return writeTestDependencies(planTestDependencies(resolved.artifacts), ctx.config.paths.testDependencies);
}

/** Write `the.hpl` and return its path. */
export async function writeTestHpl(ctx: BuildContext): Promise<string> {
  const { config, configuration } = ctx;
  const runtime = await ctx.session.resolve(RoleId.RuntimeClasspath);
  const attributes = new ManifestAssembler(undefined, ctx.logger).assemble(manifestMetadataOf(configuration));
  const text = renderTestHpl(attributes, {
    resourcePath: config.paths.webapp,
    libraries: [...config.paths.classes, config.paths.resources, ...classpathOf(runtime)],
  });
  await mkdir(config.paths.testResources, { recursive: true });
  const path = join(config.paths.testResources, TEST_HPL_NAME);
  await writeFile(path, text, 'utf-8');
  return path;
}

/** The container manifest as it would be written. */
export function previewManifest(ctx: BuildContext): string {
  return renderManifest(new ManifestAssembler().assemble(manifestMetadataOf(ctx.configuration)));
}
