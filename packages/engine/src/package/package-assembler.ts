/**
 * hpikit Engine: Package Assembler
 *
 * Plans and writes the container archive:
 *
 *   META-INF/MANIFEST.MF          merged manifest
 *   WEB-INF/lib/<shortName>.jar   the extension's own library jar
 *   WEB-INF/lib/<name>-<ver>.jar  each bundled runtime dependency
 *   WEB-INF/<report files>        the license report, copied verbatim
 *
 * Nothing resolved through a provided role is bundled: those modules are
 * classpath-visible only. Each module and each file name appears in
 * WEB-INF/lib/ at most once, and the nested jar's name is claimed first.
 *
 * Entries are sorted by path and every directory is written explicitly, so
 * identical inputs yield identical entry lists; the ArchiveWriter turns
 * that into a byte-identical archive.
 */

import type { ArchiveEntry, ArchiveWriter, LicenseReport } from '../adapters/index.js';
import { AssemblyError, HpikitError } from '../errors.js';
import { BuildEventKind, BuildLogger } from '../logging/build-log.js';
import type { ArchiveManifest } from '../manifest/manifest-assembler.js';
import type { ResolvedArtifact } from '../types/coordinate.js';
import { artifactFileName, formatCoordinate, moduleId } from '../types/coordinate.js';
import type { PackageDescriptor } from './descriptor.js';

export const MANIFEST_PATH = 'META-INF/MANIFEST.MF';
export const LIBRARY_DIR = 'WEB-INF/lib/';
export const METADATA_DIR = 'WEB-INF/';

export interface PackageInputs {
  readonly descriptor: PackageDescriptor;
  /** Path of the extension's compiled library jar. */
  readonly compiledJar: string;
  readonly manifest: ArchiveManifest;
  /** Everything on the runtime classpath, provided roles included. */
  readonly runtimeArtifacts: ReadonlyArray<ResolvedArtifact>;
  /** Module identities supplied by the host. */
  readonly excludedModules: ReadonlySet<string>;
  readonly licenseReport: LicenseReport;
  /** The project's own module identity; never bundled as a dependency. */
  readonly projectModule?: string | undefined;
}

export interface PackagePlan {
  readonly entries: ReadonlyArray<ArchiveEntry>;
  /** File names written to WEB-INF/lib/, nested jar excluded. */
  readonly libraries: ReadonlyArray<string>;
  /** Runtime artifacts left out because the host provides them. */
  readonly excluded: ReadonlyArray<ResolvedArtifact>;
}

export interface AssembledPackage extends PackagePlan {
  readonly path: string;
  readonly archiveName: string;
}

export class PackageAssembler {
  constructor(
    private readonly writer: ArchiveWriter,
    private readonly logger: BuildLogger = new BuildLogger(),
  ) {}

  /**
   * Compute the archive's entries without writing anything.
   */
  async plan(inputs: PackageInputs): Promise<PackagePlan> {
    const { descriptor } = inputs;
    const entries: ArchiveEntry[] = [];
    const directories = new Set<string>(['META-INF/', METADATA_DIR, LIBRARY_DIR]);

    entries.push({ kind: 'content', path: MANIFEST_PATH, data: inputs.manifest.render() });
    entries.push({ kind: 'file', path: LIBRARY_DIR + descriptor.libraryJarName, source: inputs.compiledJar });

    const claimedNames = new Set<string>([descriptor.libraryJarName]);
    const claimedModules = new Set<string>(
      inputs.projectModule !== undefined ? [inputs.projectModule] : [],
    );
    const libraries: string[] = [];
    const excluded: ResolvedArtifact[] = [];

    for (const artifact of inputs.runtimeArtifacts) {
      const id = moduleId(artifact.coordinate);
      if (inputs.excludedModules.has(id)) {
        excluded.push(artifact);
        this.logger.record(
          BuildEventKind.ArtifactExcluded,
          `${formatCoordinate(artifact.coordinate)} is provided by the host`,
        );
        continue;
      }
      if (artifact.extension !== 'jar') continue;

      const fileName = artifactFileName(artifact);
      const moduleKey = artifact.classifier !== undefined ? `${id}:${artifact.classifier}` : id;
      if (claimedNames.has(fileName) || claimedModules.has(moduleKey)) continue;
      claimedNames.add(fileName);
      claimedModules.add(moduleKey);

      libraries.push(fileName);
      entries.push({ kind: 'file', path: LIBRARY_DIR + fileName, source: artifact.file });
    }

    for (const report of await inputs.licenseReport.entries()) {
      const path = METADATA_DIR + report.path.replace(/^\/+/, '');
      for (const dir of parentDirectories(path)) directories.add(dir);
      entries.push({ kind: 'file', path, source: report.file });
    }

    for (const path of directories) {
      entries.push({ kind: 'directory', path });
    }
    entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    return { entries: dedupePaths(entries), libraries: libraries.sort(), excluded };
  }

  /**
   * Plan and write the archive to `<outputDir>/<archiveName>`.
   *
   * @throws {AssemblyError} If writing fails; the writer has already
   *   discarded any partial output
   */
  async assemble(inputs: PackageInputs, outputDir: string): Promise<AssembledPackage> {
    const plan = await this.plan(inputs);
    const path = joinPath(outputDir, inputs.descriptor.archiveName);
    try {
      await this.writer.write(path, plan.entries);
    } catch (err: unknown) {
      if (err instanceof HpikitError) throw err;
      throw new AssemblyError(path, err instanceof Error ? err.message : String(err), { cause: err });
    }
    this.logger.record(
      BuildEventKind.PackageWritten,
      `${path} (${plan.libraries.length} bundled, ${plan.excluded.length} provided)`,
    );
    return { ...plan, path, archiveName: inputs.descriptor.archiveName };
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** `WEB-INF/a/b.txt` → `WEB-INF/`, `WEB-INF/a/` */
function parentDirectories(path: string): string[] {
  const parts = path.split('/').slice(0, -1);
  return parts.map((_, i) => parts.slice(0, i + 1).join('/') + '/');
}

/** Keep the first entry for each path. Input must be sorted. */
function dedupePaths(entries: ReadonlyArray<ArchiveEntry>): ArchiveEntry[] {
  const seen = new Set<string>();
  return entries.filter((e) => {
    if (seen.has(e.path)) return false;
    seen.add(e.path);
    return true;
  });
}

function joinPath(dir: string, name: string): string {
  return dir.endsWith('/') ? dir + name : `${dir}/${name}`;
}
