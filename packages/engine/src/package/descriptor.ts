/**
 * hpikit Engine: Package Descriptor
 *
 * Names the final archive and decides which modules stay out of its
 * library directory.
 */

import type { BuildConfiguration } from '../configuration/build-configuration.js';
import { ConfigurationError } from '../errors.js';
import type { ResolvedArtifact } from '../types/coordinate.js';
import { moduleId } from '../types/coordinate.js';
import type { FileExtension } from '../types/project.js';
import { DEFAULT_FILE_EXTENSION, FILE_EXTENSIONS, isFileExtension } from '../types/project.js';

/** Conventional suffix of extension project identifiers. */
export const PLUGIN_NAME_SUFFIX = '-plugin';

export interface PackageDescriptor {
  readonly shortName: string;
  readonly fileExtension: FileExtension;
  /** `<shortName>.<fileExtension>` */
  readonly archiveName: string;
  /** File name of the nested library jar: `<shortName>.jar`. */
  readonly libraryJarName: string;
}

/**
 * The extension's short name: the explicit one when given, otherwise the
 * project identifier with a trailing `-plugin` removed.
 */
export function resolveShortName(projectName: string, explicit?: string): string {
  if (explicit !== undefined && explicit.trim() !== '') {
    return explicit.trim();
  }
  const name = projectName.trim();
  return name.endsWith(PLUGIN_NAME_SUFFIX) && name.length > PLUGIN_NAME_SUFFIX.length
    ? name.slice(0, -PLUGIN_NAME_SUFFIX.length)
    : name;
}

/**
 * @throws {ConfigurationError} If the short name is empty or the extension
 *   is not one of the accepted ones
 */
export function createPackageDescriptor(
  projectName: string,
  explicitShortName?: string,
  fileExtension: string = DEFAULT_FILE_EXTENSION,
): PackageDescriptor {
  const shortName = resolveShortName(projectName, explicitShortName);
  if (shortName === '') {
    throw new ConfigurationError('Cannot name the archive: the project has no name and no short name.');
  }
  if (!isFileExtension(fileExtension)) {
    throw new ConfigurationError(
      `Unsupported archive extension "${fileExtension}". Expected one of: ${FILE_EXTENSIONS.join(', ')}.`,
    );
  }
  return {
    shortName,
    fileExtension,
    archiveName: `${shortName}.${fileExtension}`,
    libraryJarName: `${shortName}.jar`,
  };
}

export function descriptorFor(configuration: BuildConfiguration): PackageDescriptor {
  const { project, options } = configuration;
  return createPackageDescriptor(project.name, project.shortName, options.fileExtension);
}

/**
 * Module identities that must never be bundled: everything resolved through
 * a provided role (host core, host extensions, and everything they pull in).
 */
export function excludedModules(provided: ReadonlyArray<ResolvedArtifact>): ReadonlySet<string> {
  return new Set(provided.map((a) => moduleId(a.coordinate)));
}
