/**
 * hpikit Engine: Project Types
 *
 * Metadata describing the extension being packaged, and the packaging
 * options consumed from the host collaborator.
 */

// ---------------------------------------------------------------------------
// Archive extension
// ---------------------------------------------------------------------------

/**
 * The two accepted archive extensions. The first is the default.
 */
export const FILE_EXTENSIONS = ['hpi', 'jpi'] as const;

export type FileExtension = (typeof FILE_EXTENSIONS)[number];

export const DEFAULT_FILE_EXTENSION: FileExtension = 'hpi';

export function isFileExtension(value: string): value is FileExtension {
  return value === 'hpi' || value === 'jpi';
}

// ---------------------------------------------------------------------------
// Project metadata
// ---------------------------------------------------------------------------

export interface Developer {
  readonly id?: string | undefined;
  readonly name?: string | undefined;
  readonly email?: string | undefined;
}

/**
 * Everything the manifest and package descriptor are derived from.
 */
export interface ProjectMetadata {
  readonly group: string;
  /** Project identifier, e.g. `widget-plugin`. */
  readonly name: string;
  readonly version: string;
  /** Explicit short name. When absent it is derived from `name`. */
  readonly shortName?: string | undefined;
  readonly displayName?: string | undefined;
  readonly url?: string | undefined;
  /** Host core version. When absent it is taken from the core role. */
  readonly coreVersion?: string | undefined;
  readonly compatibleSinceVersion?: string | undefined;
  /** Whitespace-separated package prefixes hidden from the host class loader. */
  readonly maskClasses?: string | undefined;
  readonly pluginFirstClassLoader?: boolean | undefined;
  readonly sandboxStatus?: boolean | undefined;
  readonly supportDynamicLoading?: boolean | undefined;
  readonly developers?: ReadonlyArray<Developer> | undefined;
}

// ---------------------------------------------------------------------------
// Packaging options
// ---------------------------------------------------------------------------

/**
 * Switches consumed from the host collaborator.
 *
 * `configurePublishing` and `disabledTestInjection` are carried through the
 * configuration for the collaborators that implement them; the engine only
 * reads `fileExtension` and `configureRepositories`.
 */
export interface PackagingOptions {
  readonly fileExtension: FileExtension;
  readonly configureRepositories: boolean;
  readonly configurePublishing: boolean;
  readonly disabledTestInjection: boolean;
  /** Class name of the injected test suite. */
  readonly injectedTestName: string;
}

export const DEFAULT_PACKAGING_OPTIONS: PackagingOptions = {
  fileExtension: DEFAULT_FILE_EXTENSION,
  configureRepositories: true,
  configurePublishing: true,
  disabledTestInjection: false,
  injectedTestName: 'InjectedTest',
};
