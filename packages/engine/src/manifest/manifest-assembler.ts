/**
 * hpikit Engine: Manifest Assembler
 *
 * Derives the extension's manifest attributes from project metadata and
 * applies them to the archives being built.
 *
 * apply() does two things for every target archive:
 * - merges the attributes into the archive's manifest, keeping whatever
 *   other collaborators already set
 * - records the attributes' fingerprint as the archive's `manifest` input
 *   and compares it with the one stored by the last successful build
 *
 * The store is only written by commit(), once the archives exist, so a
 * build that fails after apply() leaves the previous fingerprints in
 * place and the next run still sees the change.
 */

import type { BuildInputStore } from '../adapters/index.js';
import type { BuildConfiguration } from '../configuration/build-configuration.js';
import { ConfigurationError } from '../errors.js';
import { BuildEventKind, BuildLogger } from '../logging/build-log.js';
import { resolveShortName } from '../package/descriptor.js';
import type { ProjectMetadata } from '../types/project.js';
import { RoleId } from '../types/role.js';
import type { Fingerprint } from './fingerprint.js';
import { fingerprint } from './fingerprint.js';
import type { ManifestAttributes } from './manifest-format.js';
import { mergeAttributes, parseManifest, renderManifest } from './manifest-format.js';

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface PluginDependency {
  readonly name: string;
  readonly version: string;
  readonly optional: boolean;
}

export interface ManifestMetadata extends ProjectMetadata {
  readonly pluginDependencies?: ReadonlyArray<PluginDependency> | undefined;
}

/**
 * Collect manifest metadata from a configuration: direct plugin and
 * optional plugin declarations become `Plugin-Dependencies`, and the core
 * role's version stands in for an absent `coreVersion`.
 */
export function manifestMetadataOf(configuration: BuildConfiguration): ManifestMetadata {
  const required = configuration.dependencies(RoleId.Plugins).map((d) => ({
    name: d.coordinate.name,
    version: d.coordinate.version,
    optional: false,
  }));
  const optional = configuration.dependencies(RoleId.OptionalPlugins).map((d) => ({
    name: d.coordinate.name,
    version: d.coordinate.version,
    optional: true,
  }));
  const core = configuration.dependencies(RoleId.Core)[0];
  return {
    ...configuration.project,
    coreVersion: configuration.project.coreVersion ?? core?.coordinate.version,
    pluginDependencies: [...required, ...optional],
  };
}

// ---------------------------------------------------------------------------
// Archive manifests
// ---------------------------------------------------------------------------

/**
 * The manifest of one archive under construction, plus the input
 * fingerprints recorded against that archive.
 */
export class ArchiveManifest {
  private attributeList: ManifestAttributes;
  private readonly inputProperties: Map<string, Fingerprint> = new Map();

  constructor(
    readonly archive: string,
    initial: ManifestAttributes = [],
  ) {
    this.attributeList = initial;
  }

  static parse(archive: string, text: string): ArchiveManifest {
    return new ArchiveManifest(archive, parseManifest(text));
  }

  get attributes(): ManifestAttributes {
    return this.attributeList;
  }

  merge(attributes: ManifestAttributes): void {
    this.attributeList = mergeAttributes(this.attributeList, attributes);
  }

  recordInput(name: string, value: Fingerprint): void {
    this.inputProperties.set(name, value);
  }

  inputFingerprint(name: string): Fingerprint | undefined {
    return this.inputProperties.get(name);
  }

  render(): string {
    return renderManifest(this.attributeList);
  }
}

export interface ManifestApplication {
  readonly fingerprint: Fingerprint;
  /** Archives whose previously recorded fingerprint differs (or is absent). */
  readonly stale: ReadonlyArray<string>;
  /** Every target archive, in apply order. */
  readonly archives: ReadonlyArray<string>;
}

// ---------------------------------------------------------------------------
// Assembler
// ---------------------------------------------------------------------------

export const MANIFEST_INPUT = 'manifest';

export class ManifestAssembler {
  constructor(
    private readonly inputs?: BuildInputStore,
    private readonly logger: BuildLogger = new BuildLogger(),
  ) {}

  /**
   * Derive manifest attributes.
   *
   * @throws {ConfigurationError} If the short name or version is missing
   */
  assemble(metadata: ManifestMetadata): ManifestAttributes {
    const shortName = resolveShortName(metadata.name, metadata.shortName);
    const missing: string[] = [];
    if (shortName === '') missing.push('short name');
    if (metadata.version.trim() === '') missing.push('version');
    if (missing.length > 0) {
      throw new ConfigurationError(`Missing required manifest metadata: ${missing.join(', ')}`);
    }

    const attributes: Array<readonly [string, string]> = [
      ['Manifest-Version', '1.0'],
      ['Created-By', 'hpikit'],
      ['Extension-Name', shortName],
      ['Short-Name', shortName],
      ['Long-Name', metadata.displayName ?? shortName],
      ['Group-Id', metadata.group],
      ['Plugin-Version', metadata.version],
    ];
    const optional = (name: string, value: string | undefined): void => {
      if (value !== undefined && value !== '') attributes.push([name, value]);
    };

    optional('Url', metadata.url);
    optional('Compatible-Since-Version', metadata.compatibleSinceVersion);
    optional('Jenkins-Version', metadata.coreVersion);
    optional('Mask-Classes', metadata.maskClasses);
    if (metadata.pluginFirstClassLoader === true) attributes.push(['PluginFirstClassLoader', 'true']);
    if (metadata.sandboxStatus === true) attributes.push(['Sandbox-Status', 'true']);

    const dependencies = (metadata.pluginDependencies ?? []).map((d) =>
      d.optional ? `${d.name}:${d.version};resolution:=optional` : `${d.name}:${d.version}`,
    );
    optional('Plugin-Dependencies', dependencies.join(','));

    const developers = (metadata.developers ?? []).map(
      (d) => `${d.name ?? ''}:${d.id ?? ''}:${d.email ?? ''}`,
    );
    optional('Plugin-Developers', developers.join(','));

    if (metadata.supportDynamicLoading !== undefined) {
      attributes.push(['Support-Dynamic-Loading', String(metadata.supportDynamicLoading)]);
    }
    return attributes;
  }

  /**
   * Merge `attributes` into every target and compare their fingerprint with
   * the stored one. Nothing is stored until commit().
   */
  apply(attributes: ManifestAttributes, targets: ReadonlyArray<ArchiveManifest>): ManifestApplication {
    const value = fingerprint(attributes);
    const stale: string[] = [];
    for (const target of targets) {
      target.merge(attributes);
      target.recordInput(MANIFEST_INPUT, value);
      if (this.inputs?.read(inputKey(target.archive)) !== value) stale.push(target.archive);
      this.logger.record(BuildEventKind.ManifestFingerprint, `${target.archive} ${value}`);
    }
    return { fingerprint: value, stale, archives: targets.map((t) => t.archive) };
  }

  /** Store an application's fingerprint for each of its archives. */
  commit(application: ManifestApplication): void {
    if (this.inputs === undefined) return;
    for (const archive of application.archives) {
      this.inputs.record(inputKey(archive), application.fingerprint);
    }
  }
}

function inputKey(archive: string): string {
  return `${archive}:${MANIFEST_INPUT}`;
}
