/**
 * hpikit Engine: Artifact Classifier
 *
 * Decides whether a resolved artifact is a host extension or an ordinary
 * library. A pure function of the artifact's declared packaging type.
 */

import type { ResolvedArtifact } from '../types/coordinate.js';

export enum ArtifactKind {
  HostExtension = 'host-extension',
  OrdinaryLibrary = 'ordinary-library',
}

/**
 * Packaging types of a host-extension archive: the legacy name first, then
 * the current one.
 */
export const HOST_EXTENSION_TYPES: ReadonlySet<string> = new Set(['hpi', 'jpi']);

export function classify(artifact: Pick<ResolvedArtifact, 'type'>): ArtifactKind {
  return HOST_EXTENSION_TYPES.has(artifact.type)
    ? ArtifactKind.HostExtension
    : ArtifactKind.OrdinaryLibrary;
}

export function isHostExtension(artifact: Pick<ResolvedArtifact, 'type'>): boolean {
  return classify(artifact) === ArtifactKind.HostExtension;
}
