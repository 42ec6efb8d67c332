/**
 * hpikit Engine: Test HPL
 *
 * A `.hpl` file is a manifest that points the host at an exploded
 * extension: its resource directory and the class directories and jars
 * that make up its class path. Unit tests load the extension under
 * development through it.
 */

import type { ManifestAttributes } from '../manifest/manifest-format.js';
import { mergeAttributes, renderManifest } from '../manifest/manifest-format.js';

export const TEST_HPL_NAME = 'the.hpl';

export interface TestHplLayout {
  /** Directory holding the extension's web resources. */
  readonly resourcePath: string;
  /** Class directories first, then runtime classpath jars. */
  readonly libraries: ReadonlyArray<string>;
}

export function renderTestHpl(attributes: ManifestAttributes, layout: TestHplLayout): string {
  return renderManifest(
    mergeAttributes(attributes, [
      ['Resource-Path', layout.resourcePath],
      ['Libraries', layout.libraries.join(',')],
    ]),
  );
}
