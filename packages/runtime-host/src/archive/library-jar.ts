/**
 * hpikit Runtime Host: Library Jar
 *
 * Packs compiled classes and resources into the extension's own jar, the
 * one nested in the container as `WEB-INF/lib/<shortName>.jar`.
 *
 * A manifest already present in the inputs is not copied as a file; read it
 * with readExistingManifest() and seed the jar's ArchiveManifest with it, so
 * attributes set by other tools survive the merge.
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MANIFEST_PATH, parseManifest } from '@hpikit/engine';
import type { ArchiveEntry, ArchiveManifest, ArchiveWriter, ManifestAttributes } from '@hpikit/engine';
import { isNodeError } from '../state/state-io.js';

export interface LibraryJarInputs {
  /** Directories whose contents go to the jar root, earlier ones winning. */
  readonly roots: ReadonlyArray<string>;
  readonly manifest: ArchiveManifest;
}

/** Write the library jar to `outputPath` and return its entries. */
export async function buildLibraryJar(
  writer: ArchiveWriter,
  inputs: LibraryJarInputs,
  outputPath: string,
): Promise<ReadonlyArray<ArchiveEntry>> {
  const files = new Map<string, string>();
  for (const root of inputs.roots) {
    for (const [path, source] of await walk(root)) {
      if (path !== MANIFEST_PATH && !files.has(path)) files.set(path, source);
    }
  }

  const directories = new Set<string>(['META-INF/']);
  for (const path of files.keys()) {
    const parts = path.split('/').slice(0, -1);
    parts.forEach((_, i) => directories.add(parts.slice(0, i + 1).join('/') + '/'));
  }

  const entries: ArchiveEntry[] = [
    ...Array.from(directories, (path): ArchiveEntry => ({ kind: 'directory', path })),
    { kind: 'content', path: MANIFEST_PATH, data: inputs.manifest.render() },
    ...Array.from(files, ([path, source]): ArchiveEntry => ({ kind: 'file', path, source })),
  ];
  entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  await writer.write(outputPath, entries);
  return entries;
}

/**
 * The first `META-INF/MANIFEST.MF` found under `roots`, parsed; empty when
 * none has one.
 */
export async function readExistingManifest(roots: ReadonlyArray<string>): Promise<ManifestAttributes> {
  for (const root of roots) {
    try {
      return parseManifest(await readFile(join(root, MANIFEST_PATH), 'utf-8'));
    } catch (err: unknown) {
      if (!isNodeError(err, 'ENOENT') && !isNodeError(err, 'ENOTDIR')) throw err;
    }
  }
  return [];
}

/**
 * Regular files under `root` as [archive path, absolute path], sorted by
 * archive path. A missing root has no files.
 */
export async function walk(root: string, prefix = ''): Promise<Array<[string, string]>> {
  let names: Dirent[];
  try {
    names = await readdir(join(root, prefix), { withFileTypes: true });
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return [];
    throw err;
  }
  const files: Array<[string, string]> = [];
  for (const dirent of names) {
    const relative = prefix === '' ? dirent.name : `${prefix}/${dirent.name}`;
    if (dirent.isDirectory()) {
      files.push(...(await walk(root, relative)));
    } else if (dirent.isFile()) {
      files.push([relative, join(root, relative)]);
    }
  }
  return files.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
