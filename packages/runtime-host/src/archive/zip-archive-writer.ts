/**
 * hpikit Runtime Host: Reproducible Zip Writer
 *
 * ArchiveWriter on jszip. Output is a function of the entry list alone:
 * - every entry carries the same fixed timestamp
 * - entries are written in the order given, directories explicitly, with
 *   no implicit parent folders
 * - no file system metadata (permissions, owner) is copied
 *
 * The archive is generated in memory, written to a temp file beside the
 * target and renamed into place. On failure the temp file is removed and
 * the target is left as it was.
 */

import { readFile, mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import JSZip from 'jszip';
import { AssemblyError } from '@hpikit/engine';
import type { ArchiveEntry, ArchiveWriter } from '@hpikit/engine';

/** 1980-02-01T00:00:00Z, the earliest date DOS time holds without clamping. */
export const FIXED_ENTRY_DATE = new Date(Date.UTC(1980, 1, 1, 0, 0, 0));

export interface ZipWriterOptions {
  /** DEFLATE level, 1-9. Defaults to 6. */
  readonly compressionLevel?: number | undefined;
}

let tempCounter = 0;

export class ZipArchiveWriter implements ArchiveWriter {
  private readonly level: number;

  constructor(options: ZipWriterOptions = {}) {
    this.level = options.compressionLevel ?? 6;
  }

  async write(outputPath: string, entries: ReadonlyArray<ArchiveEntry>): Promise<void> {
    const temp = join(dirname(outputPath), `.${basename(outputPath)}.${process.pid}.${tempCounter++}.tmp`);
    try {
      const bytes = await this.generate(entries);
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(temp, bytes);
      await rename(temp, outputPath);
    } catch (err: unknown) {
      await rm(temp, { force: true });
      throw new AssemblyError(outputPath, err instanceof Error ? err.message : String(err), { cause: err });
    }
  }

  /** The archive bytes for `entries`, without touching the output location. */
  async generate(entries: ReadonlyArray<ArchiveEntry>): Promise<Uint8Array> {
    const zip = new JSZip();
    for (const entry of entries) {
      switch (entry.kind) {
        case 'directory':
          zip.file(entry.path, null, { dir: true, date: FIXED_ENTRY_DATE, createFolders: false });
          break;
        case 'file':
          zip.file(entry.path, await readFile(entry.source), {
            date: FIXED_ENTRY_DATE,
            createFolders: false,
            binary: true,
          });
          break;
        case 'content':
          zip.file(entry.path, entry.data, {
            date: FIXED_ENTRY_DATE,
            createFolders: false,
            binary: typeof entry.data !== 'string',
          });
          break;
      }
    }
    return zip.generateAsync({
      type: 'uint8array',
      compression: 'DEFLATE',
      compressionOptions: { level: this.level },
      platform: 'UNIX',
    });
  }
}

/**
 * Read one entry of a zip file as text; undefined when the entry is absent.
 */
export async function readZipEntry(zipPath: string, entryPath: string): Promise<string | undefined> {
  const zip = await JSZip.loadAsync(await readFile(zipPath));
  const file = zip.file(entryPath);
  return file === null ? undefined : file.async('string');
}

/** Entry paths of a zip file, in stored order. */
export async function listZipEntries(zipPath: string): Promise<string[]> {
  const zip = await JSZip.loadAsync(await readFile(zipPath));
  const names: string[] = [];
  zip.forEach((relativePath) => {
    names.push(relativePath);
  });
  return names;
}
