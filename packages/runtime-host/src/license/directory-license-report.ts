/**
 * hpikit Runtime Host: License Report Directory
 *
 * A LicenseReport backed by whatever a license tool wrote into a directory.
 * Every regular file under it is copied into the container's metadata
 * directory with its relative path intact.
 */

import type { LicenseReport, LicenseReportEntry } from '@hpikit/engine';
import { walk } from '../archive/library-jar.js';

export class DirectoryLicenseReport implements LicenseReport {
  constructor(private readonly directory: string) {}

  async entries(): Promise<ReadonlyArray<LicenseReportEntry>> {
    return (await walk(this.directory)).map(([path, file]) => ({ path, file }));
  }
}
