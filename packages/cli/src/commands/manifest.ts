/**
 * hpikit manifest: Print the manifest the archive would carry
 */

import { Command } from 'commander';
import { previewManifest } from '@hpikit/runtime-host';
import type { ProjectOptions } from './shared.js';
import { openContext, runCommand, withProjectOptions } from './shared.js';

export const manifestCommand = (): Command =>
  withProjectOptions(
  new Command('manifest').description('Print the extension manifest without building'),
).action((options: ProjectOptions) =>
  runCommand('manifest', async () => {
    const ctx = await openContext(options);
    process.stdout.write(previewManifest(ctx).replace(/\r\n/g, '\n'));
  }),
);
