/**
 * hpikit package: Build the library jar and the container archive
 *
 * Resolves the runtime and provided roles, assembles the manifest, writes
 * `<output>/<shortName>.jar`, then `<output>/<shortName>.<ext>` around it.
 * Reports whether the manifest changed since the previous run.
 */

import { Command } from 'commander';
import { packagePlugin } from '@hpikit/runtime-host';
import { t } from '../theme.js';
import type { ProjectOptions } from './shared.js';
import { openContext, runCommand, withProjectOptions } from './shared.js';

export const packageCommand = (): Command =>
  withProjectOptions(
  new Command('package').description('Assemble the extension archive'),
)
  .option('--json', 'Output the result as JSON')
  .action((options: ProjectOptions & { json?: boolean }) =>
    runCommand('package', async () => {
      const ctx = await openContext(options);
      const result = await packagePlugin(ctx);
      const { archive } = result;

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({
          archive: archive.path,
          library_jar: result.libraryJar,
          bundled: archive.libraries,
          provided: archive.excluded.length,
          manifest_fingerprint: result.fingerprint,
          manifest_changed: result.stale.includes(archive.archiveName),
        }, null, 2));
        return;
      }

      // eslint-disable-next-line no-console
      console.log(`${t.green('Wrote')} ${archive.path}`);
      // eslint-disable-next-line no-console
      console.log(`  bundled:  ${archive.libraries.length === 0 ? t.muted('(none)') : archive.libraries.join(', ')}`);
      // eslint-disable-next-line no-console
      console.log(`  provided: ${archive.excluded.length} artifact(s) left to the host`);
      const changed = result.stale.includes(archive.archiveName);
      // eslint-disable-next-line no-console
      console.log(`  manifest: ${result.fingerprint.slice(0, 12)} ${changed ? t.amber('(changed)') : t.muted('(unchanged)')}`);
    }),
  );
