/**
 * hpikit test-dependencies: Prepare host extensions for the test harness
 *
 * Copies every host-extension archive reachable from the plugin roles into
 * the test-dependencies directory and writes its `index`. With `--hpl`,
 * also generates the test HPL.
 */

import { Command } from 'commander';
import { writeProjectTestDependencies, writeTestHpl } from '@hpikit/runtime-host';
import { t } from '../theme.js';
import type { ProjectOptions } from './shared.js';
import { openContext, runCommand, withProjectOptions } from './shared.js';

export const testDependenciesCommand = (): Command =>
  withProjectOptions(
  new Command('test-dependencies').description('Copy host-extension test dependencies'),
)
  .option('--hpl', 'Also write the test HPL (the.hpl)')
  .action((options: ProjectOptions & { hpl?: boolean }) =>
    runCommand('test-dependencies', async () => {
      const ctx = await openContext(options);
      const written = await writeProjectTestDependencies(ctx);
      // eslint-disable-next-line no-console
      console.log(`${t.green('Wrote')} ${written.length - 1} archive(s) to ${ctx.config.paths.testDependencies}`);

      if (options.hpl === true) {
        const hpl = await writeTestHpl(ctx);
        // eslint-disable-next-line no-console
        console.log(`${t.green('Wrote')} ${hpl}`);
      }
    }),
  );
