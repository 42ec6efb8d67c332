/**
 * hpikit classpath <role>: Print the resolved classpath of a role
 *
 * One file per line, jar artifacts only. Resolving a role fires the
 * deferred rewrites that feed it, so `classpath providedCompile` shows the
 * host extensions' jars.
 */

import { Command } from 'commander';
import { ConfigurationError, isRoleId } from '@hpikit/engine';
import type { ProjectOptions } from './shared.js';
import { openContext, runCommand, withProjectOptions } from './shared.js';

export const classpathCommand = (): Command =>
  withProjectOptions(
  new Command('classpath')
    .description('Print the classpath of a role, one file per line')
    .argument('[role]', 'Role to resolve', 'compileClasspath'),
)
  .option('--json', 'Output as a JSON array')
  .action((role: string, options: ProjectOptions & { json?: boolean }) =>
    runCommand('classpath', async () => {
      if (!isRoleId(role)) {
        throw new ConfigurationError(`Unknown role: ${role}`);
      }
      const ctx = await openContext(options);
      const files = await ctx.session.classpath(role);

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(files, null, 2));
        return;
      }
      for (const file of files) {
        // eslint-disable-next-line no-console
        console.log(file);
      }
    }),
  );
