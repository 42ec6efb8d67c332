/**
 * commands/index.ts: Commander program factory, configured without .parse().
 *
 * Imported by:
 *   src/bin/hpikit.ts
 *   tests, which build a fresh program per case
 */

import { Command } from 'commander';
import { classpathCommand } from './classpath.js';
import { manifestCommand } from './manifest.js';
import { packageCommand } from './package.js';
import { rolesCommand } from './roles.js';
import { testDependenciesCommand } from './test-dependencies.js';

export function createProgram(): Command {
  return new Command('hpikit')
    .description(
      'hpikit: package host-platform extensions.\n' +
      'Reads hpikit.json from the project directory.',
    )
    .version('0.1.0')
    .addCommand(packageCommand())
    .addCommand(rolesCommand())
    .addCommand(classpathCommand())
    .addCommand(testDependenciesCommand())
    .addCommand(manifestCommand());
}
