/**
 * Shared command plumbing: the project options every build command takes,
 * and the error boundary that turns an HpikitError into exit code 1.
 */

import type { Command } from 'commander';
import { HpikitError } from '@hpikit/engine';
import { openProject } from '@hpikit/runtime-host';
import type { BuildContext } from '@hpikit/runtime-host';
import { ConsoleLogSink } from '../output/console-sink.js';

export interface ProjectOptions {
  project: string;
  home?: string;
  verbose?: boolean;
  shortName?: string;
  fileExtension?: string;
}

export function withProjectOptions(command: Command): Command {
  return command
    .option('-p, --project <dir>', 'Project directory holding hpikit.json', '.')
    .option('--home <dir>', 'hpikit home (default: $HPIKIT_HOME or ~/.hpikit)')
    .option('--short-name <name>', 'Override the extension short name')
    .option('--file-extension <ext>', 'Override the archive extension (hpi or jpi)')
    .option('-v, --verbose', 'Print build events as they happen');
}

export function openContext(options: ProjectOptions): Promise<BuildContext> {
  return openProject({
    projectDir: options.project,
    home: options.home,
    overrides: { shortName: options.shortName, fileExtension: options.fileExtension },
    sink: options.verbose === true ? new ConsoleLogSink() : undefined,
  });
}

/**
 * Run a command body. Known build failures are reported as
 * `[hpikit <name>] <message>` and set exit code 1; anything else propagates.
 */
export async function runCommand(name: string, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err: unknown) {
    if (!(err instanceof HpikitError)) throw err;
    process.stderr.write(`[hpikit ${name}] ${err.message}\n`);
    process.exitCode = 1;
  }
}
