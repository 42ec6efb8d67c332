/**
 * hpikit Runtime Host: Home and State Directories
 *
 * The user-level home holds the shared artifact repository:
 *
 *   <HPIKIT_HOME>/
 *     repository/
 *       catalog.json
 *       <artifact files>
 *
 * Precedence: explicit option (the `--home` flag), then the HPIKIT_HOME
 * environment variable, then `~/.hpikit`.
 *
 * Per-project state (build inputs, event logs) lives beside the project in
 * `<projectDir>/.hpikit/`, never in the home.
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export const HOME_ENV_VAR = 'HPIKIT_HOME';
export const PROJECT_STATE_DIR = '.hpikit';
export const REPOSITORY_DIR = 'repository';

export interface ResolveHomeOptions {
  readonly home?: string | undefined;
  /** Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/** Absolute path of the hpikit home. Does not create it. */
export function resolveHpikitHome(opts: ResolveHomeOptions = {}): string {
  if (opts.home !== undefined && opts.home !== '') return resolve(opts.home);
  const fromEnv = (opts.env ?? process.env)[HOME_ENV_VAR];
  if (fromEnv !== undefined && fromEnv !== '') return resolve(fromEnv);
  return join(homedir(), '.hpikit');
}

export function projectStateDir(projectDir: string): string {
  return join(projectDir, PROJECT_STATE_DIR);
}
