/**
 * hpikit Runtime Host: Repository Search Order
 */

import { join } from 'node:path';
import { REPOSITORY_DIR } from '../home.js';
import type { ProjectConfig } from '../config/project-config.js';

/**
 * Repositories to search, in order. With `configureRepositories` on, the
 * project's own `repository/` and the home's `repository/` come before the
 * descriptor's list; with it off, only the descriptor's list is used.
 */
export function repositoriesFor(config: ProjectConfig, home: string): ReadonlyArray<string> {
  const conventional = config.options.configureRepositories
    ? [join(config.projectDir, REPOSITORY_DIR), join(home, REPOSITORY_DIR)]
    : [];
  return [...new Set([...conventional, ...config.repositories])];
}
