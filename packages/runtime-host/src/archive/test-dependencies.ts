/**
 * hpikit Runtime Host: Test Dependency Directory
 *
 * Materializes a TestDependencyPlan: the host-extension archives the test
 * harness loads, plus the `index` file naming them.
 */

import { copyFile, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { TEST_DEPENDENCIES_INDEX } from '@hpikit/engine';
import type { TestDependencyPlan } from '@hpikit/engine';

/**
 * Replace the contents of `directory` with the planned copies and index.
 * Returns the paths written, index last.
 */
export async function writeTestDependencies(plan: TestDependencyPlan, directory: string): Promise<string[]> {
  await rm(directory, { recursive: true, force: true });
  await mkdir(directory, { recursive: true });
  const written = await Promise.all(
    plan.copies.map(async ({ from, to }) => {
      const target = join(directory, to);
      await copyFile(from, target);
      return target;
    }),
  );
  const index = join(directory, TEST_DEPENDENCIES_INDEX);
  await writeFile(index, plan.index, 'utf-8');
  return [...written, index];
}
