/**
 * hpikit Engine: Test Dependencies
 *
 * The host's test harness installs every extension the build declared
 * (required, optional, server and test plugins). pluginResources collects
 * those declarations; this module turns its resolution into the files the
 * harness expects: `<name>.<ext>` for each extension archive, plus an
 * `index` listing the names, one per line.
 */

import { isHostExtension } from '../classify/classifier.js';
import type { ResolvedArtifact } from '../types/coordinate.js';

export const TEST_DEPENDENCIES_INDEX = 'index';

export interface TestDependencyCopy {
  readonly from: string;
  /** File name inside the test-dependencies directory. */
  readonly to: string;
}

export interface TestDependencyPlan {
  readonly copies: ReadonlyArray<TestDependencyCopy>;
  /** Content of the `index` file. */
  readonly index: string;
}

export function planTestDependencies(artifacts: ReadonlyArray<ResolvedArtifact>): TestDependencyPlan {
  const copies: TestDependencyCopy[] = [];
  const names: string[] = [];
  for (const artifact of artifacts) {
    if (!isHostExtension(artifact) || artifact.extension === 'jar') continue;
    const { name } = artifact.coordinate;
    if (names.includes(name)) continue;
    names.push(name);
    copies.push({ from: artifact.file, to: `${name}.${artifact.extension}` });
  }
  return {
    copies,
    index: names.map((n) => n + '\n').join(''),
  };
}
