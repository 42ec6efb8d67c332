/**
 * hpikit Engine: Package Assembler Tests
 *
 * Container layout: manifest, nested library jar, bundled runtime jars,
 * license report. Host-provided modules never reach WEB-INF/lib, and each
 * bundled module appears once.
 */

import { describe, it, expect } from 'vitest';
import { PackageAssembler } from '../src/package/package-assembler.js';
import type { PackageInputs } from '../src/package/package-assembler.js';
import { createPackageDescriptor } from '../src/package/descriptor.js';
import { ArchiveManifest } from '../src/manifest/manifest-assembler.js';
import { EMPTY_LICENSE_REPORT } from '../src/adapters/index.js';
import { AssemblyError } from '../src/errors.js';
import type { ResolvedArtifact } from '../src/types/coordinate.js';
import { MemoryArchiveWriter } from './fixtures.js';

function jar(group: string, name: string, version: string, type = 'jar', extension = 'jar'): ResolvedArtifact {
  return { coordinate: { group, name, version }, type, extension, file: `/repo/${name}-${version}.${extension}` };
}

const GSON = jar('com.example', 'gson', '2.10');
const CREDENTIALS_HPI = jar('org.example.plugins', 'credentials', '2.3', 'hpi', 'hpi');
const CREDENTIALS_JAR = jar('org.example.plugins', 'credentials', '2.3', 'hpi', 'jar');

function inputs(overrides: Partial<PackageInputs> = {}): PackageInputs {
  return {
    descriptor: createPackageDescriptor('widget-plugin'),
    compiledJar: '/build/libs/widget.jar',
    manifest: new ArchiveManifest('widget.hpi', [['Manifest-Version', '1.0'], ['Short-Name', 'widget']]),
    runtimeArtifacts: [GSON, CREDENTIALS_HPI, CREDENTIALS_JAR],
    excludedModules: new Set(['org.example.plugins:credentials']),
    licenseReport: EMPTY_LICENSE_REPORT,
    ...overrides,
  };
}

describe('PackageAssembler.plan', () => {
  it('lays out the container with sorted entries and explicit directories', async () => {
    const plan = await new PackageAssembler(new MemoryArchiveWriter()).plan(inputs());

    expect(plan.entries).toEqual([
      { kind: 'directory', path: 'META-INF/' },
      { kind: 'content', path: 'META-INF/MANIFEST.MF', data: 'Manifest-Version: 1.0\r\nShort-Name: widget\r\n\r\n' },
      { kind: 'directory', path: 'WEB-INF/' },
      { kind: 'directory', path: 'WEB-INF/lib/' },
      { kind: 'file', path: 'WEB-INF/lib/gson-2.10.jar', source: '/repo/gson-2.10.jar' },
      { kind: 'file', path: 'WEB-INF/lib/widget.jar', source: '/build/libs/widget.jar' },
    ]);
    expect(plan.libraries).toEqual(['gson-2.10.jar']);
    expect(plan.excluded).toEqual([CREDENTIALS_HPI, CREDENTIALS_JAR]);
  });

  it('bundles a module once even when two versions are on the runtime list', async () => {
    const plan = await new PackageAssembler(new MemoryArchiveWriter()).plan(
      inputs({ runtimeArtifacts: [GSON, jar('com.example', 'gson', '2.9'), GSON] }),
    );
    expect(plan.libraries).toEqual(['gson-2.10.jar']);
  });

  it('never bundles the project itself', async () => {
    const plan = await new PackageAssembler(new MemoryArchiveWriter()).plan(
      inputs({
        runtimeArtifacts: [jar('org.example.plugins', 'widget-plugin', '1.0'), GSON],
        projectModule: 'org.example.plugins:widget-plugin',
      }),
    );
    expect(plan.libraries).toEqual(['gson-2.10.jar']);
  });

  it('copies license report files under WEB-INF/', async () => {
    const plan = await new PackageAssembler(new MemoryArchiveWriter()).plan(
      inputs({
        runtimeArtifacts: [],
        licenseReport: {
          entries: () =>
            Promise.resolve([
              { path: 'licenses.xml', file: '/build/licenses/licenses.xml' },
              { path: 'licenses/gson.txt', file: '/build/licenses/licenses/gson.txt' },
            ]),
        },
      }),
    );
    expect(plan.entries.map((e) => e.path)).toEqual([
      'META-INF/',
      'META-INF/MANIFEST.MF',
      'WEB-INF/',
      'WEB-INF/lib/',
      'WEB-INF/lib/widget.jar',
      'WEB-INF/licenses.xml',
      'WEB-INF/licenses/',
      'WEB-INF/licenses/gson.txt',
    ]);
  });
});

describe('PackageAssembler.assemble', () => {
  it('writes <outputDir>/<archiveName>', async () => {
    const writer = new MemoryArchiveWriter();
    const result = await new PackageAssembler(writer).assemble(
      inputs({ descriptor: createPackageDescriptor('widget', undefined, 'jpi') }),
      '/build/libs',
    );
    expect(result.path).toBe('/build/libs/widget.jpi');
    expect([...writer.written.keys()]).toEqual(['/build/libs/widget.jpi']);
  });

  it('wraps a writer failure in an AssemblyError naming the output', async () => {
    const cause = new Error('disk full');
    const failure = new PackageAssembler(new MemoryArchiveWriter(cause)).assemble(inputs(), '/build/libs/');

    await expect(failure).rejects.toBeInstanceOf(AssemblyError);
    await expect(failure).rejects.toMatchObject({
      message: 'Failed to assemble /build/libs/widget.hpi: disk full',
      outputPath: '/build/libs/widget.hpi',
      cause,
    });
  });
});
