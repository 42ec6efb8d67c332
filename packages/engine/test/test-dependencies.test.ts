/**
 * hpikit Engine: Test Dependency and Test HPL Planning Tests
 */

import { describe, it, expect } from 'vitest';
import { planTestDependencies } from '../src/package/test-dependencies.js';
import { renderTestHpl } from '../src/package/test-hpl.js';
import { parseManifest } from '../src/manifest/manifest-format.js';
import type { ResolvedArtifact } from '../src/types/coordinate.js';

function artifact(name: string, version: string, type: string, extension: string): ResolvedArtifact {
  return {
    coordinate: { group: 'org.example.plugins', name, version },
    type,
    extension,
    file: `/repo/${name}-${version}.${extension}`,
  };
}

describe('planTestDependencies', () => {
  it('copies host-extension archives under their short file names', () => {
    const plan = planTestDependencies([
      artifact('credentials', '2.3', 'hpi', 'hpi'),
      artifact('guava', '32.1', 'jar', 'jar'),
      artifact('structs', '1.7', 'jpi', 'jpi'),
      artifact('credentials', '2.3', 'hpi', 'jar'),
    ]);

    expect(plan.copies).toEqual([
      { from: '/repo/credentials-2.3.hpi', to: 'credentials.hpi' },
      { from: '/repo/structs-1.7.jpi', to: 'structs.jpi' },
    ]);
    expect(plan.index).toBe('credentials\nstructs\n');
  });

  it('lists a module once', () => {
    const plan = planTestDependencies([
      artifact('credentials', '2.3', 'hpi', 'hpi'),
      artifact('credentials', '2.5', 'hpi', 'hpi'),
    ]);
    expect(plan.copies).toHaveLength(1);
    expect(plan.index).toBe('credentials\n');
  });

  it('plans an empty index when there is nothing to copy', () => {
    expect(planTestDependencies([])).toEqual({ copies: [], index: '' });
  });
});

describe('renderTestHpl', () => {
  it('adds Resource-Path and a comma-separated Libraries list', () => {
    const text = renderTestHpl([['Manifest-Version', '1.0'], ['Short-Name', 'widget']], {
      resourcePath: '/p/src/main/webapp',
      libraries: ['/p/build/classes', '/repo/gson-2.10.jar'],
    });
    expect(parseManifest(text)).toEqual([
      ['Manifest-Version', '1.0'],
      ['Short-Name', 'widget'],
      ['Resource-Path', '/p/src/main/webapp'],
      ['Libraries', '/p/build/classes,/repo/gson-2.10.jar'],
    ]);
  });
});
