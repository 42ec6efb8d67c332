/**
 * hpikit Engine: Coordinate Notation and Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import { artifactFileName, moduleId, parseDependencyNotation } from '../src/types/coordinate.js';
import { ArtifactKind, classify, isHostExtension } from '../src/classify/classifier.js';
import { isRoleId } from '../src/types/role.js';

describe('parseDependencyNotation', () => {
  it('reads group:name:version as a transitive declaration', () => {
    expect(parseDependencyNotation('com.example:gson:2.10')).toEqual({
      coordinate: { group: 'com.example', name: 'gson', version: '2.10' },
      classifier: undefined,
      extension: undefined,
      transitive: true,
    });
  });

  it('reads classifier and extension; an extension makes it non-transitive', () => {
    const parsed = parseDependencyNotation('org.example.plugins:credentials:2.3:tests@jar');
    expect(parsed?.classifier).toBe('tests');
    expect(parsed?.extension).toBe('jar');
    expect(parsed?.transitive).toBe(false);
  });

  it.each(['com.example:gson', 'com.example::2.10', 'a:b:c:d:e', 'a:b:c@', ''])('rejects "%s"', (notation) => {
    expect(parseDependencyNotation(notation)).toBeNull();
  });
});

describe('coordinate helpers', () => {
  it('module identity ignores the version', () => {
    expect(moduleId({ group: 'com.example', name: 'gson' })).toBe('com.example:gson');
  });

  it('names artifact files name-version[-classifier].ext', () => {
    const base = { coordinate: { group: 'g', name: 'gson', version: '2.10' }, type: 'jar', extension: 'jar', file: '/f' };
    expect(artifactFileName(base)).toBe('gson-2.10.jar');
    expect(artifactFileName({ ...base, classifier: 'sources' })).toBe('gson-2.10-sources.jar');
  });

  it('recognizes role ids', () => {
    expect(isRoleId('jenkinsPlugins')).toBe(true);
    expect(isRoleId('compile')).toBe(false);
  });
});

describe('classify', () => {
  it('treats hpi and jpi packaging as host extensions, by type not file', () => {
    expect(classify({ type: 'hpi' })).toBe(ArtifactKind.HostExtension);
    expect(classify({ type: 'jpi' })).toBe(ArtifactKind.HostExtension);
    expect(classify({ type: 'jar' })).toBe(ArtifactKind.OrdinaryLibrary);
    expect(classify({ type: 'war' })).toBe(ArtifactKind.OrdinaryLibrary);
    expect(isHostExtension({ type: 'hpi' })).toBe(true);
  });
});
