/**
 * hpikit Engine: Build Configuration Tests
 *
 * Declare phase, freeze, and the pluginResources copy made at freeze time.
 */

import { describe, it, expect } from 'vitest';
import { BuildConfiguration } from '../src/configuration/build-configuration.js';
import { ConfigurationError } from '../src/errors.js';
import { RoleId } from '../src/types/role.js';

const PROJECT = { group: 'org.example.plugins', name: 'widget-plugin', version: '1.0.0' };

describe('BuildConfiguration declare phase', () => {
  it('parses notation and keeps declaration order', () => {
    const config = new BuildConfiguration({ project: PROJECT });
    config.declare(RoleId.Implementation, 'com.example:gson:2.10');
    config.declare(RoleId.Implementation, 'com.example:jsoup:1.17:sources@zip');

    expect(config.dependencies(RoleId.Implementation)).toEqual([
      {
        coordinate: { group: 'com.example', name: 'gson', version: '2.10' },
        classifier: undefined,
        extension: undefined,
        transitive: true,
      },
      {
        coordinate: { group: 'com.example', name: 'jsoup', version: '1.17' },
        classifier: 'sources',
        extension: 'zip',
        transitive: false,
      },
    ]);
  });

  it('ignores a repeated declaration', () => {
    const config = new BuildConfiguration({ project: PROJECT });
    config.declare(RoleId.Implementation, 'com.example:gson:2.10');
    config.declare(RoleId.Implementation, 'com.example:gson:2.10');
    expect(config.dependencies(RoleId.Implementation)).toHaveLength(1);
  });

  it('rejects malformed notation', () => {
    const config = new BuildConfiguration({ project: PROJECT });
    expect(() => config.declare(RoleId.Implementation, 'com.example:gson')).toThrow(
      'Malformed dependency notation on \'implementation\': "com.example:gson". ' +
        'Expected group:name:version[:classifier][@extension].',
    );
  });

  it('registers the standard rewrites in order', () => {
    const config = new BuildConfiguration({ project: PROJECT });
    expect(config.listRewrites()).toEqual([
      { source: RoleId.Plugins, target: RoleId.ProvidedCompile },
      { source: RoleId.OptionalPlugins, target: RoleId.ProvidedCompile },
      { source: RoleId.TestPlugins, target: RoleId.TestImplementation },
    ]);
    expect(config.rewritesInto(RoleId.ProvidedCompile)).toHaveLength(2);
  });

  it('applies option and metadata updates before freeze', () => {
    const config = new BuildConfiguration({ project: PROJECT, options: { fileExtension: 'jpi' } });
    config.updateProject({ shortName: 'gadget' });
    config.updateOptions({ configurePublishing: false });
    expect(config.project.shortName).toBe('gadget');
    expect(config.options.fileExtension).toBe('jpi');
    expect(config.options.configurePublishing).toBe(false);
    expect(config.options.configureRepositories).toBe(true);
  });
});

describe('BuildConfiguration freeze', () => {
  it('rejects declarations after freeze', () => {
    const config = new BuildConfiguration({ project: PROJECT });
    config.freeze();
    expect(() => config.declare(RoleId.Implementation, 'com.example:gson:2.10')).toThrow(
      "Cannot declare a dependency on 'implementation': the build configuration is frozen. " +
        'Declarations must be complete before resolution starts.',
    );
    expect(() => config.rewrite(RoleId.Plugins, RoleId.CompileClasspath)).toThrow(ConfigurationError);
    expect(() => config.updateProject({ version: '2.0' })).toThrow(ConfigurationError);
    expect(config.roles.isFrozen).toBe(true);
  });

  it('copies direct plugin declarations onto pluginResources', () => {
    const config = new BuildConfiguration({ project: PROJECT });
    config.declare(RoleId.Plugins, 'org.example.plugins:credentials:2.3');
    config.declare(RoleId.TestPlugins, 'org.example.plugins:matrix:1.4');
    config.declare(RoleId.Implementation, 'com.example:gson:2.10');
    config.freeze();

    expect(config.dependencies(RoleId.PluginResources)).toEqual([
      {
        coordinate: { group: 'org.example.plugins', name: 'credentials', version: '2.3' },
        transitive: true,
        reason: 'declared on jenkinsPlugins',
      },
      {
        coordinate: { group: 'org.example.plugins', name: 'matrix', version: '1.4' },
        transitive: true,
        reason: 'declared on jenkinsTest',
      },
    ]);
  });

  it('is idempotent', () => {
    const config = new BuildConfiguration({ project: PROJECT });
    config.declare(RoleId.Plugins, 'org.example.plugins:credentials:2.3');
    config.freeze();
    config.freeze();
    expect(config.dependencies(RoleId.PluginResources)).toHaveLength(1);
  });
});
