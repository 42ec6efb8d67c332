/**
 * hpikit CLI: Program Tests
 *
 * Each case builds a fresh program and parses argv in process; output is
 * captured from console.log and the standard streams.
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createProgram } from '../src/commands/index.js';
import { captureOutput, emptyProject, widgetProject } from './fixture.js';

function run(...args: string[]): Promise<unknown> {
  return createProgram().parseAsync(['node', 'hpikit', ...args]);
}

describe('hpikit roles', () => {
  it('lists every role with its edges, sources before targets', async () => {
    const out = captureOutput();
    await run('roles', '--json');

    const roles: unknown = JSON.parse(out.log.join('\n'));
    expect(Array.isArray(roles)).toBe(true);
    const ids = Array.isArray(roles) ? roles.map((r: { id: string }) => r.id) : [];
    expect(ids).toHaveLength(17);
    expect(ids.indexOf('jenkinsPlugins')).toBeLessThan(ids.indexOf('providedCompile'));
    expect(ids.indexOf('providedCompile')).toBeLessThan(ids.indexOf('runtimeClasspath'));
    expect(Array.isArray(roles) ? roles.find((r: { id: string }) => r.id === 'jenkinsTest') : undefined).toEqual({
      id: 'jenkinsTest',
      visibility: 'hidden',
      description: 'Jenkins plugin test dependencies.',
      extends_into: ['testImplementation'],
      exclusions: ['org.jenkins-ci.modules:ssh-cli-auth', 'org.jenkins-ci.modules:sshd'],
    });
  });
});

describe('hpikit classpath', () => {
  it('prints the jars of a role, rewritten extension jars included', async () => {
    const { projectDir, home } = widgetProject();
    const out = captureOutput();
    await run('classpath', 'providedCompile', '-p', projectDir, '--home', home);

    const repo = join(projectDir, 'repository');
    expect(out.log).toEqual([join(repo, 'credentials.jar'), join(repo, 'host-core.jar'), join(repo, 'guava.jar')]);
    expect(process.exitCode).toBeUndefined();
  });

  it('rejects an unknown role with exit code 1', async () => {
    const out = captureOutput();
    await run('classpath', 'compile');

    expect(out.stderr).toEqual(['[hpikit classpath] Unknown role: compile\n']);
    expect(process.exitCode).toBe(1);
  });
});

describe('hpikit package', () => {
  it('writes the archive and reports it as JSON', async () => {
    const { projectDir, home } = widgetProject();
    const out = captureOutput();
    await run('package', '-p', projectDir, '--home', home, '--json');

    const report: unknown = JSON.parse(out.log.join('\n'));
    expect(report).toMatchObject({
      archive: join(projectDir, 'build/libs/widget.hpi'),
      library_jar: join(projectDir, 'build/libs/widget.jar'),
      bundled: ['gson-2.10.jar'],
      manifest_changed: true,
    });
    expect(readFileSync(join(projectDir, 'build/libs/widget.hpi')).subarray(0, 2).toString('latin1')).toBe('PK');
  });

  it('reports an unchanged manifest on the second run', async () => {
    const { projectDir, home } = widgetProject();
    const out = captureOutput();
    await run('package', '-p', projectDir, '--home', home);
    await run('package', '-p', projectDir, '--home', home);

    expect(out.log[0]).toBe(`Wrote ${join(projectDir, 'build/libs/widget.hpi')}`);
    expect(out.log[1]).toBe('  bundled:  gson-2.10.jar');
    expect(out.log[3]?.endsWith('(changed)')).toBe(true);
    expect(out.log[7]?.endsWith('(unchanged)')).toBe(true);
  });

  it('fails with exit code 1 when the project has no descriptor', async () => {
    const { projectDir, home } = emptyProject();
    const out = captureOutput();
    await run('package', '-p', projectDir, '--home', home);

    expect(out.stderr).toEqual([`[hpikit package] No hpikit.json in ${projectDir}\n`]);
    expect(process.exitCode).toBe(1);
  });

  it('applies the short name and extension overrides', async () => {
    const { projectDir, home } = widgetProject();
    const out = captureOutput();
    await run('package', '-p', projectDir, '--home', home, '--short-name', 'gadget', '--file-extension', 'jpi');
    expect(out.log[0]).toBe(`Wrote ${join(projectDir, 'build/libs/gadget.jpi')}`);
  });
});

describe('hpikit test-dependencies', () => {
  it('copies extension archives and writes the test HPL on request', async () => {
    const { projectDir, home } = widgetProject();
    const out = captureOutput();
    await run('test-dependencies', '-p', projectDir, '--home', home, '--hpl');

    expect(out.log).toEqual([
      `Wrote 1 archive(s) to ${join(projectDir, 'build/test-dependencies')}`,
      `Wrote ${join(projectDir, 'build/generated-resources/test/the.hpl')}`,
    ]);
    expect(readFileSync(join(projectDir, 'build/test-dependencies/index'), 'utf-8')).toBe('credentials\n');
  });
});

describe('hpikit manifest', () => {
  it('prints the manifest with plain line endings', async () => {
    const { projectDir, home } = widgetProject();
    const out = captureOutput();
    await run('manifest', '-p', projectDir, '--home', home);

    const text = out.stdout.join('');
    expect(text.startsWith('Manifest-Version: 1.0\nCreated-By: hpikit\nExtension-Name: widget\n')).toBe(true);
    expect(text).toContain('\nPlugin-Dependencies: credentials:2.3\n');
    expect(text).not.toContain('\r');
  });
});
