/**
 * A packaged-ready project in a temp directory, with its own repository,
 * and console capture for driving the program in process.
 */

import { afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';

const created: string[] = [];

afterEach(() => {
  for (const dir of created.splice(0)) rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

function tempDir(label: string): string {
  const dir = mkdtempSync(join(tmpdir(), `hpikit-cli-${label}-`));
  created.push(dir);
  return dir;
}

function writeTree(root: string, files: Record<string, string>): void {
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, path);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content, 'utf-8');
  }
}

export interface ProjectFixture {
  readonly projectDir: string;
  readonly home: string;
}

export function emptyProject(): ProjectFixture {
  return { projectDir: tempDir('empty'), home: tempDir('home') };
}

export function widgetProject(): ProjectFixture {
  const projectDir = tempDir('project');
  writeTree(projectDir, {
    'hpikit.json': JSON.stringify({
      group: 'org.example.plugins',
      name: 'widget-plugin',
      version: '1.0.0',
      dependencies: {
        jenkinsCore: ['org.example.main:host-core:2.440.3'],
        jenkinsPlugins: ['org.example.plugins:credentials:2.3'],
        implementation: ['com.example:gson:2.10'],
      },
    }),
    'build/classes/org/example/Widget.class': 'compiled widget',
    'repository/catalog.json': JSON.stringify({
      modules: [
        { group: 'org.example.main', name: 'host-core', version: '2.440.3', artifacts: { jar: 'host-core.jar' } },
        {
          group: 'org.example.plugins',
          name: 'credentials',
          version: '2.3',
          type: 'hpi',
          artifacts: { hpi: 'credentials.hpi', jar: 'credentials.jar' },
          dependencies: ['com.example:guava:31.0'],
        },
        { group: 'com.example', name: 'guava', version: '31.0', artifacts: { jar: 'guava.jar' } },
        { group: 'com.example', name: 'gson', version: '2.10', artifacts: { jar: 'gson.jar' } },
      ],
    }),
    'repository/host-core.jar': 'core',
    'repository/credentials.hpi': 'credentials archive',
    'repository/credentials.jar': 'credentials classes',
    'repository/guava.jar': 'guava',
    'repository/gson.jar': 'gson',
  });
  return { projectDir, home: tempDir('home') };
}

const ANSI = new RegExp(`${String.fromCharCode(27)}\\[[0-9;]*m`, 'g');

export interface Captured {
  /** console.log lines, colors removed. */
  readonly log: string[];
  readonly stdout: string[];
  readonly stderr: string[];
}

export function captureOutput(): Captured {
  const captured: Captured = { log: [], stdout: [], stderr: [] };
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    captured.log.push(args.map(String).join(' ').replace(ANSI, ''));
  });
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    captured.stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    captured.stderr.push(String(chunk).replace(ANSI, ''));
    return true;
  });
  return captured;
}
