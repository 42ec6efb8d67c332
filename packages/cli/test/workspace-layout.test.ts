/**
 * hpikit CLI: Workspace Layout Tests
 *
 * The built `hpikit` bin runs under plain Node, so every workspace resolves
 * to its compiled output by default and to its sources only under the
 * `development` condition.
 */

import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const PACKAGES = new URL('../../', import.meta.url);

function pathOf(relative: string): string {
  return fileURLToPath(new URL(relative, PACKAGES));
}

function readJson(relative: string): unknown {
  return JSON.parse(readFileSync(pathOf(relative), 'utf-8'));
}

describe.each(['engine', 'runtime-host', 'cli'])('workspace %s', (name) => {
  it('exports sources for development and compiled output by default', () => {
    expect(readJson(`${name}/package.json`)).toMatchObject({
      main: './dist/index.js',
      exports: {
        '.': { types: './src/index.ts', development: './src/index.ts', default: './dist/index.js' },
      },
    });
  });

  it('compiles src/ into the dist/ its exports name', () => {
    expect(readJson(`${name}/tsconfig.build.json`)).toMatchObject({
      compilerOptions: { composite: true, rootDir: 'src', outDir: 'dist', noEmit: false },
    });
    expect(existsSync(pathOf(`${name}/src/index.ts`))).toBe(true);
  });
});

describe('hpikit bin', () => {
  it('points at the compiled form of bin/hpikit.ts', () => {
    expect(readJson('cli/package.json')).toMatchObject({ bin: { hpikit: './dist/bin/hpikit.js' } });
    expect(readJson('../package.json')).toMatchObject({ bin: { hpikit: 'packages/cli/dist/bin/hpikit.js' } });
    expect(existsSync(pathOf('cli/src/bin/hpikit.ts'))).toBe(true);
  });
});
