/**
 * hpikit Runtime Host: Home Resolution Tests
 *
 * Environments are passed explicitly; process.env is never touched.
 */

import { describe, it, expect } from 'vitest';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { projectStateDir, resolveHpikitHome } from '../src/home.js';

describe('resolveHpikitHome', () => {
  it('prefers the explicit option', () => {
    expect(resolveHpikitHome({ home: '/opt/hpikit', env: { HPIKIT_HOME: '/srv/hpikit' } })).toBe('/opt/hpikit');
  });

  it('falls back to HPIKIT_HOME', () => {
    expect(resolveHpikitHome({ env: { HPIKIT_HOME: '/srv/hpikit' } })).toBe('/srv/hpikit');
  });

  it('defaults to ~/.hpikit', () => {
    expect(resolveHpikitHome({ env: {} })).toBe(join(homedir(), '.hpikit'));
    expect(resolveHpikitHome({ home: '', env: { HPIKIT_HOME: '' } })).toBe(join(homedir(), '.hpikit'));
  });

  it('makes relative paths absolute', () => {
    expect(resolveHpikitHome({ home: 'relative/home', env: {} })).toBe(resolve('relative/home'));
  });
});

describe('projectStateDir', () => {
  it('is .hpikit inside the project', () => {
    expect(projectStateDir('/work/widget')).toBe('/work/widget/.hpikit');
  });
});
