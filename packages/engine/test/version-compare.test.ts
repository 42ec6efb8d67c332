/**
 * hpikit Engine: Version Ordering Tests
 */

import { describe, it, expect } from 'vitest';
import { compareVersions, newerVersion } from '../src/resolution/version-compare.js';

describe('compareVersions', () => {
  it.each([
    ['1.0', '1.0.1'],
    ['2.9', '2.10'],
    ['1.0-rc1', '1.0'],
    ['1.0-SNAPSHOT', '1.0'],
    ['1.0-dev', '1.0-rc1'],
    ['1.0-rc1', '1.0-rc2'],
    ['1.0-beta', '1.0-rc1'],
    ['1.0', '1.0-sp1'],
  ])('%s is older than %s', (older, newer) => {
    expect(compareVersions(older, newer)).toBeLessThan(0);
    expect(compareVersions(newer, older)).toBeGreaterThan(0);
  });

  it('treats separators and case alike', () => {
    expect(compareVersions('1.0-RC1', '1.0.rc1')).toBe(0);
    expect(compareVersions('1_2', '1.2')).toBe(0);
  });

  it('treats identical versions as equivalent', () => {
    expect(compareVersions('2.440', '2.440')).toBe(0);
    expect(compareVersions('1.0-rc1', '1.0-rc1')).toBe(0);
    expect(compareVersions('', '')).toBe(0);
  });
});

describe('newerVersion', () => {
  it('returns the newer of two versions, the first on a tie', () => {
    expect(newerVersion('32.1', '33.0')).toBe('33.0');
    expect(newerVersion('1.0', '1.0')).toBe('1.0');
  });
});
