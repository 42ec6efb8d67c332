/**
 * hpikit Engine: Build-Input Fingerprints
 *
 * A fingerprint is the SHA-256 of a value's canonical JSON form. Canonical
 * form sorts object keys at every level, so two structurally equal values
 * always produce the same fingerprint regardless of property insertion
 * order. Arrays keep their order: for ordered data such as manifest
 * attributes, order is content.
 */

import { createHash } from 'node:crypto';

declare const __fingerprintBrand: unique symbol;

/**
 * A branded SHA-256 hex digest. Only fingerprint() produces one.
 */
export type Fingerprint = string & {
  readonly [__fingerprintBrand]: 'Fingerprint';
};

export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return '{' + entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',') + '}';
  }
  return JSON.stringify(String(value));
}

export function fingerprint(value: unknown): Fingerprint {
  const hex = createHash('sha256').update(canonicalize(value)).digest('hex');
  // The one place a plain string becomes a Fingerprint.
  return hex as Fingerprint;
}
