/**
 * hpikit Runtime Host: Persisted Build Inputs
 *
 * BuildInputStore over `state/build-inputs.json`: a flat map from
 * `<archive>:<input>` keys to fingerprints. Recording writes through at
 * once; unparseable or foreign content reads as an empty store.
 */

import type { BuildInputStore } from '@hpikit/engine';
import type { StateIO } from './state-io.js';

export const BUILD_INPUTS_FILE = 'build-inputs.json';

export class StateBuildInputStore implements BuildInputStore {
  private readonly values: Map<string, string>;

  constructor(private readonly stateIO: StateIO) {
    this.values = new Map(readEntries(stateIO.readJson(BUILD_INPUTS_FILE)));
  }

  read(key: string): string | undefined {
    return this.values.get(key);
  }

  record(key: string, fingerprint: string): void {
    if (this.values.get(key) === fingerprint) return;
    this.values.set(key, fingerprint);
    const sorted = Array.from(this.values.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    this.stateIO.writeJson(BUILD_INPUTS_FILE, Object.fromEntries(sorted));
  }
}

function readEntries(raw: unknown): Array<[string, string]> {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) return [];
  return Object.entries(raw).filter((e): e is [string, string] => typeof e[1] === 'string');
}
