/**
 * hpikit Runtime Host: Repository Catalog
 *
 * A repository is a directory with a `catalog.json` describing the modules
 * it holds:
 *
 *   {
 *     "modules": [
 *       {
 *         "group": "org.example.plugins",
 *         "name": "credentials",
 *         "version": "2.3.0",
 *         "type": "hpi",
 *         "artifacts": { "hpi": "credentials-2.3.0.hpi", "jar": "credentials-2.3.0.jar" },
 *         "dependencies": ["org.example:structs:1.7", { "module": "org.example:x:1", "optional": true }]
 *       }
 *     ]
 *   }
 *
 * Artifact keys are an extension, or `<classifier>:<extension>`; paths are
 * relative to the repository directory. `type` defaults to `jar`.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ConfigurationError, parseDependencyNotation } from '@hpikit/engine';
import type { ModuleCoordinate, ValidationError, ValidationResult } from '@hpikit/engine';
import { isNodeError } from '../state/state-io.js';

export const CATALOG_FILE = 'catalog.json';

export interface CatalogDependency {
  readonly coordinate: ModuleCoordinate;
  readonly optional: boolean;
}

export interface CatalogModule {
  readonly coordinate: ModuleCoordinate;
  readonly type: string;
  /** Artifact key → absolute file path. */
  readonly artifacts: ReadonlyMap<string, string>;
  readonly dependencies: ReadonlyArray<CatalogDependency>;
}

export interface Catalog {
  readonly directory: string;
  readonly modules: ReadonlyArray<CatalogModule>;
}

export function artifactKey(extension: string, classifier?: string): string {
  return classifier !== undefined ? `${classifier}:${extension}` : extension;
}

/**
 * Validate parsed catalog JSON. Every problem is reported, with its
 * location, rather than stopping at the first.
 */
export function validateCatalog(raw: unknown, directory: string): ValidationResult<Catalog> {
  const errors: ValidationError[] = [];
  const rawModules = isRecord(raw) ? raw['modules'] : undefined;
  if (!Array.isArray(rawModules)) {
    return { ok: false, errors: [{ message: 'expected an object with a "modules" array' }] };
  }

  const modules: CatalogModule[] = [];
  rawModules.forEach((entry: unknown, index: number) => {
    const at = `modules[${index}]`;
    if (!isRecord(entry)) {
      errors.push({ message: 'expected an object', context: at });
      return;
    }
    const group = entry['group'];
    const name = entry['name'];
    const version = entry['version'];
    if (!isNonEmptyString(group) || !isNonEmptyString(name) || !isNonEmptyString(version)) {
      errors.push({ message: 'group, name and version must be non-empty strings', context: at });
      return;
    }
    const type = entry['type'] ?? 'jar';
    if (!isNonEmptyString(type)) {
      errors.push({ message: 'type must be a non-empty string', context: `${at}.type` });
      return;
    }

    const artifacts = new Map<string, string>();
    const rawArtifacts = entry['artifacts'];
    if (!isRecord(rawArtifacts)) {
      errors.push({ message: 'expected an "artifacts" object', context: `${at}.artifacts` });
      return;
    }
    for (const [key, path] of Object.entries(rawArtifacts)) {
      if (!isNonEmptyString(path)) {
        errors.push({ message: 'artifact path must be a non-empty string', context: `${at}.artifacts.${key}` });
        continue;
      }
      artifacts.set(key, resolve(directory, path));
    }

    const dependencies: CatalogDependency[] = [];
    const rawDependencies = entry['dependencies'] ?? [];
    if (!Array.isArray(rawDependencies)) {
      errors.push({ message: 'expected an array', context: `${at}.dependencies` });
      return;
    }
    rawDependencies.forEach((dep: unknown, i: number) => {
      const notation = isRecord(dep) ? dep['module'] : dep;
      const optional = isRecord(dep) && dep['optional'] === true;
      const parsed = typeof notation === 'string' ? parseDependencyNotation(notation) : null;
      if (parsed === null) {
        errors.push({ message: 'expected group:name:version', context: `${at}.dependencies[${i}]` });
        return;
      }
      dependencies.push({ coordinate: parsed.coordinate, optional });
    });

    modules.push({ coordinate: { group, name, version }, type, artifacts, dependencies });
  });

  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: { directory, modules } };
}

/**
 * Load `<directory>/catalog.json`. A directory without one is an empty
 * repository.
 *
 * @throws {ConfigurationError} If the catalog is not valid JSON or fails
 *   validation
 */
export async function loadCatalog(directory: string): Promise<Catalog> {
  const path = join(directory, CATALOG_FILE);
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return { directory, modules: [] };
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new ConfigurationError(`Invalid catalog ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const result = validateCatalog(raw, directory);
  if (!result.ok) {
    const details = result.errors.map((e) => (e.context !== undefined ? `${e.context}: ${e.message}` : e.message));
    throw new ConfigurationError(`Invalid catalog ${path}:\n  ${details.join('\n  ')}`);
  }
  return result.value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value !== '';
}
