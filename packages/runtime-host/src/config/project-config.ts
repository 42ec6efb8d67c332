/**
 * hpikit Runtime Host: Project Descriptor
 *
 * Loads and validates `hpikit.json`, the project's build descriptor:
 *
 *   {
 *     "group": "org.example.plugins",
 *     "name": "widget-plugin",
 *     "version": "1.0.0",
 *     "coreVersion": "2.440.3",
 *     "fileExtension": "hpi",
 *     "dependencies": {
 *       "jenkinsCore": ["org.example.main:host-core:2.440.3"],
 *       "jenkinsPlugins": ["org.example.plugins:credentials:2.3.0"],
 *       "implementation": ["com.example:gson:2.10.1"]
 *     },
 *     "paths": { "classes": ["build/classes"], "output": "build/libs" }
 *   }
 *
 * Relative paths are resolved against the project directory. The result
 * feeds a fresh BuildConfiguration through toBuildConfiguration().
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import {
  BuildConfiguration,
  ConfigurationError,
  DEFAULT_PACKAGING_OPTIONS,
  isFileExtension,
  isRoleId,
  parseDependencyNotation,
} from '@hpikit/engine';
import type {
  Developer,
  PackagingOptions,
  ProjectMetadata,
  RoleId,
  ValidationError,
  ValidationResult,
} from '@hpikit/engine';
import { isRecord } from '../resolution/catalog.js';
import { isNodeError } from '../state/state-io.js';

export const PROJECT_DESCRIPTOR = 'hpikit.json';

export interface ProjectPaths {
  /** Compiled class directories, in classpath order. */
  readonly classes: ReadonlyArray<string>;
  readonly resources: string;
  /** Web resources; the test HPL's Resource-Path. */
  readonly webapp: string;
  readonly licenses: string;
  readonly output: string;
  readonly testDependencies: string;
  /** Where the test HPL is generated. */
  readonly testResources: string;
}

const DEFAULT_PATHS = {
  classes: ['build/classes'],
  resources: 'build/resources',
  webapp: 'src/main/webapp',
  licenses: 'build/licenses',
  output: 'build/libs',
  testDependencies: 'build/test-dependencies',
  testResources: 'build/generated-resources/test',
} as const;

export interface RoleDeclaration {
  readonly role: RoleId;
  readonly notation: string;
}

export interface ProjectConfig {
  readonly projectDir: string;
  readonly project: ProjectMetadata;
  readonly options: PackagingOptions;
  readonly failOnVersionConflict: boolean;
  /** Extra repositories, absolute. */
  readonly repositories: ReadonlyArray<string>;
  /** Declarations in descriptor order. */
  readonly dependencies: ReadonlyArray<RoleDeclaration>;
  readonly paths: ProjectPaths;
}

/** Command-line values that win over the descriptor. */
export interface ProjectOverrides {
  readonly shortName?: string | undefined;
  readonly fileExtension?: string | undefined;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const OPTION_FLAGS = ['configureRepositories', 'configurePublishing', 'disabledTestInjection'] as const;

/**
 * Checks a parsed `hpikit.json` and builds its ProjectConfig. Collects every
 * problem instead of stopping at the first.
 */
export class ProjectConfigValidator {
  private errors: ValidationError[] = [];

  constructor(private readonly projectDir: string) {}

  validate(raw: unknown): ValidationResult<ProjectConfig> {
    this.errors = [];
    if (!isRecord(raw)) {
      return { ok: false, errors: [{ message: 'the descriptor must be a JSON object' }] };
    }

    const group = this.requiredString(raw, 'group');
    const name = this.requiredString(raw, 'name');
    const version = this.requiredString(raw, 'version');

    const project: ProjectMetadata = {
      group: group ?? '',
      name: name ?? '',
      version: version ?? '',
      shortName: this.optionalString(raw, 'shortName'),
      displayName: this.optionalString(raw, 'displayName'),
      url: this.optionalString(raw, 'url'),
      coreVersion: this.optionalString(raw, 'coreVersion'),
      compatibleSinceVersion: this.optionalString(raw, 'compatibleSinceVersion'),
      maskClasses: this.optionalString(raw, 'maskClasses'),
      pluginFirstClassLoader: this.optionalBoolean(raw, 'pluginFirstClassLoader'),
      sandboxStatus: this.optionalBoolean(raw, 'sandboxStatus'),
      supportDynamicLoading: this.optionalBoolean(raw, 'supportDynamicLoading'),
      developers: this.developers(raw['developers']),
    };

    const fileExtension = this.optionalString(raw, 'fileExtension') ?? DEFAULT_PACKAGING_OPTIONS.fileExtension;
    if (!isFileExtension(fileExtension)) {
      this.fail(`unsupported archive extension "${fileExtension}" (expected hpi or jpi)`, 'fileExtension');
    }
    const flags: Partial<Record<(typeof OPTION_FLAGS)[number], boolean>> = {};
    for (const flag of OPTION_FLAGS) {
      const value = this.optionalBoolean(raw, flag);
      if (value !== undefined) flags[flag] = value;
    }

    const config: ProjectConfig = {
      projectDir: this.projectDir,
      project,
      options: {
        ...DEFAULT_PACKAGING_OPTIONS,
        ...flags,
        fileExtension: isFileExtension(fileExtension) ? fileExtension : DEFAULT_PACKAGING_OPTIONS.fileExtension,
        injectedTestName: this.optionalString(raw, 'injectedTestName') ?? DEFAULT_PACKAGING_OPTIONS.injectedTestName,
      },
      failOnVersionConflict: this.optionalBoolean(raw, 'failOnVersionConflict') ?? false,
      repositories: this.stringList(raw['repositories'], 'repositories').map((p) => resolve(this.projectDir, p)),
      dependencies: this.dependencies(raw['dependencies']),
      paths: this.paths(raw['paths']),
    };

    return this.errors.length > 0 ? { ok: false, errors: this.errors } : { ok: true, value: config };
  }

  private fail(message: string, context: string): void {
    this.errors.push({ message, context });
  }

  private requiredString(raw: Record<string, unknown>, field: string): string | undefined {
    const value = raw[field];
    if (typeof value !== 'string' || value.trim() === '') {
      this.fail('required, must be a non-empty string', field);
      return undefined;
    }
    return value;
  }

  private optionalString(raw: Record<string, unknown>, field: string): string | undefined {
    const value = raw[field];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
      this.fail('must be a string', field);
      return undefined;
    }
    return value;
  }

  private optionalBoolean(raw: Record<string, unknown>, field: string): boolean | undefined {
    const value = raw[field];
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') {
      this.fail('must be true or false', field);
      return undefined;
    }
    return value;
  }

  private stringList(value: unknown, context: string): string[] {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      this.fail('must be an array of strings', context);
      return [];
    }
    const strings: string[] = [];
    value.forEach((item: unknown, i: number) => {
      if (typeof item === 'string' && item !== '') strings.push(item);
      else this.fail('must be a non-empty string', `${context}[${i}]`);
    });
    return strings;
  }

  private developers(value: unknown): Developer[] | undefined {
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) {
      this.fail('must be an array', 'developers');
      return undefined;
    }
    const developers: Developer[] = [];
    value.forEach((item: unknown, i: number) => {
      if (!isRecord(item)) {
        this.fail('must be an object', `developers[${i}]`);
        return;
      }
      const developer: { id?: string; name?: string; email?: string } = {};
      for (const key of ['id', 'name', 'email'] as const) {
        const field = item[key];
        if (typeof field === 'string') developer[key] = field;
        else if (field !== undefined) this.fail('must be a string', `developers[${i}].${key}`);
      }
      developers.push(developer);
    });
    return developers;
  }

  private dependencies(value: unknown): RoleDeclaration[] {
    if (value === undefined) return [];
    if (!isRecord(value)) {
      this.fail('must be an object keyed by role', 'dependencies');
      return [];
    }
    const declarations: RoleDeclaration[] = [];
    for (const [role, notations] of Object.entries(value)) {
      if (!isRoleId(role)) {
        this.fail(`unknown role "${role}"`, 'dependencies');
        continue;
      }
      this.stringList(notations, `dependencies.${role}`).forEach((notation, i) => {
        if (parseDependencyNotation(notation) === null) {
          this.fail(
            `malformed notation "${notation}" (expected group:name:version[:classifier][@extension])`,
            `dependencies.${role}[${i}]`,
          );
          return;
        }
        declarations.push({ role, notation });
      });
    }
    return declarations;
  }

  private paths(value: unknown): ProjectPaths {
    const raw = value === undefined ? {} : value;
    if (!isRecord(raw)) {
      this.fail('must be an object', 'paths');
      return this.absolutePaths(DEFAULT_PATHS);
    }
    const single = (key: Exclude<keyof ProjectPaths, 'classes'>): string =>
      this.optionalString(raw, key) ?? DEFAULT_PATHS[key];
    const classes = raw['classes'] === undefined ? DEFAULT_PATHS.classes : this.stringList(raw['classes'], 'paths.classes');
    return this.absolutePaths({
      classes,
      resources: single('resources'),
      webapp: single('webapp'),
      licenses: single('licenses'),
      output: single('output'),
      testDependencies: single('testDependencies'),
      testResources: single('testResources'),
    });
  }

  private absolutePaths(paths: ProjectPaths): ProjectPaths {
    const abs = (p: string): string => resolve(this.projectDir, p);
    return {
      classes: paths.classes.map(abs),
      resources: abs(paths.resources),
      webapp: abs(paths.webapp),
      licenses: abs(paths.licenses),
      output: abs(paths.output),
      testDependencies: abs(paths.testDependencies),
      testResources: abs(paths.testResources),
    };
  }
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Read and validate `<projectDir>/hpikit.json`.
 *
 * @throws {ConfigurationError} If the descriptor is missing, is not JSON,
 *   or fails validation; the message lists every problem
 */
export async function loadProjectConfig(projectDir: string): Promise<ProjectConfig> {
  const dir = resolve(projectDir);
  const path = join(dir, PROJECT_DESCRIPTOR);
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      throw new ConfigurationError(`No ${PROJECT_DESCRIPTOR} in ${dir}`);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new ConfigurationError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = new ProjectConfigValidator(dir).validate(raw);
  if (!result.ok) {
    const lines = result.errors.map((e) => (e.context !== undefined ? `${e.context}: ${e.message}` : e.message));
    throw new ConfigurationError(`Invalid ${path}:\n  ${lines.join('\n  ')}`);
  }
  return result.value;
}

/**
 * A new, unfrozen BuildConfiguration for `config`, with command-line
 * overrides applied.
 *
 * @throws {ConfigurationError} If an override names an unsupported extension
 */
export function toBuildConfiguration(config: ProjectConfig, overrides: ProjectOverrides = {}): BuildConfiguration {
  const configuration = new BuildConfiguration({ project: config.project, options: config.options });
  for (const { role, notation } of config.dependencies) {
    configuration.declare(role, notation);
  }
  if (overrides.shortName !== undefined) {
    configuration.updateProject({ shortName: overrides.shortName });
  }
  if (overrides.fileExtension !== undefined) {
    if (!isFileExtension(overrides.fileExtension)) {
      throw new ConfigurationError(
        `Unsupported archive extension "${overrides.fileExtension}". Expected one of: hpi, jpi.`,
      );
    }
    configuration.updateOptions({ fileExtension: overrides.fileExtension });
  }
  return configuration;
}
