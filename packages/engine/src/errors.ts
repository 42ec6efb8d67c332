/**
 * hpikit Engine: Error Taxonomy
 *
 * Every failure in the engine is one of three kinds. None of them is
 * retried: all are deterministic given the same inputs, so the remedy is
 * always a change to the project's configuration or dependency declarations.
 *
 *   ConfigurationError: invalid or late role/metadata declarations
 *   ResolutionError   : artifact not found, version conflict
 *   AssemblyError     : I/O failure while writing an archive
 *
 * Errors are never downgraded to warnings.
 */

import type { ModuleCoordinate } from './types/coordinate.js';
import { formatCoordinate } from './types/coordinate.js';

/**
 * Base class for all hpikit errors. The CLI catches this type and turns it
 * into a non-zero exit; anything else is rethrown.
 */
export class HpikitError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HpikitError';
  }
}

/**
 * Invalid or late configuration: undeclared role lookups, cyclic role
 * graphs, declarations made after freeze, missing required metadata.
 */
export class ConfigurationError extends HpikitError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A role could not be resolved. Carries the offending module coordinate and
 * the role whose resolution failed.
 */
export class ResolutionError extends HpikitError {
  readonly coordinate: ModuleCoordinate;
  readonly role: string;

  constructor(coordinate: ModuleCoordinate, role: string, detail: string) {
    super(`Could not resolve ${formatCoordinate(coordinate)} for role '${role}': ${detail}`);
    this.name = 'ResolutionError';
    this.coordinate = coordinate;
    this.role = role;
  }
}

/**
 * Writing an archive failed. The partial output has been discarded by the
 * time this error reaches the caller.
 */
export class AssemblyError extends HpikitError {
  readonly outputPath: string;

  constructor(outputPath: string, detail: string, options?: ErrorOptions) {
    super(`Failed to assemble ${outputPath}: ${detail}`, options);
    this.name = 'AssemblyError';
    this.outputPath = outputPath;
  }
}
