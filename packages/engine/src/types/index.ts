/**
 * hpikit Engine: Type Exports
 *
 * Re-exports all engine types from a single entry point.
 */

export type {
  DependencyDeclaration,
  ModuleCoordinate,
  ResolvedArtifact,
} from './coordinate.js';
export {
  artifactFileName,
  formatCoordinate,
  moduleId,
  parseDependencyNotation,
} from './coordinate.js';

export type { ExclusionRule, RoleHandle } from './role.js';
export { RoleId, RoleVisibility, isRoleId } from './role.js';

export type {
  Developer,
  FileExtension,
  PackagingOptions,
  ProjectMetadata,
} from './project.js';
export {
  DEFAULT_FILE_EXTENSION,
  DEFAULT_PACKAGING_OPTIONS,
  FILE_EXTENSIONS,
  isFileExtension,
} from './project.js';

export type { ValidationError, ValidationResult } from './validation.js';
