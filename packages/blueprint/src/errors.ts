/**
 * Typed errors shared by the blueprint and the CLI.
 * Every error carries a stable code so callers can branch without parsing messages.
 */

import type { ValidationError } from './schema.js';

export class StackError extends Error {
  code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'StackError';
    this.code = code;
  }
}

export class ConfigValidationError extends StackError {
  errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    const details = errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    super(`Invalid stack configuration: ${details}`, 'CONFIG_INVALID');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class ConfigNotFoundError extends StackError {
  constructor(configPath: string) {
    super(`Config file not found: ${configPath}`, 'CONFIG_NOT_FOUND');
    this.name = 'ConfigNotFoundError';
  }
}

export class MissingRequiredFieldError extends StackError {
  field: string;

  constructor(field: string, context: string) {
    super(`${field} is required ${context}`, 'MISSING_REQUIRED_FIELD');
    this.name = 'MissingRequiredFieldError';
    this.field = field;
  }
}

export class InvalidIdentifierError extends StackError {
  value: string;

  constructor(value: string, what: string) {
    super(
      `Invalid ${what} "${value}": must be lowercase alphanumeric with hyphens, start and end with an alphanumeric, 1-63 chars`,
      'INVALID_IDENTIFIER'
    );
    this.name = 'InvalidIdentifierError';
    this.value = value;
  }
}

export class UnknownArtifactKindError extends StackError {
  kind: string;

  constructor(kind: string, mode: string) {
    super(`No template for artifact kind "${kind}" in ${mode} mode`, 'UNKNOWN_ARTIFACT_KIND');
    this.name = 'UnknownArtifactKindError';
    this.kind = kind;
  }
}

export class DuplicateArtifactPathError extends StackError {
  path: string;

  constructor(path: string) {
    super(`Layout plan contains ${path} more than once`, 'DUPLICATE_ARTIFACT_PATH');
    this.name = 'DuplicateArtifactPathError';
    this.path = path;
  }
}

export class ArtifactWriteFailedError extends StackError {
  path: string;

  constructor(path: string, reason: string) {
    super(`Failed to write ${path}: ${reason}`, 'ARTIFACT_WRITE_FAILED');
    this.name = 'ArtifactWriteFailedError';
    this.path = path;
  }
}

export class WorkspaceLockedError extends StackError {
  lockPath: string;

  constructor(lockPath: string) {
    super(
      `Another lakestack run holds ${lockPath}. Remove the file if no other run is active.`,
      'WORKSPACE_LOCKED'
    );
    this.name = 'WorkspaceLockedError';
    this.lockPath = lockPath;
  }
}

export class UnsafeResetError extends StackError {
  constructor(dir: string) {
    super(`Refusing to remove ${dir}: it is the filesystem root or contains the current directory`, 'UNSAFE_RESET');
    this.name = 'UnsafeResetError';
  }
}

export class InvalidTransitionError extends StackError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(`Invalid lifecycle transition: ${from} -> ${to}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}
