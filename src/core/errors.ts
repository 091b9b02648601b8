// Domain-specific error types for the AirSDLC tracker

import type { ArtifactStatus } from '../models/types.js';

/**
 * Base error class for all tracker errors
 */
export abstract class TrackerError extends Error {
  abstract readonly code: string;
  /** Process exit code used by the CLI */
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for invalid input
 */
export class ValidationError extends TrackerError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Security errors for path traversal, injection, etc.
 */
export class SecurityError extends TrackerError {
  readonly code = 'SECURITY_ERROR';
  readonly exitCode = 3;
}

/**
 * Not found errors
 */
export class NotFoundError extends TrackerError {
  readonly code = 'NOT_FOUND';
  readonly exitCode = 4;

  constructor(resourceType: string, public readonly id: string) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * Storage/filesystem errors
 */
export class StorageError extends TrackerError {
  readonly code = 'STORAGE_ERROR';
  readonly exitCode = 1;
}

/**
 * Serialization/parsing errors
 */
export class SerializationError extends TrackerError {
  readonly code = 'SERIALIZATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly line?: number, public readonly column?: number) {
    super(message, { line, column });
  }
}

/**
 * Invalid .air/config.yaml
 */
export class ConfigError extends TrackerError {
  readonly code = 'CONFIG_ERROR';
  readonly exitCode = 2;
}

/**
 * Lineage violations (missing or wrong parent, cycles, retired parents, protected links)
 */
export class LineageError extends TrackerError {
  readonly code = 'LINEAGE_ERROR';
  readonly exitCode = 5;
}

/**
 * A status change that the lifecycle table does not allow
 */
export class TransitionError extends TrackerError {
  readonly code = 'INVALID_TRANSITION';
  readonly exitCode = 5;

  constructor(
    message: string,
    public readonly from: ArtifactStatus,
    public readonly to: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, from, to });
  }
}

/**
 * A single failed validation gate
 */
export interface GateFailure {
  gate: string;
  message: string;
}

/**
 * A legal transition blocked by one or more validation gates
 */
export class GateError extends TrackerError {
  readonly code = 'GATE_FAILED';
  readonly exitCode = 6;

  constructor(
    public readonly artifactId: string,
    public readonly to: ArtifactStatus,
    public readonly failures: GateFailure[]
  ) {
    super(
      `Cannot move ${artifactId} to ${to}: ${failures.map(f => f.message).join('; ')}`,
      { artifactId, to, gates: failures.map(f => f.gate) }
    );
  }
}

/**
 * Attempt to change the content of an artifact whose status forbids edits
 */
export class ImmutableArtifactError extends TrackerError {
  readonly code = 'IMMUTABLE_ARTIFACT';
  readonly exitCode = 7;

  constructor(public readonly artifactId: string, public readonly status: ArtifactStatus) {
    super(
      `${artifactId} is ${status} and can no longer be edited`,
      { artifactId, status }
    );
  }
}

/**
 * Narrows a caught value to a Node.js system error (ENOENT, EACCES, ...)
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Message of a caught value, whatever was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
