// CLI error handling utilities

import { TrackerError, ValidationError, SecurityError, NotFoundError, GateError } from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof SecurityError) {
    return `Security Error: ${error.message}`;
  }

  if (error instanceof NotFoundError) {
    return `Not Found: ${error.message}`;
  }

  if (error instanceof GateError) {
    const lines = error.failures.map(f => `  - [${f.gate}] ${f.message}`);
    return [`Error [${error.code}]: Cannot move ${error.artifactId} to ${error.to}`, ...lines].join('\n');
  }

  if (error instanceof TrackerError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error: the tracker error's own, 1 for anything else
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof TrackerError ? error.exitCode : 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`✓ ${message}`);
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.log(`ℹ ${message}`);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.warn(`⚠ ${message}`);
}
