/**
 * Error taxonomy shared by the store, the engines and the HTTP adapter
 * @module errors
 */

import type { ZodError } from 'zod';

/**
 * Stable error codes surfaced to callers
 */
export type BillingErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'STORAGE_CORRUPTION';

/**
 * Base class for every error the engine raises on purpose.
 *
 * Messages name the failed operation and the kind of failure; they never
 * include file-system paths.
 */
export class BillingError extends Error {
  readonly code: BillingErrorCode;
  readonly operation: string;

  constructor(code: BillingErrorCode, operation: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.operation = operation;
    this.name = 'BillingError';
  }
}

/**
 * A single field-level validation problem
 */
export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Missing or invalid input. Nothing has been written when this is thrown.
 */
export class ValidationError extends BillingError {
  readonly issues: ValidationIssue[];

  constructor(operation: string, issues: ValidationIssue[]) {
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    super('VALIDATION_ERROR', operation, `${operation} failed: invalid input (${summary})`);
    this.issues = issues;
    this.name = 'ValidationError';
  }

  /**
   * Build from a zod failure, one issue per reported path
   */
  static fromZod(operation: string, error: ZodError): ValidationError {
    return new ValidationError(
      operation,
      error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
        message: issue.message,
      }))
    );
  }
}

/**
 * Lookup by id missed
 */
export class NotFoundError extends BillingError {
  readonly collection: string;
  readonly id: string;

  constructor(operation: string, collection: string, id: string) {
    super('NOT_FOUND', operation, `${operation} failed: ${collection} record "${id}" not found`);
    this.collection = collection;
    this.id = id;
    this.name = 'NotFoundError';
  }
}

/**
 * One source the store tried to load a collection from
 */
export interface RecoveryAttempt {
  /** `primary`, or the backup file name (never a full path) */
  source: string;
  reason: string;
}

/**
 * Primary file unreadable and the latest backup unusable as well
 */
export class StorageCorruptionError extends BillingError {
  readonly collection: string;
  readonly attempts: RecoveryAttempt[];

  constructor(operation: string, collection: string, attempts: RecoveryAttempt[]) {
    const tried = attempts.map((attempt) => `${attempt.source} (${attempt.reason})`).join(', ');
    super(
      'STORAGE_CORRUPTION',
      operation,
      `${operation} failed: ${collection} storage is corrupt; tried ${tried}`
    );
    this.collection = collection;
    this.attempts = attempts;
    this.name = 'StorageCorruptionError';
  }
}

/**
 * Raised by storage formats when bytes do not decode to a record table.
 * Internal to the store, which turns it into a recovery attempt.
 */
export class StorageFormatError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageFormatError';
  }
}

/**
 * Narrow an unknown value to a BillingError
 */
export function isBillingError(error: unknown): error is BillingError {
  return error instanceof BillingError;
}

/**
 * Short, path-free reason for an unknown failure
 */
export function describeFailure(error: unknown): string {
  if (error instanceof StorageFormatError) {
    return error.message;
  }
  if (error instanceof SyntaxError) {
    return 'unparseable content';
  }
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if (error instanceof Error) {
    return error.name === 'Error' ? 'invalid content' : error.name;
  }
  return 'unknown failure';
}
