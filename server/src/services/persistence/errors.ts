/**
 * Persistence Errors
 *
 * Every store operation fails with one of these. SQLite errors are
 * translated on the way out so callers never see driver error codes.
 */

export type PersistenceErrorCode = 'NOT_FOUND' | 'CONSTRAINT_VIOLATION' | 'TRANSACTION_FAILURE';

/** Entity kinds plus the metadata relation */
export type PersistenceTarget = 'library' | 'series' | 'book' | 'book_metadata';

export interface ErrorContext {
  entity: PersistenceTarget;
  operation: string;
  id?: string;
}

export abstract class PersistenceError extends Error {
  abstract readonly code: PersistenceErrorCode;
  readonly entity: PersistenceTarget;
  readonly operation: string;
  readonly id?: string;
  /** Extra facts for the caller, e.g. rows committed before a batch failed */
  readonly details: Record<string, unknown> = {};

  constructor(message: string, context: ErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.entity = context.entity;
    this.operation = context.operation;
    this.id = context.id;
  }
}

export class NotFoundError extends PersistenceError {
  readonly code = 'NOT_FOUND';

  constructor(context: ErrorContext, message?: string) {
    super(message ?? `${context.entity}${context.id ? ` ${context.id}` : ''} not found`, context);
    this.name = 'NotFoundError';
  }
}

export class ConstraintViolationError extends PersistenceError {
  readonly code = 'CONSTRAINT_VIOLATION';
  /** Validation issues, when the violation was caught before writing */
  readonly issues: string[];

  constructor(context: ErrorContext, message: string, options?: { cause?: unknown; issues?: string[] }) {
    super(message, context, options);
    this.name = 'ConstraintViolationError';
    this.issues = options?.issues ?? [];
  }
}

export class TransactionFailureError extends PersistenceError {
  readonly code = 'TRANSACTION_FAILURE';

  constructor(context: ErrorContext, message: string, options?: { cause?: unknown }) {
    super(message, context, options);
    this.name = 'TransactionFailureError';
  }
}

// =============================================================================
// Translation
// =============================================================================

function getSqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map any error raised by the driver into the persistence taxonomy.
 * Errors already in the taxonomy pass through unchanged.
 */
export function toPersistenceError(error: unknown, context: ErrorContext): PersistenceError {
  if (error instanceof PersistenceError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = getSqliteCode(error);

  if (code?.startsWith('SQLITE_CONSTRAINT')) {
    return new ConstraintViolationError(
      context,
      `Cannot ${context.operation} ${context.entity}${context.id ? ` ${context.id}` : ''}: ${message}`,
      { cause: error }
    );
  }

  return new TransactionFailureError(
    context,
    `Failed to ${context.operation} ${context.entity}${context.id ? ` ${context.id}` : ''}: ${message}`,
    { cause: error }
  );
}
