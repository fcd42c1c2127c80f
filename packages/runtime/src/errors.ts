// Runtime error types

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a loaded table lacks required columns.
 * Fatal to the load; nothing downstream runs.
 */
export class SchemaError extends RuntimeError {
  readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super('SCHEMA_ERROR', `Missing required columns: ${missingColumns.join(', ')}`);
    this.name = 'SchemaError';
    this.missingColumns = missingColumns;
  }
}

/**
 * Error when a file cannot be decoded or parsed as a table.
 * Wraps the underlying failure as `cause` when there is one.
 */
export class IngestionError extends RuntimeError {
  readonly row?: number;

  constructor(message: string, options?: { cause?: unknown; row?: number }) {
    super('INGESTION_ERROR', message, { cause: options?.cause });
    this.name = 'IngestionError';
    this.row = options?.row;
  }
}

/**
 * Check if a value is one of the runtime error types.
 */
export function isRuntimeError(value: unknown): value is RuntimeError {
  return value instanceof RuntimeError;
}
