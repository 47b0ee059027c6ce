export type MemoryErrorCode =
  | 'NotFound'
  | 'ConstraintViolation'
  | 'ToolValidationError'
  | 'ToolNotFound'
  | 'ExtractionParseError'
  | 'StoreError'
  | 'ConsolidationError';

export abstract class MemoryError extends Error {
  abstract readonly code: MemoryErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends MemoryError {
  readonly code = 'NotFound';
}

export class ConstraintViolationError extends MemoryError {
  readonly code = 'ConstraintViolation';
}

export class ToolValidationError extends MemoryError {
  readonly code = 'ToolValidationError';
}

export class ToolNotFoundError extends MemoryError {
  readonly code = 'ToolNotFound';
}

export class ExtractionParseError extends MemoryError {
  readonly code = 'ExtractionParseError';
}

/** Underlying persistence failure. The message is safe to log, not to show to users. */
export class StoreError extends MemoryError {
  readonly code = 'StoreError';
}

export class ConsolidationError extends MemoryError {
  readonly code = 'ConsolidationError';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run a store operation, turning unexpected SQLite failures into StoreError.
 * Domain errors (NotFound, ConstraintViolation) pass through unchanged.
 */
export function guardStore<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof MemoryError) throw err;
    throw new StoreError(`${operation} failed: ${errorMessage(err)}`, { cause: err });
  }
}
