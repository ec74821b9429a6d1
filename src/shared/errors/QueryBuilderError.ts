/**
 * Base error class for query builder operations
 */
export class QueryBuilderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'QueryBuilderError';
    Object.setPrototypeOf(this, QueryBuilderError.prototype);
  }

  /**
   * Creates a structured object representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Error thrown when a value cannot be shaped into a triple pattern
 */
export class ArgumentShapeError extends QueryBuilderError {
  constructor(message: string, details?: unknown) {
    super(message, 'ARGUMENT_SHAPE_ERROR', details);
    this.name = 'ArgumentShapeError';
    Object.setPrototypeOf(this, ArgumentShapeError.prototype);
  }
}

/**
 * Error thrown during input validation
 */
export class ValidationError extends QueryBuilderError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
