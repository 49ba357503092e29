/**
 * Base class for errors raised by the tagstore domain.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  readonly details: Record<string, unknown> | undefined;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }

  toJSON() {
    return {
      code: this.code,
      details: this.details,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * Caller input rejected before any backend call. Always recoverable by
 * correcting the input.
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
}
