export interface ValidationError {
  path: string;
  message: string;
}

/**
 * Raised when a required input is missing or malformed.
 * Callers should treat it as fatal for the request: retrying with the same input fails the same way.
 */
export class InvalidInputError extends Error {
  readonly details: ValidationError[];

  constructor(message: string, details: ValidationError[] = []) {
    super(message);
    this.name = 'InvalidInputError';
    this.details = details;
  }
}

export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map(e => `${e.path}: ${e.message}`).join(', ');
}
