import { AppError } from './AppError';

/**
 * Conflict Error (409)
 * Thrown when a resource with the same identity already exists
 */
export class ConflictError extends AppError {
  constructor(message: string, code: string) {
    super(message, 409, code);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}
