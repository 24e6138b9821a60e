import { AppError } from './AppError';

/**
 * Validation Error (400 Bad Request)
 * Thrown when request payload is invalid
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown, code: string = 'INVALID_INPUT') {
    super(message, 400, code, details);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
