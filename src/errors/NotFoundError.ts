import { AppError } from './AppError';

/**
 * Not Found Error (404)
 * Thrown when a requested owner, portfolio or position doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message: string, code: string = 'NOT_FOUND') {
    super(message, 404, code);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}
