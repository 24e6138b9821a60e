import { AppError } from './AppError';

/**
 * Business Rule Error (422 Unprocessable Entity)
 * Thrown when request is well-formed but the ledger rules refuse it
 * Examples: weekend trade date, selling more than the position holds
 */
export class BusinessRuleError extends AppError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, 422, code, details);
    Object.setPrototypeOf(this, BusinessRuleError.prototype);
  }
}
