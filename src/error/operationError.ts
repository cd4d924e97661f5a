import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error wrapping every failure of one IAM operation, so callers can tell which call failed
 * without knowing how it failed. The message is the operation name, e.g. `create group`.
 */
export class IAMOperationError extends Error {
  /** IAMOperationError error-name */
  static name = 'IAMOperationError';
  /** Operation that failed */
  #operation: string;

  /** Creates a new operation error for `operation`, usually with the underlying failure as cause */
  constructor(operation: string, opts?: ErrorOptions) {
    super(operation, opts);
    this.#operation = operation;
  }

  /** Operation that failed */
  get operation(): string {
    return this.#operation;
  }
}

/**
 * Type guard for {@link IAMOperationError}, optionally narrowed to one operation.
 */
export function isOperationError(error: unknown, operation?: string): error is IAMOperationError {
  const found = unwrapErrorType(IAMOperationError, error);
  if (!found) {
    return false;
  }

  return operation === undefined || found.operation === operation;
}

/**
 * Extract an {@link IAMOperationError} from an unknown error value, following nested causes.
 */
export function getOperationError(error: unknown): IAMOperationError | null {
  return unwrapErrorType(IAMOperationError, error);
}
