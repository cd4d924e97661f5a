import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a path template that could not be turned into a URL.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  static name = 'ConstructURLError';
  /** The URL as it looked when construction gave up */
  #url: string;

  /** Creates a new instance of a ConstructURLError with accompanying URL input */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** Partially constructed URL */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract an {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): null | ConstructURLError {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
