import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an HTTP response with a non-2xx status code.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static name = 'HTTPError';

  /** Response causing the HTTPError */
  #response: Response;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(response: Response, message: string = `HTTP Error: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /**
   * Response causing the HTTPError. Returns a clone while the body is unread.
   */
  get response(): Response {
    if (this.#response.bodyUsed) {
      return this.#response;
    }

    return this.#response.clone();
  }
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}
