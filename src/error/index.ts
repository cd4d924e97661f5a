/**
 * Error entrypoint: exports typed errors and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error representing a path template that could not be turned into a URL. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error representing a non-2xx HTTP response from the fetch transport. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Decoded IAM API failure, and helpers to compare failures. */
export {
  getIAMError,
  IAMError,
  isIAMError,
  matchesIAMError,
  parseIAMError,
  type ProblemDetails,
  READ_ERROR_TITLE,
  UNMARSHAL_ERROR_TITLE,
} from './iamError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Per-operation wrapper error. */
export { getOperationError, IAMOperationError, isOperationError } from './operationError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, issuePath, ValidationError } from './validationError.js';
