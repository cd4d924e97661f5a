import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { RequestClient } from '../core/client.js';
import type { SchemaType } from '../core/types.js';
import { IAMOperationError } from '../error/operationError.js';
import type { Logger } from '../log/logger.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { IAMEndpoints } from './endpoints.js';

/** Shared by every operation group: one request client and one logger. */
export interface OperationContext {
  client: RequestClient<IAMEndpoints>;
  logger: Logger;
}

/**
 * Runs one IAM operation. The name is logged at debug level, and any failure comes back
 * wrapped in an {@link IAMOperationError} carrying that name.
 */
export async function runOperation<T>(
  logger: Logger,
  operation: string,
  call: () => SafeWrapAsync<Error, T>,
): SafeWrapAsync<IAMOperationError, T> {
  logger.debug(operation);

  const [err, data] = await call();
  if (err) {
    return [new IAMOperationError(operation, { cause: err }), null];
  }

  return [null, data];
}

/**
 * Validates the caller's request before anything is sent. Every violation ends up on one
 * validation error in the cause.
 */
export async function withValidRequest<S extends SchemaType, T>(
  params: unknown,
  schema: S,
  call: (valid: StandardSchemaV1.InferOutput<S>) => SafeWrapAsync<Error, T>,
): SafeWrapAsync<Error, T> {
  const [err, valid] = await validator(params, schema);
  if (err) {
    return [new Error('error validating request', { cause: err }), null];
  }

  return call(valid);
}
