import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * - `schema['~standard'].validate(input)` may be sync or async; both are handled.
 * - Issues are never short-circuited: every issue the schema reports ends up on the
 *   returned {@link ValidationError}.
 * - On success, returns `[null, value]` with the schema's output (transforms applied).
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, started] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  let result: ValidationResult;
  if (started instanceof Promise) {
    const [errAsync, resultAsync] = await safeWrapAsync(() => started);
    if (errAsync) {
      return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
    }

    result = resultAsync;
  } else {
    result = started;
  }

  if (result.issues) {
    return [new ValidationError('error validating data', [...result.issues]), null];
  }

  return [null, result.value];
}
