import { z } from 'zod';
import { validator } from '../utils/validator.js';
import { safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Title used when the error body could not be decoded as a problem payload. */
export const UNMARSHAL_ERROR_TITLE =
  'Failed to unmarshal error body. IAM API failed. Check details for more information.';

/** Title used when the error body could not be read at all. */
export const READ_ERROR_TITLE = 'Failed to read error body';

/** Problem payload returned by the IAM API on failures. Unknown keys are dropped. */
export const problemSchema = z.object({
  type: z.string().nullish(),
  title: z.string().nullish(),
  instance: z.string().nullish(),
  httpStatus: z.number().nullish(),
  detail: z.string().nullish(),
  errors: z.unknown().optional(),
});

/** Decoded problem payload fields. */
export type ProblemDetails = z.input<typeof problemSchema>;

/**
 * Error describing a failed IAM API call.
 *
 * `statusCode` is always the status of the HTTP response. `httpStatus` is whatever the payload
 * claimed, and may disagree with it.
 */
export class IAMError extends Error {
  /** IAMError error-name */
  static name = 'IAMError';

  #statusCode: number;
  #type: string;
  #title: string;
  #instance: string;
  #httpStatus: number;
  #detail: string;
  #errors: unknown;

  /** Creates a new IAMError from the response status and the decoded problem payload */
  constructor(statusCode: number, problem: ProblemDetails = {}, opts?: ErrorOptions) {
    const type = problem.type ?? '';
    const title = problem.title ?? '';
    const instance = problem.instance ?? '';
    const httpStatus = problem.httpStatus ?? 0;
    const detail = problem.detail ?? '';

    super(
      renderMessage({ type, title, instance, httpStatus, detail, errors: problem.errors, statusCode }),
      opts,
    );

    this.#statusCode = statusCode;
    this.#type = type;
    this.#title = title;
    this.#instance = instance;
    this.#httpStatus = httpStatus;
    this.#detail = detail;
    this.#errors = problem.errors;
  }

  /** HTTP status of the response */
  get statusCode(): number {
    return this.#statusCode;
  }

  /** Problem type URI */
  get type(): string {
    return this.#type;
  }

  get title(): string {
    return this.#title;
  }

  get instance(): string {
    return this.#instance;
  }

  /** Status reported inside the payload, 0 when absent */
  get httpStatus(): number {
    return this.#httpStatus;
  }

  get detail(): string {
    return this.#detail;
  }

  /** Raw sub-errors payload, if the API sent one */
  get errors(): unknown {
    return this.#errors;
  }

  /**
   * Reports whether `target` describes the same failure: equal status code and equal rendered message.
   */
  is(target: unknown): boolean {
    return target instanceof IAMError && target.statusCode === this.statusCode && target.message === this.message;
  }
}

interface RenderFields {
  type: string;
  title: string;
  instance: string;
  httpStatus: number;
  detail: string;
  errors: unknown;
  statusCode: number;
}

function renderMessage({ type, title, instance, httpStatus, detail, errors, statusCode }: RenderFields): string {
  const body = {
    type,
    title,
    ...(instance ? { instance } : {}),
    ...(httpStatus ? { httpStatus } : {}),
    detail,
    ...(errors !== undefined ? { errors } : {}),
    ...(statusCode ? { statusCode } : {}),
  };

  return `API error: \n${JSON.stringify(body, null, '\t')}`;
}

/**
 * Reads the body of a failed response into an {@link IAMError}.
 *
 * Never fails: a body that is not a problem payload becomes the `detail` of an error titled
 * {@link UNMARSHAL_ERROR_TITLE}.
 */
export async function parseIAMError(response: Response): Promise<IAMError> {
  const [errRead, text] = await safeWrapAsync(() => response.text());
  if (errRead) {
    return new IAMError(response.status, { title: READ_ERROR_TITLE, detail: errRead.message }, { cause: errRead });
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (!errJson) {
    // A JSON null decodes to an empty problem
    const [errProblem, problem] = await validator(json, problemSchema.nullable());
    if (!errProblem) {
      return new IAMError(response.status, problem ?? {});
    }
  }

  return new IAMError(response.status, { title: UNMARSHAL_ERROR_TITLE, detail: text });
}

/**
 * Type guard for {@link IAMError}.
 */
export function isIAMError(error: unknown): error is IAMError {
  return isErrorType(IAMError, error);
}

/**
 * Extract an {@link IAMError} from an unknown error value, following nested causes.
 */
export function getIAMError(error: unknown): IAMError | null {
  return unwrapErrorType(IAMError, error);
}

/**
 * Reports whether the {@link IAMError} wrapped anywhere in `error` is the same failure as `target`.
 */
export function matchesIAMError(error: unknown, target: IAMError): boolean {
  return getIAMError(error)?.is(target) ?? false;
}
