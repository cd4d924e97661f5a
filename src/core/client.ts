import { getHttpError } from '../error/httpError.js';
import { parseIAMError } from '../error/iamError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import { type Logger, NoopLogger } from '../log/logger.js';
import type {
  Config,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  Options,
} from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { getResponseData } from '../utils/getResponseData.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type {
  DeleteArgs,
  DeleteEndpoint,
  DeleteReturn,
  EndpointDefinition,
  EndpointsWithMethod,
  GetArgs,
  GetEndpoint,
  GetReturn,
  HttpMethod,
  PostArgs,
  PostEndpoint,
  PostReturn,
  PutArgs,
  PutEndpoint,
  PutReturn,
  RequestDefinitions,
  SchemaType,
} from './types.js';

/** Configuration for constructing a typed {@link RequestClient}, extends {@link Config}. */
export interface RequestClientProps<Schema extends RequestDefinitions> extends Config {
  /** HTTP transport used for requests. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** API host or base URL (e.g. `akab-xxxx.luna.akamaiapis.net`). */
  baseUrl: string;
  /**
   * Map of endpoint definitions describing request/response schemas,
   * accepted status codes and supported HTTP methods for each path template.
   */
  endpoints: Schema;
  /** Receives a debug line per request and a warning per rejected status. */
  logger?: Logger;
}

/** Endpoint definition as seen at run time, for any method. */
type AnyEndpointDefinition = Omit<EndpointDefinition, 'request'> & { request?: SchemaType };

/**
 * Typed HTTP client that:
 * - constructs URLs based on endpoint definitions,
 * - performs requests via a pluggable transport,
 * - validates request bodies, query parameters and response payloads via schemas,
 * - accepts only the status codes each endpoint declares and decodes every other
 *   response into an {@link IAMError}.
 *
 * It never retries, caches or times out on its own. Cancellation comes from the caller's
 * `signal`, which is passed through to the transport.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 *
 * @typeParam Schema - The map of endpoint definitions available to the client.
 */
export class RequestClient<Schema extends RequestDefinitions> {
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  /** Endpoint schema definitions for this client. */
  #endpoints: Schema;
  /** Default headers applied to every request (merged with per-call headers). */
  #defaultHeaders: HeaderOptions;
  #logger: Logger;

  /**
   * Creates a typed RequestClient around a transport built from `fetchProvider`.
   *
   * @param props - Configuration including base URL, endpoint schemas, and default options.
   */
  constructor({ fetchProvider = FetchClient, baseUrl, fetchOpts, endpoints, logger }: RequestClientProps<Schema>) {
    this.#endpoints = endpoints;
    this.#logger = logger ?? new NoopLogger();
    this.#defaultHeaders = mergeHeaderOptions({ Accept: 'application/json' }, fetchOpts?.headers);

    this.#fetchClient = new fetchProvider(baseUrl, {
      ...fetchOpts,
      headers: this.#defaultHeaders,
    });
  }

  /**
   * Updates fetch options at runtime and propagates them to the transport.
   */
  config({ fetchOpts }: Config) {
    if (!fetchOpts) {
      return;
    }

    this.#defaultHeaders = mergeHeaderOptions(this.#defaultHeaders, fetchOpts.headers);
    this.#fetchClient.config({
      ...fetchOpts,
      headers: this.#defaultHeaders,
    });
  }

  /**
   * Performs a GET request to the given endpoint.
   *
   * @example
   * const [err, groups] = await client.get('/identity-management/v3/user-admin/groups', {
   *   $search: { actions: false },
   * });
   */
  get<Endpoint extends GetEndpoint<Schema>>(
    ...args: GetArgs<Schema, Endpoint>
  ): SafeWrapAsync<Error, GetReturn<Schema, Endpoint>> {
    const [endpoint, params, opts = {}] = args;
    return this.#execute<'get', Endpoint, GetReturn<Schema, Endpoint>>('get', endpoint, params, null, opts);
  }

  /**
   * Performs a POST request to the given endpoint. `data` is validated against the
   * endpoint's request schema and sent as JSON, or omitted when `null`.
   */
  post<Endpoint extends PostEndpoint<Schema>>(
    ...args: PostArgs<Schema, Endpoint>
  ): SafeWrapAsync<Error, PostReturn<Schema, Endpoint>> {
    const [endpoint, params, data, opts = {}] = args;
    return this.#execute<'post', Endpoint, PostReturn<Schema, Endpoint>>('post', endpoint, params, data, opts);
  }

  /**
   * Performs a PUT request to the given endpoint. `data` is validated against the
   * endpoint's request schema and sent as JSON, or omitted when `null`.
   */
  put<Endpoint extends PutEndpoint<Schema>>(
    ...args: PutArgs<Schema, Endpoint>
  ): SafeWrapAsync<Error, PutReturn<Schema, Endpoint>> {
    const [endpoint, params, data, opts = {}] = args;
    return this.#execute<'put', Endpoint, PutReturn<Schema, Endpoint>>('put', endpoint, params, data, opts);
  }

  /**
   * Performs a DELETE request to the given endpoint.
   */
  delete<Endpoint extends DeleteEndpoint<Schema>>(
    ...args: DeleteArgs<Schema, Endpoint>
  ): SafeWrapAsync<Error, DeleteReturn<Schema, Endpoint>> {
    const [endpoint, params, opts = {}] = args;
    return this.#execute<'delete', Endpoint, DeleteReturn<Schema, Endpoint>>('delete', endpoint, params, null, opts);
  }

  /**
   * Internal pipeline shared by all verbs:
   * build URL, validate body, send, classify status, decode and validate the response.
   */
  async #execute<Method extends HttpMethod, Endpoint extends EndpointsWithMethod<Method, Schema> & string, Result>(
    method: Method,
    endpoint: Endpoint,
    params: unknown,
    rawData: unknown,
    opts: Options,
  ): SafeWrapAsync<Error, Result> {
    const definitions: RequestDefinitions[string] = this.#endpoints[endpoint];
    const schemas: AnyEndpointDefinition | undefined = definitions[method];
    if (!schemas) {
      return [new Error(`error no schemas found for ${method} ${endpoint}`), null];
    }

    const [errUrl, url] = await constructUrl(endpoint, params, schemas.$search);
    if (errUrl) {
      return [new Error(`error constructing URL in ${method}`, { cause: errUrl }), null];
    }

    let data = rawData;
    if (data !== null && data !== undefined && schemas.request) {
      const [errParse, parsed] = await validator(data, schemas.request);
      if (errParse) {
        return [new Error(`error parsing request in ${method}`, { cause: errParse }), null];
      }

      data = parsed;
    }

    const requestOptions: FetchOptions = { headers: opts.headers, signal: opts.signal };
    if (data !== null && data !== undefined) {
      requestOptions.body = JSON.stringify(data);
      requestOptions.headers = mergeHeaderOptions({ 'Content-Type': 'application/json' }, opts.headers);
    }

    this.#logger.debug(`${method.toUpperCase()} ${url}`);
    const [errReq, response] = await this.#request(method, url, requestOptions);
    if (errReq) {
      return [new Error(`error doing request in ${method}`, { cause: errReq }), null];
    }

    if (!schemas.status.some((status) => status === response.status)) {
      this.#logger.warn(`unexpected status for ${method.toUpperCase()} ${url}`, {
        status: response.status,
        expected: schemas.status,
      });

      const apiError = await parseIAMError(response);
      return [new Error(`error doing request in ${method}`, { cause: apiError }), null];
    }

    const [errData, result] = await getResponseData(response);
    if (errData) {
      return [new Error(`error getting response in ${method}`, { cause: errData }), null];
    }

    const [errParse, parsed] = await validator(result, schemas.response);
    if (errParse) {
      return [new Error(`error parsing response in ${method}`, { cause: errParse }), null];
    }

    return [null, parsed];
  }

  /**
   * Calls the transport. A transport that reports a non-2xx response as an {@link HTTPError}
   * has its response handed back, so status classification happens in one place.
   */
  async #request(method: HttpMethod, url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const [errWrapped, wrapped] = await safeWrapAsync(() => this.#fetchClient[method](url, opts));
    if (errWrapped) {
      return [new Error(`error calling request ${method.toUpperCase()} in request`, { cause: errWrapped }), null];
    }

    const [err, response] = wrapped;
    if (err) {
      const httpError = getHttpError(err);
      if (httpError) {
        return [null, httpError.response];
      }

      return [new Error(`error request ${method.toUpperCase()} in request`, { cause: err }), null];
    }

    return [null, response];
  }
}
