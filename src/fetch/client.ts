import { HTTPError } from '../error/httpError.js';
import type { FetchOptions } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchClient} wrapper. */
export interface FetchClientOptions extends Pick<FetchOptions, 'headers'> {
  /**
   * Fetch credentials mode.
   * {@link RequestCredentials}
   */
  credentials?: RequestCredentials;
  /** Fetch mode.
   * {@link RequestMode}
   */
  mode?: RequestMode;
}

/**
 * Normalizes an API host into a base URL. A bare host, as found in an `.edgerc` section,
 * gets the `https://` scheme.
 */
export function toBaseUrl(host: string): string {
  let baseUrl = /^https?:\/\//i.test(host) ? host : `https://${host}`;
  if (!baseUrl.endsWith('/')) {
    baseUrl += '/';
  }

  return baseUrl;
}

/**
 * Default transport, a thin wrapper around the native `fetch` API that:
 * - prefixes all requests with the configured API host,
 * - merges default and per-request options,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * It does not sign requests. Accounts that need EdgeGrid signing inject their own
 * provider instead.
 */
export class FetchClient {
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Default fetch options (headers, credentials, mode). */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    this.#baseUrl = toBaseUrl(baseUrl);
    this.#opts = opts ?? {};
  }

  /**
   * Updates default fetch options (merged with existing headers).
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `identity-management/v3/api-clients`).
   * @param opts - Request options merged with the client's defaults.
   */
  public get(endpoint: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, { ...opts, method: 'GET', body: undefined });
  }

  /**
   * Executes a PUT request against the given endpoint. The body is already serialized.
   */
  public put(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, { ...opts, method: 'PUT' });
  }

  /**
   * Executes a POST request against the given endpoint. The body is already serialized.
   */
  public post(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, { ...opts, method: 'POST' });
  }

  /**
   * Executes a DELETE request against the given endpoint.
   */
  public delete(endpoint: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, {
      ...opts,
      method: 'DELETE',
      body: undefined,
    });
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Errors:
   * - Network / fetch errors (including aborts from the caller's signal) are wrapped in `Error`.
   * - Non-2xx responses are wrapped in `HTTPError`.
   */
  async #request(endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);

    const [err, res] = await safeWrapAsync(() =>
      fetch(this.#constructPath(endpoint), {
        body: opts.body,
        method: opts.method,
        mode: opts.mode ?? this.#opts.mode,
        credentials: opts.credentials ?? this.#opts.credentials,
        headers,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${opts.method} request in fetchClient`, { cause: err }), null];
    }

    if (!res.ok) {
      return [new HTTPError(res, `error in ${opts.method} request in fetchClient`), null];
    }

    return [null, res];
  }

  /** Joins the base URL and endpoint, without doubling the slash between them. */
  #constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
