import type { FetchClientOptions } from '../fetch/client.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null>;

/**
 * Success codes an endpoint may declare. Failures are never declared: any status outside an
 * endpoint's list is decoded as an API error.
 */
export type StatusCode = 200 | 201 | 202 | 203 | 204 | 205 | 206 | 207 | 208 | 226;

/** Options to pass in for each fetch request */
export interface FetchOptions extends Omit<RequestInit, 'headers'> {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Per-request options, passed through to the transport. */
export type Options = Pick<FetchOptions, 'headers' | 'signal'>;

/**
 * Runtime configuration payload accepted by `RequestClient.config`.
 * - `fetchOpts`: default fetch options (headers, credentials, mode).
 */
export interface Config {
  fetchOpts?: Pick<FetchOptions, 'credentials' | 'headers' | 'mode'>;
}

/** Contract for HTTP transports used by RequestClient. Sign requests here. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, Response>;
  /** Executes a PUT request. */
  put: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, Response>;
  /** Executes a POST request. */
  post: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, Response>;
  /** Executes a DELETE request. */
  delete: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, Response>;
  /** Updates default options for the provider. */
  config: (opts: FetchClientOptions) => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the transport, with a base-url + options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
