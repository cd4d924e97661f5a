/**
 * Fetch entrypoint: exports the default transport and its options.
 * @module
 */
export { FetchClient, type FetchClientOptions, toBaseUrl } from './client.js';
export { mergeHeaderOptions } from './utils.js';
