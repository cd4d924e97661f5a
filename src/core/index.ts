/**
 * Core entrypoint: exports the typed request client, and request definitions.
 * Import from here to define endpoints of your own on the same pipeline.
 * @module
 */

/**
 * Constructor options accepted by {@link RequestClient}.
 */
export type { RequestClientProps } from './client.js';

/**
 * Typed HTTP client that builds URLs from endpoint definitions, validates payloads and
 * accepts only each endpoint's declared status codes.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 */
export { RequestClient } from './client.js';

/**
 * RequestDefinitions types up the possible variations of
 * the endpoints we create
 */
export type { RequestDefinitions } from './types.js';
