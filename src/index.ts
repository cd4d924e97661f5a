/**
 * Root entrypoint: the IAM client, the core request client, logging and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Client for the Identity and Access Management API and all of its request and response types.
 */
export * from './iam/index.js';

/**
 * Constructor options accepted by {@link RequestClient}.
 */
export type { RequestClientProps } from './core/client.js';

/**
 * Typed HTTP client the IAM operations are built on.
 */
export { RequestClient } from './core/client.js';

/**
 * Shape of endpoint definition maps consumed by {@link RequestClient}.
 */
export type { RequestDefinitions } from './core/types.js';

/**
 * Default transport, and the contract a signing transport implements.
 */
export { FetchClient, type FetchClientOptions } from './fetch/client.js';
export type { Config, FetchClientProvider, FetchClientProviderDefinition, Options } from './types/request.js';

/**
 * Loggers accepted by the client.
 */
export { ConsoleLogger, type LogContext, type Logger, type LogLevel, NoopLogger } from './log/logger.js';

/**
 * Typed errors and helpers for identifying and unwrapping them.
 */
export * from './error/index.js';

/**
 * Error-first tuple helpers.
 */
export { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './utils/wrap.js';
