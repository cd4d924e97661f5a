/**
 * IAM entrypoint: the aggregate client plus every capability group's request and
 * response types.
 * @module
 */

export { createIAM, IAMClient, type IAMClientProps } from './client.js';
export { type IAMEndpoints, iamEndpoints } from './endpoints.js';
export * from './apiClients.js';
export * from './blockedProperties.js';
export * from './cidr.js';
export * from './credentials.js';
export * from './groups.js';
export * from './ipAllowlist.js';
export * from './properties.js';
export * from './roles.js';
export * from './schema.js';
export * from './support.js';
export * from './userLock.js';
export * from './userLookup.js';
export * from './userPassword.js';
export * from './users.js';
