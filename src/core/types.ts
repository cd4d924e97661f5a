import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Options, StatusCode } from '../types/request.js';

/** Schema for unknown input and any output, used to infer data from definitions */
// biome-ignore lint/suspicious/noExplicitAny: inference over arbitrary schema outputs needs the open output type
export type SchemaType = StandardSchemaV1<unknown, any>;
/** Empty object definition */
export type EmptyObject = Record<never, never>;

/** Enforce at least one property to be present on a type. */
export type RequireAtLeastOne<T> = {
  [K in keyof T]-?: Required<Pick<T, K>> & Partial<Pick<T, Exclude<keyof T, K>>>;
}[keyof T];

/**
 * EmptyishObject checks and allows for nulls on props
 */
export type EmptyishObject<T> = [keyof T] extends [never] ? null : T;

/**
 * HTTP methods the IAM API uses
 */
export type HttpMethod = 'get' | 'post' | 'put' | 'delete';

/**
 * Definition of one method on one endpoint.
 *
 * `status` lists every status code the operation accepts as success. Anything else,
 * including other 2xx codes, is decoded as an IAM error.
 */
export type EndpointDefinition = {
  $search?: SchemaType;
  request?: SchemaType;
  response: SchemaType;
  status: readonly StatusCode[];
};

/**
 * RequestDefinitions types up the endpoints a client can call, keyed by path template
 */
export type RequestDefinitions = {
  [path: string]: RequireAtLeastOne<{
    [M in HttpMethod]: M extends 'get' | 'delete' ? Omit<EndpointDefinition, 'request'> : EndpointDefinition;
  }>;
};

/** Parse `{param}` segments from a path template into a typed object. */
export type ParsePathParams<Path extends string> = Path extends `${infer _Start}{${infer Param}}${infer Rest}`
  ? { [K in Param]: string | number } & ParsePathParams<Rest>
  : EmptyObject;

/** Extract endpoints that support a given HTTP method. */
export type EndpointsWithMethod<Method extends HttpMethod, Schema extends RequestDefinitions> = {
  [K in keyof Schema]: Schema[K] extends Record<Method, unknown> ? K : never;
}[keyof Schema];

/**
 * ResponseType defines what will be returned
 * from the endpoint
 */
export type ResponseType<
  Schema,
  Endpoint extends keyof Schema,
  Method extends keyof Schema[Endpoint],
> = Schema[Endpoint][Method] extends { response: infer S extends SchemaType } ? StandardSchemaV1.InferOutput<S> : never;

/** Typed request body for an endpoint/method. */
export type RequestType<
  Schema,
  Endpoint extends keyof Schema,
  Method extends keyof Schema[Endpoint],
> = Schema[Endpoint][Method] extends { request: infer S extends SchemaType } ? StandardSchemaV1.InferInput<S> : null;

/** Typed query params via `$search` if present. */
export type SearchType<
  Schema,
  Endpoint extends keyof Schema,
  Method extends keyof Schema[Endpoint],
> = Schema[Endpoint][Method] extends { $search: infer S extends SchemaType }
  ? { $search: StandardSchemaV1.InferInput<S> }
  : EmptyObject;

/** Combined params object (path + query) expected by client methods. */
export type Params<
  Schema extends RequestDefinitions,
  Endpoint extends keyof Schema & string,
  Method extends HttpMethod & keyof Schema[Endpoint],
> = EmptyishObject<ParsePathParams<Endpoint> & SearchType<Schema, Endpoint, Method>>;

/** Explicitly typed GET endpoints. */
export type GetEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'get', Schema> & string;
/** Explicitly typed POST endpoints. */
export type PostEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'post', Schema> & string;
/** Explicitly typed PUT endpoints. */
export type PutEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'put', Schema> & string;
/** Explicitly typed DELETE endpoints. */
export type DeleteEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'delete', Schema> & string;

/**
 * Typed parameters for get function call parameters
 */
export type GetArgs<Schema extends RequestDefinitions, Endpoint extends GetEndpoint<Schema>> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'get'>,
  options?: Options,
];

/**
 * Typed parameters for post function call parameters
 */
export type PostArgs<Schema extends RequestDefinitions, Endpoint extends PostEndpoint<Schema>> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'post'>,
  data: RequestType<Schema, Endpoint, 'post'>,
  options?: Options,
];

/**
 * Typed parameters for put function call parameters
 */
export type PutArgs<Schema extends RequestDefinitions, Endpoint extends PutEndpoint<Schema>> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'put'>,
  data: RequestType<Schema, Endpoint, 'put'>,
  options?: Options,
];

/**
 * Typed parameters for delete function call parameters
 */
export type DeleteArgs<Schema extends RequestDefinitions, Endpoint extends DeleteEndpoint<Schema>> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'delete'>,
  options?: Options,
];

/** Typed return-type for get function */
export type GetReturn<Schema extends RequestDefinitions, T extends GetEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'get'
>;

/** Typed return-type for post function */
export type PostReturn<Schema extends RequestDefinitions, T extends PostEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'post'
>;

/** Typed return-type for put function */
export type PutReturn<Schema extends RequestDefinitions, T extends PutEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'put'
>;

/** Typed return-type for delete function */
export type DeleteReturn<Schema extends RequestDefinitions, T extends DeleteEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'delete'
>;
