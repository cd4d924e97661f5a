import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import { BLANK, oneOf, requiredId, requiredString } from './schema.js';

export const propertySchema = z.object({
  actions: z.object({ move: z.boolean() }).nullish(),
  groupId: z.number(),
  groupName: z.string(),
  propertyId: z.number(),
  propertyName: z.string(),
  propertyTypeDescription: z.string().optional(),
});
export type Property = z.infer<typeof propertySchema>;

export const propertyDetailsSchema = z.object({
  arlConfigFile: z.string().optional(),
  createdBy: z.string().optional(),
  createdDate: z.string().optional(),
  groupId: z.number(),
  groupName: z.string(),
  modifiedBy: z.string().optional(),
  modifiedDate: z.string().optional(),
  propertyId: z.number(),
  propertyName: z.string(),
});
export type PropertyDetails = z.infer<typeof propertyDetailsSchema>;

export const propertyUserSchema = z.object({
  firstName: z.string(),
  isBlocked: z.boolean(),
  lastName: z.string(),
  uiIdentityId: z.string(),
  uiUserName: z.string().optional(),
});
export type PropertyUser = z.infer<typeof propertyUserSchema>;

export const PROPERTY_USER_TYPES = ['all', 'assigned', 'blocked'] as const;
export type PropertyUserType = (typeof PROPERTY_USER_TYPES)[number];

export const propertyEndpoints = {
  '/identity-management/v3/user-admin/properties': {
    get: {
      $search: z.object({ actions: z.boolean(), groupId: z.number().optional() }),
      response: z.array(propertySchema),
      status: [200],
    },
  },
  '/identity-management/v3/user-admin/properties/{propertyId}': {
    get: {
      $search: z.object({ groupId: z.number() }),
      response: propertyDetailsSchema,
      status: [200],
    },
    put: {
      request: z.object({ destinationGroupId: z.number(), sourceGroupId: z.number() }),
      response: z.null(),
      status: [204],
    },
  },
  '/identity-management/v3/user-admin/properties/{propertyId}/users': {
    get: {
      $search: z.object({ userType: z.enum(PROPERTY_USER_TYPES).optional() }),
      response: z.array(propertyUserSchema),
      status: [200],
    },
  },
  '/identity-management/v3/user-admin/properties/{propertyId}/users/block': {
    put: {
      request: z.array(z.object({ uiIdentityId: z.string() })),
      response: z.array(propertyUserSchema),
      status: [200],
    },
  },
} satisfies RequestDefinitions;

const getPropertyRequestSchema = z.object({
  groupId: requiredId(),
  propertyId: requiredId(),
});

const listUsersForPropertyRequestSchema = z.object({
  propertyId: requiredId(),
  userType: oneOf(PROPERTY_USER_TYPES).optional(),
});

const movePropertyRequestSchema = z.object({
  body: z.object(
    {
      destinationGroupId: requiredId(),
      sourceGroupId: requiredId(),
    },
    { required_error: BLANK },
  ),
  propertyId: requiredId(),
});

const blockUsersRequestSchema = z.object({
  body: z.array(z.object({ uiIdentityId: requiredString() }), { required_error: BLANK }).min(1, BLANK),
  propertyId: requiredId(),
});

const mapPropertyNameToIDRequestSchema = z.object({
  groupId: requiredId(),
  propertyName: requiredString(),
});

export interface ListPropertiesRequest {
  /** Only properties of this group. */
  groupId?: number;
  actions?: boolean;
}

export interface GetPropertyRequest {
  propertyId: number;
  groupId: number;
}

export interface ListUsersForPropertyRequest {
  propertyId: number;
  userType?: PropertyUserType;
}

export interface MovePropertyRequest {
  propertyId: number;
  body: {
    destinationGroupId: number;
    sourceGroupId: number;
  };
}

export interface BlockUsersRequest {
  propertyId: number;
  body: { uiIdentityId: string }[];
}

export interface MapPropertyNameToIDRequest {
  groupId: number;
  propertyName: string;
}

export interface Properties {
  listProperties(params?: ListPropertiesRequest, opts?: Options): SafeWrapAsync<IAMOperationError, Property[]>;
  getProperty(params: GetPropertyRequest, opts?: Options): SafeWrapAsync<IAMOperationError, PropertyDetails>;
  listUsersForProperty(
    params: ListUsersForPropertyRequest,
    opts?: Options,
  ): SafeWrapAsync<IAMOperationError, PropertyUser[]>;
  moveProperty(params: MovePropertyRequest, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
  blockUsers(params: BlockUsersRequest, opts?: Options): SafeWrapAsync<IAMOperationError, PropertyUser[]>;
  mapPropertyIDToName(params: GetPropertyRequest, opts?: Options): SafeWrapAsync<IAMOperationError, string>;
  mapPropertyNameToID(params: MapPropertyNameToIDRequest, opts?: Options): SafeWrapAsync<IAMOperationError, number>;
}

export class PropertiesAPI implements Properties {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  listProperties(params: ListPropertiesRequest = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list properties', () =>
      this.#ctx.client.get(
        '/identity-management/v3/user-admin/properties',
        { $search: { actions: params.actions ?? false, groupId: params.groupId || undefined } },
        opts,
      ),
    );
  }

  getProperty(params: GetPropertyRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'get property', () =>
      withValidRequest(params, getPropertyRequestSchema, ({ groupId, propertyId }) =>
        this.#ctx.client.get(
          '/identity-management/v3/user-admin/properties/{propertyId}',
          { propertyId, $search: { groupId } },
          opts,
        ),
      ),
    );
  }

  listUsersForProperty(params: ListUsersForPropertyRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list users for property', () =>
      withValidRequest(params, listUsersForPropertyRequestSchema, ({ propertyId, userType }) =>
        this.#ctx.client.get(
          '/identity-management/v3/user-admin/properties/{propertyId}/users',
          { propertyId, $search: { userType } },
          opts,
        ),
      ),
    );
  }

  moveProperty(params: MovePropertyRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'move property', () =>
      withValidRequest(params, movePropertyRequestSchema, ({ body, propertyId }) =>
        this.#ctx.client.put('/identity-management/v3/user-admin/properties/{propertyId}', { propertyId }, body, opts),
      ),
    );
  }

  blockUsers(params: BlockUsersRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'block users', () =>
      withValidRequest(params, blockUsersRequestSchema, ({ body, propertyId }) =>
        this.#ctx.client.put(
          '/identity-management/v3/user-admin/properties/{propertyId}/users/block',
          { propertyId },
          body,
          opts,
        ),
      ),
    );
  }

  /** Name of a property, looked up through {@link getProperty}. */
  mapPropertyIDToName(params: GetPropertyRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'map property by id', () =>
      withValidRequest(params, getPropertyRequestSchema, async (valid): SafeWrapAsync<Error, string> => {
        const [err, property] = await this.getProperty(valid, opts);
        if (err) {
          return [err, null];
        }

        return [null, property.propertyName];
      }),
    );
  }

  /** ID of the group's property called `propertyName`, found by listing the group's properties. */
  mapPropertyNameToID(params: MapPropertyNameToIDRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'map property by name', () =>
      withValidRequest(params, mapPropertyNameToIDRequestSchema, async (valid): SafeWrapAsync<Error, number> => {
        const [err, properties] = await this.listProperties({ groupId: valid.groupId }, opts);
        if (err) {
          return [err, null];
        }

        const property = properties.find(({ propertyName }) => propertyName === valid.propertyName);
        if (!property) {
          return [new Error(`no property named '${valid.propertyName}' in group ${valid.groupId}`), null];
        }

        return [null, property.propertyId];
      }),
    );
  }
}
