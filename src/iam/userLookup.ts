import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import { accessLevelSchema, BLANK, CLIENT_TYPES, type ClientType, oneOf, requiredString } from './schema.js';

/** Group filter for CP code lookups. Empty fields are left out of the request. */
export interface AllowedCPCodesGroup {
  groupId?: number;
  groupName?: string;
  isBlocked?: boolean;
  parentGroupId?: number;
  roleDescription?: string;
  roleId?: number;
  roleName?: string;
  subGroups?: AllowedCPCodesGroup[];
}

const allowedCPCodesGroupSchema: z.ZodType<AllowedCPCodesGroup> = z.lazy(() =>
  z.object({
    groupId: z.number().optional(),
    groupName: z.string().optional(),
    isBlocked: z.boolean().optional(),
    parentGroupId: z.number().optional(),
    roleDescription: z.string().optional(),
    roleId: z.number().optional(),
    roleName: z.string().optional(),
    subGroups: z.array(allowedCPCodesGroupSchema).optional(),
  }),
);

export const allowedCPCodeSchema = z.object({
  name: z.string(),
  value: z.number(),
});
export type AllowedCPCode = z.infer<typeof allowedCPCodeSchema>;

export const authorizedUserSchema = z.object({
  email: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  uiIdentityId: z.string(),
  username: z.string(),
});
export type AuthorizedUser = z.infer<typeof authorizedUserSchema>;

export const allowedAPISchema = z.object({
  accessLevels: z.array(accessLevelSchema),
  apiId: z.number(),
  apiName: z.string(),
  description: z.string().optional(),
  documentationUrl: z.string().optional(),
  endpoint: z.string().optional(),
  hasAccess: z.boolean(),
  serviceProviderId: z.number().optional(),
});
export type AllowedAPI = z.infer<typeof allowedAPISchema>;

export interface AccessibleSubGroup {
  groupId: number;
  groupName: string;
  parentGroupId?: number;
  subGroups?: AccessibleSubGroup[] | null;
}

const accessibleSubGroupSchema: z.ZodType<AccessibleSubGroup> = z.lazy(() =>
  z.object({
    groupId: z.number(),
    groupName: z.string(),
    parentGroupId: z.number().optional(),
    subGroups: z.array(accessibleSubGroupSchema).nullish(),
  }),
);

export const accessibleGroupSchema = z.object({
  groupId: z.number(),
  groupName: z.string(),
  isBlocked: z.boolean().optional(),
  roleDescription: z.string().optional(),
  roleId: z.number(),
  roleName: z.string(),
  subGroups: z.array(accessibleSubGroupSchema).nullish(),
});
export type AccessibleGroup = z.infer<typeof accessibleGroupSchema>;

const allowedCPCodesBodySchema = z.object({
  clientType: z.enum(CLIENT_TYPES),
  groups: z.array(allowedCPCodesGroupSchema).optional(),
});

export const userLookupEndpoints = {
  '/identity-management/v3/users': {
    get: {
      response: z.array(authorizedUserSchema),
      status: [200],
    },
  },
  '/identity-management/v3/users/{userName}/allowed-cpcodes': {
    post: {
      request: allowedCPCodesBodySchema,
      response: z.array(allowedCPCodeSchema),
      status: [200],
    },
  },
  '/identity-management/v3/users/{userName}/allowed-apis': {
    get: {
      $search: z.object({ allowAccountSwitch: z.boolean(), clientType: z.enum(CLIENT_TYPES).optional() }),
      response: z.array(allowedAPISchema),
      status: [200],
    },
  },
  '/identity-management/v3/users/{userName}/group-access': {
    get: {
      response: z.array(accessibleGroupSchema),
      status: [200],
    },
  },
} satisfies RequestDefinitions;

const listAllowedCPCodesRequestSchema = z.object({
  body: z
    .object(
      {
        clientType: oneOf(CLIENT_TYPES, 'or'),
        groups: z.array(allowedCPCodesGroupSchema).optional(),
      },
      { required_error: BLANK },
    )
    .superRefine((body, ctx) => {
      if (body.clientType === 'SERVICE_ACCOUNT' && !body.groups?.length) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['groups'], message: BLANK });
      }
    }),
  userName: requiredString(),
});

const listAllowedAPIsRequestSchema = z.object({
  allowAccountSwitch: z.boolean().optional(),
  clientType: oneOf(CLIENT_TYPES, 'or').optional(),
  userName: requiredString(),
});

const userNameRequestSchema = z.object({
  userName: requiredString(),
});

export interface ListAllowedCPCodesRequest {
  userName: string;
  body: {
    clientType: ClientType;
    /** Required for `SERVICE_ACCOUNT`. */
    groups?: AllowedCPCodesGroup[];
  };
}

export interface ListAllowedAPIsRequest {
  userName: string;
  clientType?: ClientType;
  allowAccountSwitch?: boolean;
}

/** Lookups that help fill in an API client's access before creating it. */
export interface UserLookup {
  listAllowedCPCodes(
    params: ListAllowedCPCodesRequest,
    opts?: Options,
  ): SafeWrapAsync<IAMOperationError, AllowedCPCode[]>;
  listAuthorizedUsers(opts?: Options): SafeWrapAsync<IAMOperationError, AuthorizedUser[]>;
  listAllowedAPIs(params: ListAllowedAPIsRequest, opts?: Options): SafeWrapAsync<IAMOperationError, AllowedAPI[]>;
  listAccessibleGroups(
    params: { userName: string },
    opts?: Options,
  ): SafeWrapAsync<IAMOperationError, AccessibleGroup[]>;
}

export class UserLookupAPI implements UserLookup {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  listAllowedCPCodes(params: ListAllowedCPCodesRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list allowed CP codes', () =>
      withValidRequest(params, listAllowedCPCodesRequestSchema, ({ body, userName }) =>
        this.#ctx.client.post('/identity-management/v3/users/{userName}/allowed-cpcodes', { userName }, body, opts),
      ),
    );
  }

  listAuthorizedUsers(opts?: Options) {
    return runOperation(this.#ctx.logger, 'list authorized users', () =>
      this.#ctx.client.get('/identity-management/v3/users', null, opts),
    );
  }

  listAllowedAPIs(params: ListAllowedAPIsRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list allowed APIs', () =>
      withValidRequest(params, listAllowedAPIsRequestSchema, ({ allowAccountSwitch, clientType, userName }) =>
        this.#ctx.client.get(
          '/identity-management/v3/users/{userName}/allowed-apis',
          { userName, $search: { allowAccountSwitch: allowAccountSwitch ?? false, clientType } },
          opts,
        ),
      ),
    );
  }

  listAccessibleGroups(params: { userName: string }, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list accessible groups', () =>
      withValidRequest(params, userNameRequestSchema, ({ userName }) =>
        this.#ctx.client.get('/identity-management/v3/users/{userName}/group-access', { userName }, opts),
      ),
    );
  }
}
