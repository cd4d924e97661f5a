import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type ClientScoped, createdCredentialSchema, credentialSchema } from './credentials.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import {
  ACCESS_LEVELS,
  accessLevelSchema,
  BLANK,
  clientTypeSchema,
  oneOf,
  requiredId,
  requiredString,
  SELF,
} from './schema.js';

export const apiClientSchema = z.object({
  accessToken: z.string(),
  activeCredentialCount: z.number().optional(),
  allowAccountSwitch: z.boolean().optional(),
  authorizedUsers: z.array(z.string()).nullish(),
  canAutoCreateCredential: z.boolean().optional(),
  clientDescription: z.string().optional(),
  clientId: z.string(),
  clientName: z.string().optional(),
  clientType: clientTypeSchema,
  createdBy: z.string().optional(),
  createdDate: z.string().optional(),
  isLocked: z.boolean(),
  notificationEmails: z.array(z.string()).nullish(),
  serviceConsumerToken: z.string().optional(),
});
export type APIClient = z.infer<typeof apiClientSchema>;

export const listAPIClientsActionsSchema = z.object({
  deactivateAll: z.boolean(),
  delete: z.boolean(),
  edit: z.boolean(),
  lock: z.boolean(),
  transfer: z.boolean(),
  unlock: z.boolean(),
});

export const listAPIClientsItemSchema = apiClientSchema.extend({
  actions: listAPIClientsActionsSchema.nullish(),
});
export type ListAPIClientsItem = z.infer<typeof listAPIClientsItemSchema>;

export const apiClientActionsSchema = listAPIClientsActionsSchema.extend({
  editApis: z.boolean(),
  editAuth: z.boolean(),
  editGroups: z.boolean(),
  editIpAcl: z.boolean(),
  editSwitchAccount: z.boolean(),
});
export type APIClientActions = z.infer<typeof apiClientActionsSchema>;

export const apiSchema = z.object({
  accessLevel: accessLevelSchema,
  apiId: z.number(),
  apiName: z.string().optional(),
  description: z.string().optional(),
  documentationUrl: z.string().optional(),
  endPoint: z.string().optional(),
});
export type API = z.infer<typeof apiSchema>;

/** A group the API client can reach, with the role it holds there. */
export interface ClientGroup {
  groupId: number;
  groupName?: string;
  isBlocked?: boolean;
  parentGroupId?: number;
  roleDescription?: string;
  roleId: number;
  roleName?: string;
  subgroups?: ClientGroup[] | null;
}

export const clientGroupSchema: z.ZodType<ClientGroup> = z.lazy(() =>
  z.object({
    groupId: z.number(),
    groupName: z.string().optional(),
    isBlocked: z.boolean().optional(),
    parentGroupId: z.number().optional(),
    roleDescription: z.string().optional(),
    roleId: z.number(),
    roleName: z.string().optional(),
    subgroups: z.array(clientGroupSchema).nullish(),
  }),
);

export const ipAclSchema = z.object({
  cidr: z.array(z.string()).nullish(),
  enable: z.boolean(),
});
export type IPACL = z.infer<typeof ipAclSchema>;

export const purgeOptionsSchema = z.object({
  canPurgeByCacheTag: z.boolean(),
  canPurgeByCpcode: z.boolean(),
  cpcodeAccess: z.object({
    allCurrentAndNewCpcodes: z.boolean(),
    cpcodes: z.array(z.number()).nullish(),
  }),
});
export type PurgeOptions = z.infer<typeof purgeOptionsSchema>;

export const apiClientDetailsSchema = apiClientSchema.extend({
  actions: apiClientActionsSchema.nullish(),
  apiAccess: z
    .object({
      allAccessibleApis: z.boolean(),
      apis: z.array(apiSchema).nullish(),
    })
    .optional(),
  baseURL: z.string().optional(),
  credentials: z.array(credentialSchema).nullish(),
  groupAccess: z
    .object({
      cloneAuthorizedUserGroups: z.boolean(),
      groups: z.array(clientGroupSchema).nullish(),
    })
    .optional(),
  ipAcl: ipAclSchema.nullish(),
  purgeOptions: purgeOptionsSchema.nullish(),
  serviceProviderId: z.number().optional(),
});
export type GetAPIClientResponse = z.infer<typeof apiClientDetailsSchema>;
export type UpdateAPIClientResponse = GetAPIClientResponse;

export const createAPIClientResponseSchema = apiClientDetailsSchema.extend({
  credentials: z.array(createdCredentialSchema).nullish(),
});
export type CreateAPIClientResponse = z.infer<typeof createAPIClientResponseSchema>;

const apiAccessInputSchema = z
  .object(
    {
      allAccessibleApis: z.boolean().optional(),
      apis: z
        .array(
          z.object({
            accessLevel: oneOf(ACCESS_LEVELS),
            apiId: requiredId(),
            apiName: z.string().optional(),
            description: z.string().optional(),
            documentationUrl: z.string().optional(),
            endPoint: z.string().optional(),
          }),
        )
        .nullish(),
    },
    { required_error: BLANK },
  )
  .superRefine((access, ctx) => {
    if (!access.allAccessibleApis && !access.apis?.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['apis'], message: BLANK });
    }
  });

const clientGroupInputSchema: z.ZodType<ClientGroup> = z.lazy(() =>
  z.object({
    groupId: requiredId(),
    groupName: z.string().optional(),
    isBlocked: z.boolean().optional(),
    parentGroupId: z.number().optional(),
    roleDescription: z.string().optional(),
    roleId: requiredId(),
    roleName: z.string().optional(),
    subgroups: z.array(clientGroupInputSchema).nullish(),
  }),
);

const groupAccessInputSchema = z
  .object(
    {
      cloneAuthorizedUserGroups: z.boolean().optional(),
      groups: z.array(clientGroupInputSchema).nullish(),
    },
    { required_error: BLANK },
  )
  .superRefine((access, ctx) => {
    if (!access.cloneAuthorizedUserGroups && !access.groups?.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['groups'], message: BLANK });
    }
  });

const purgeOptionsInputSchema = z.object({
  canPurgeByCacheTag: z.boolean().optional(),
  canPurgeByCpcode: z.boolean().optional(),
  cpcodeAccess: z
    .object({
      allCurrentAndNewCpcodes: z.boolean().optional(),
      cpcodes: z.array(z.number()).nullish(),
    })
    .superRefine((access, ctx) => {
      if (!access.allCurrentAndNewCpcodes && (access.cpcodes === undefined || access.cpcodes === null)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['cpcodes'], message: 'is required' });
      }
    }),
});

const apiClientBodyShape = {
  allowAccountSwitch: z.boolean().optional(),
  apiAccess: apiAccessInputSchema,
  authorizedUsers: z.array(requiredString(), { required_error: BLANK }).min(1, BLANK),
  canAutoCreateCredential: z.boolean().optional(),
  clientDescription: z.string().optional(),
  clientName: z.string().optional(),
  clientType: oneOf(['CLIENT', 'USER_CLIENT']),
  groupAccess: groupAccessInputSchema,
  ipAcl: ipAclSchema.optional(),
  notificationEmails: z.array(z.string()).optional(),
  purgeOptions: purgeOptionsInputSchema.optional(),
};

export const createAPIClientBodySchema = z.object({
  ...apiClientBodyShape,
  createCredential: z.boolean().optional(),
});
export type CreateAPIClientRequest = z.input<typeof createAPIClientBodySchema>;

export const updateAPIClientBodySchema = z.object(apiClientBodyShape);
export type UpdateAPIClientBody = z.input<typeof updateAPIClientBodySchema>;

const updateAPIClientRequestSchema = z.object({
  body: updateAPIClientBodySchema,
  clientId: z.string().optional(),
});

const unlockAPIClientRequestSchema = z.object({
  clientId: requiredString(),
});

export const apiClientEndpoints = {
  '/identity-management/v3/api-clients': {
    get: {
      $search: z.object({ actions: z.boolean() }),
      response: z.array(listAPIClientsItemSchema),
      status: [200],
    },
    post: {
      request: createAPIClientBodySchema,
      response: createAPIClientResponseSchema,
      status: [201],
    },
  },
  '/identity-management/v3/api-clients/{clientId}': {
    get: {
      $search: z.object({
        actions: z.boolean(),
        apiAccess: z.boolean(),
        credentials: z.boolean(),
        groupAccess: z.boolean(),
        ipAcl: z.boolean(),
      }),
      response: apiClientDetailsSchema,
      status: [200],
    },
    put: {
      request: updateAPIClientBodySchema,
      response: apiClientDetailsSchema,
      status: [200],
    },
    delete: {
      response: z.null(),
      status: [204],
    },
  },
  '/identity-management/v3/api-clients/{clientId}/lock': {
    put: {
      response: apiClientSchema,
      status: [200],
    },
  },
  '/identity-management/v3/api-clients/{clientId}/unlock': {
    put: {
      response: apiClientSchema,
      status: [200],
    },
  },
} satisfies RequestDefinitions;

export interface ListAPIClientsRequest {
  actions?: boolean;
}

export interface GetAPIClientRequest extends ClientScoped {
  actions?: boolean;
  apiAccess?: boolean;
  credentials?: boolean;
  groupAccess?: boolean;
  ipAcl?: boolean;
}

export interface UpdateAPIClientRequest extends ClientScoped {
  body: UpdateAPIClientBody;
}

/** API client management. */
export interface APIClients {
  lockAPIClient(params?: ClientScoped, opts?: Options): SafeWrapAsync<IAMOperationError, APIClient>;
  /** Unlocking needs an explicit client, the caller cannot unlock itself. */
  unlockAPIClient(params: { clientId: string }, opts?: Options): SafeWrapAsync<IAMOperationError, APIClient>;
  listAPIClients(params?: ListAPIClientsRequest, opts?: Options): SafeWrapAsync<IAMOperationError, ListAPIClientsItem[]>;
  getAPIClient(params?: GetAPIClientRequest, opts?: Options): SafeWrapAsync<IAMOperationError, GetAPIClientResponse>;
  createAPIClient(
    params: CreateAPIClientRequest,
    opts?: Options,
  ): SafeWrapAsync<IAMOperationError, CreateAPIClientResponse>;
  updateAPIClient(
    params: UpdateAPIClientRequest,
    opts?: Options,
  ): SafeWrapAsync<IAMOperationError, UpdateAPIClientResponse>;
  deleteAPIClient(params?: ClientScoped, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
}

export class APIClientsAPI implements APIClients {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  lockAPIClient(params: ClientScoped = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'lock api client', () =>
      this.#ctx.client.put(
        '/identity-management/v3/api-clients/{clientId}/lock',
        { clientId: params.clientId || SELF },
        null,
        opts,
      ),
    );
  }

  unlockAPIClient(params: { clientId: string }, opts?: Options) {
    return runOperation(this.#ctx.logger, 'unlock api client', () =>
      withValidRequest(params, unlockAPIClientRequestSchema, (valid) =>
        this.#ctx.client.put('/identity-management/v3/api-clients/{clientId}/unlock', valid, null, opts),
      ),
    );
  }

  listAPIClients(params: ListAPIClientsRequest = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list api clients', () =>
      this.#ctx.client.get(
        '/identity-management/v3/api-clients',
        { $search: { actions: params.actions ?? false } },
        opts,
      ),
    );
  }

  getAPIClient(params: GetAPIClientRequest = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'get api client', () =>
      this.#ctx.client.get(
        '/identity-management/v3/api-clients/{clientId}',
        {
          clientId: params.clientId || SELF,
          $search: {
            actions: params.actions ?? false,
            apiAccess: params.apiAccess ?? false,
            credentials: params.credentials ?? false,
            groupAccess: params.groupAccess ?? false,
            ipAcl: params.ipAcl ?? false,
          },
        },
        opts,
      ),
    );
  }

  createAPIClient(params: CreateAPIClientRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'create api client', () =>
      withValidRequest(params, createAPIClientBodySchema, (body) =>
        this.#ctx.client.post('/identity-management/v3/api-clients', null, body, opts),
      ),
    );
  }

  updateAPIClient(params: UpdateAPIClientRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'update api client', () =>
      withValidRequest(params, updateAPIClientRequestSchema, ({ body, clientId }) =>
        this.#ctx.client.put('/identity-management/v3/api-clients/{clientId}', { clientId: clientId || SELF }, body, opts),
      ),
    );
  }

  deleteAPIClient(params: ClientScoped = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'delete api client', () =>
      this.#ctx.client.delete('/identity-management/v3/api-clients/{clientId}', { clientId: params.clientId || SELF }, opts),
    );
  }
}
