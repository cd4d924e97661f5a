import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import { BLANK, requiredId, requiredString } from './schema.js';

export const ROLE_TYPES = ['custom', 'standard'] as const;

export const grantedRoleSchema = z.object({
  grantedRoleDescription: z.string().optional(),
  grantedRoleId: z.number(),
  grantedRoleName: z.string().optional(),
});
export type GrantedRole = z.infer<typeof grantedRoleSchema>;

export const roleUserSchema = z.object({
  accountId: z.string().optional(),
  email: z.string(),
  firstName: z.string(),
  lastLoginDate: z.string().nullish(),
  lastName: z.string(),
  uiIdentityId: z.string(),
});
export type RoleUser = z.infer<typeof roleUserSchema>;

export const roleSchema = z.object({
  actions: z.object({ delete: z.boolean(), edit: z.boolean() }).nullish(),
  createdBy: z.string().optional(),
  createdDate: z.string().optional(),
  grantedRoles: z.array(grantedRoleSchema).nullish(),
  modifiedBy: z.string().optional(),
  modifiedDate: z.string().optional(),
  roleDescription: z.string().optional(),
  roleId: z.number(),
  roleName: z.string(),
  type: z.enum(ROLE_TYPES).optional(),
  users: z.array(roleUserSchema).nullish(),
});
export type Role = z.infer<typeof roleSchema>;

const roleBodySchema = z.object({
  roleName: z.string(),
  roleDescription: z.string().optional(),
  grantedRoles: z.array(z.object({ grantedRoleId: z.number() })),
});

export const roleEndpoints = {
  '/identity-management/v2/user-admin/roles': {
    get: {
      $search: z.object({
        actions: z.boolean(),
        groupId: z.number().optional(),
        ignoreContext: z.boolean(),
        users: z.boolean(),
      }),
      response: z.array(roleSchema),
      status: [200],
    },
    post: {
      request: roleBodySchema,
      response: roleSchema,
      status: [201],
    },
  },
  '/identity-management/v2/user-admin/roles/{roleId}': {
    get: {
      $search: z.object({ actions: z.boolean(), grantedRoles: z.boolean(), users: z.boolean() }),
      response: roleSchema,
      status: [200],
    },
    put: {
      request: roleBodySchema,
      response: roleSchema,
      status: [200],
    },
    delete: {
      response: z.null(),
      status: [204],
    },
  },
  '/identity-management/v2/user-admin/roles/grantable-roles': {
    get: {
      response: z.array(grantedRoleSchema),
      status: [200],
    },
  },
} satisfies RequestDefinitions;

const grantedRoleIdsSchema = z.array(z.object({ id: requiredId() }), { required_error: BLANK }).min(1, BLANK);

const createRoleRequestSchema = z.object({
  description: z.string().optional(),
  grantedRoles: grantedRoleIdsSchema,
  name: requiredString(),
});

const updateRoleRequestSchema = z.object({
  description: z.string().optional(),
  grantedRoles: grantedRoleIdsSchema,
  name: requiredString(),
  roleId: requiredId(),
});

const roleIdRequestSchema = z.object({
  roleId: requiredId(),
});

export interface CreateRoleRequest {
  name: string;
  /** Left out of the request when empty. */
  description?: string;
  /** Roles whose permissions the new role bundles. */
  grantedRoles: { id: number }[];
}

export interface UpdateRoleRequest extends CreateRoleRequest {
  roleId: number;
}

export interface GetRoleRequest {
  roleId: number;
  actions?: boolean;
  grantedRoles?: boolean;
  users?: boolean;
}

export interface ListRolesRequest {
  /** Only roles usable in this group. */
  groupId?: number;
  actions?: boolean;
  ignoreContext?: boolean;
  users?: boolean;
}

export interface Roles {
  createRole(params: CreateRoleRequest, opts?: Options): SafeWrapAsync<IAMOperationError, Role>;
  getRole(params: GetRoleRequest, opts?: Options): SafeWrapAsync<IAMOperationError, Role>;
  updateRole(params: UpdateRoleRequest, opts?: Options): SafeWrapAsync<IAMOperationError, Role>;
  deleteRole(params: { roleId: number }, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
  listRoles(params?: ListRolesRequest, opts?: Options): SafeWrapAsync<IAMOperationError, Role[]>;
  listGrantableRoles(opts?: Options): SafeWrapAsync<IAMOperationError, GrantedRole[]>;
}

function toRoleBody({ description, grantedRoles, name }: CreateRoleRequest) {
  return {
    roleName: name,
    roleDescription: description || undefined,
    grantedRoles: grantedRoles.map(({ id }) => ({ grantedRoleId: id })),
  };
}

export class RolesAPI implements Roles {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  createRole(params: CreateRoleRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'create role', () =>
      withValidRequest(params, createRoleRequestSchema, (valid) =>
        this.#ctx.client.post('/identity-management/v2/user-admin/roles', null, toRoleBody(valid), opts),
      ),
    );
  }

  getRole(params: GetRoleRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'get role', () =>
      withValidRequest(params, roleIdRequestSchema, ({ roleId }) =>
        this.#ctx.client.get(
          '/identity-management/v2/user-admin/roles/{roleId}',
          {
            roleId,
            $search: {
              actions: params.actions ?? false,
              grantedRoles: params.grantedRoles ?? false,
              users: params.users ?? false,
            },
          },
          opts,
        ),
      ),
    );
  }

  updateRole(params: UpdateRoleRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'update role', () =>
      withValidRequest(params, updateRoleRequestSchema, (valid) =>
        this.#ctx.client.put(
          '/identity-management/v2/user-admin/roles/{roleId}',
          { roleId: valid.roleId },
          toRoleBody(valid),
          opts,
        ),
      ),
    );
  }

  deleteRole(params: { roleId: number }, opts?: Options) {
    return runOperation(this.#ctx.logger, 'delete role', () =>
      withValidRequest(params, roleIdRequestSchema, ({ roleId }) =>
        this.#ctx.client.delete('/identity-management/v2/user-admin/roles/{roleId}', { roleId }, opts),
      ),
    );
  }

  listRoles(params: ListRolesRequest = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list roles', () =>
      this.#ctx.client.get(
        '/identity-management/v2/user-admin/roles',
        {
          $search: {
            actions: params.actions ?? false,
            groupId: params.groupId || undefined,
            ignoreContext: params.ignoreContext ?? false,
            users: params.users ?? false,
          },
        },
        opts,
      ),
    );
  }

  listGrantableRoles(opts?: Options) {
    return runOperation(this.#ctx.logger, 'list grantable roles', () =>
      this.#ctx.client.get('/identity-management/v2/user-admin/roles/grantable-roles', null, opts),
    );
  }
}
