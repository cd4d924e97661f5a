import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import { oneOf, requiredId, requiredString } from './schema.js';

/** A group in the account's group tree. */
export interface Group {
  actions?: { delete: boolean; edit: boolean } | null;
  createdBy?: string;
  createdDate?: string;
  groupId: number;
  groupName: string;
  modifiedBy?: string;
  modifiedDate?: string;
  parentGroupId?: number;
  subGroups?: Group[] | null;
}

export const groupSchema: z.ZodType<Group> = z.lazy(() =>
  z.object({
    actions: z.object({ delete: z.boolean(), edit: z.boolean() }).nullish(),
    createdBy: z.string().optional(),
    createdDate: z.string().optional(),
    groupId: z.number(),
    groupName: z.string(),
    modifiedBy: z.string().optional(),
    modifiedDate: z.string().optional(),
    parentGroupId: z.number().optional(),
    subGroups: z.array(groupSchema).nullish(),
  }),
);

export const groupUserSchema = z.object({
  accountId: z.string().optional(),
  email: z.string(),
  firstName: z.string(),
  lastLoginDate: z.string().nullish(),
  lastName: z.string(),
  uiIdentityId: z.string(),
  uiUserName: z.string().optional(),
});
export type GroupUser = z.infer<typeof groupUserSchema>;

export const AFFECTED_USER_TYPES = ['gainAccess', 'lostAccess'] as const;
export type AffectedUserType = (typeof AFFECTED_USER_TYPES)[number];

const groupNameBodySchema = z.object({ groupName: z.string() });

export const groupEndpoints = {
  '/identity-management/v3/user-admin/groups': {
    get: {
      $search: z.object({ actions: z.boolean() }),
      response: z.array(groupSchema),
      status: [200],
    },
  },
  '/identity-management/v3/user-admin/groups/{groupId}': {
    get: {
      $search: z.object({ actions: z.boolean() }),
      response: groupSchema,
      status: [200],
    },
    post: {
      request: groupNameBodySchema,
      response: groupSchema,
      status: [201],
    },
    put: {
      request: groupNameBodySchema,
      response: groupSchema,
      status: [200],
    },
    delete: {
      response: z.null(),
      status: [204],
    },
  },
  '/identity-management/v3/user-admin/groups/move': {
    post: {
      request: z.object({ sourceGroupId: z.number(), destinationGroupId: z.number() }),
      response: z.null(),
      status: [204],
    },
  },
  '/identity-management/v3/user-admin/groups/move/{sourceGroupId}/{destinationGroupId}/affected-users': {
    get: {
      $search: z.object({ userType: z.enum(AFFECTED_USER_TYPES).optional() }),
      response: z.array(groupUserSchema),
      status: [200],
    },
  },
} satisfies RequestDefinitions;

const groupRequestSchema = z.object({
  groupId: requiredId(),
  groupName: requiredString(),
});

const groupIdRequestSchema = z.object({
  groupId: requiredId(),
});

const moveGroupRequestSchema = z.object({
  destinationGroupId: requiredId(),
  sourceGroupId: requiredId(),
});

const listAffectedUsersRequestSchema = moveGroupRequestSchema.extend({
  userType: oneOf(AFFECTED_USER_TYPES).optional(),
});

/**
 * Group plus name. On create `groupId` is the parent the new group goes under,
 * on update it is the group being renamed.
 */
export interface GroupRequest {
  groupId: number;
  groupName: string;
}

export interface GetGroupRequest {
  groupId: number;
  actions?: boolean;
}

export interface MoveGroupRequest {
  sourceGroupId: number;
  destinationGroupId: number;
}

export interface ListAffectedUsersRequest extends MoveGroupRequest {
  userType?: AffectedUserType;
}

export interface Groups {
  createGroup(params: GroupRequest, opts?: Options): SafeWrapAsync<IAMOperationError, Group>;
  getGroup(params: GetGroupRequest, opts?: Options): SafeWrapAsync<IAMOperationError, Group>;
  listGroups(params?: { actions?: boolean }, opts?: Options): SafeWrapAsync<IAMOperationError, Group[]>;
  updateGroupName(params: GroupRequest, opts?: Options): SafeWrapAsync<IAMOperationError, Group>;
  removeGroup(params: { groupId: number }, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
  moveGroup(params: MoveGroupRequest, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
  /** Users who would gain or lose access if the source group moved under the destination. */
  listAffectedUsers(params: ListAffectedUsersRequest, opts?: Options): SafeWrapAsync<IAMOperationError, GroupUser[]>;
}

export class GroupsAPI implements Groups {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  createGroup(params: GroupRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'create group', () =>
      withValidRequest(params, groupRequestSchema, ({ groupId, groupName }) =>
        this.#ctx.client.post('/identity-management/v3/user-admin/groups/{groupId}', { groupId }, { groupName }, opts),
      ),
    );
  }

  getGroup(params: GetGroupRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'get group', () =>
      withValidRequest(params, groupIdRequestSchema, ({ groupId }) =>
        this.#ctx.client.get(
          '/identity-management/v3/user-admin/groups/{groupId}',
          { groupId, $search: { actions: params.actions ?? false } },
          opts,
        ),
      ),
    );
  }

  listGroups(params: { actions?: boolean } = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list groups', () =>
      this.#ctx.client.get(
        '/identity-management/v3/user-admin/groups',
        { $search: { actions: params.actions ?? false } },
        opts,
      ),
    );
  }

  updateGroupName(params: GroupRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'update group name', () =>
      withValidRequest(params, groupRequestSchema, ({ groupId, groupName }) =>
        this.#ctx.client.put('/identity-management/v3/user-admin/groups/{groupId}', { groupId }, { groupName }, opts),
      ),
    );
  }

  removeGroup(params: { groupId: number }, opts?: Options) {
    return runOperation(this.#ctx.logger, 'remove group', () =>
      withValidRequest(params, groupIdRequestSchema, ({ groupId }) =>
        this.#ctx.client.delete('/identity-management/v3/user-admin/groups/{groupId}', { groupId }, opts),
      ),
    );
  }

  moveGroup(params: MoveGroupRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'move group', () =>
      withValidRequest(params, moveGroupRequestSchema, ({ destinationGroupId, sourceGroupId }) =>
        this.#ctx.client.post(
          '/identity-management/v3/user-admin/groups/move',
          null,
          { sourceGroupId, destinationGroupId },
          opts,
        ),
      ),
    );
  }

  listAffectedUsers(params: ListAffectedUsersRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list affected users', () =>
      withValidRequest(params, listAffectedUsersRequestSchema, ({ destinationGroupId, sourceGroupId, userType }) =>
        this.#ctx.client.get(
          '/identity-management/v3/user-admin/groups/move/{sourceGroupId}/{destinationGroupId}/affected-users',
          { sourceGroupId, destinationGroupId, $search: { userType } },
          opts,
        ),
      ),
    );
  }
}
