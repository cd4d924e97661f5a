import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import { BLANK, email, oneOf, requiredId, requiredString } from './schema.js';

export const userBasicInfoSchema = z.object({
  firstName: z.string(),
  lastName: z.string(),
  uiUserName: z.string().optional(),
  email: z.string(),
  phone: z.string().optional(),
  timeZone: z.string().optional(),
  jobTitle: z.string().optional(),
  tfaEnabled: z.boolean().optional(),
  secondaryEmail: z.string().optional(),
  mobilePhone: z.string().optional(),
  address: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  zipCode: z.string().optional(),
  country: z.string().optional(),
  contactType: z.string().optional(),
  preferredLanguage: z.string().optional(),
  sessionTimeOut: z.number().nullish(),
});
export type UserBasicInfo = z.infer<typeof userBasicInfoSchema>;

/** A role held in a group, possibly different in its subgroups. */
export interface AuthGrant {
  groupId: number;
  groupName?: string;
  isBlocked?: boolean;
  roleDescription?: string;
  roleId?: number | null;
  roleName?: string;
  subGroups?: AuthGrant[] | null;
}

export const authGrantSchema: z.ZodType<AuthGrant> = z.lazy(() =>
  z.object({
    groupId: z.number(),
    groupName: z.string().optional(),
    isBlocked: z.boolean().optional(),
    roleDescription: z.string().optional(),
    roleId: z.number().nullish(),
    roleName: z.string().optional(),
    subGroups: z.array(authGrantSchema).nullish(),
  }),
);

export interface AuthGrantRequest {
  groupId: number;
  isBlocked?: boolean;
  roleId?: number;
  subGroups?: AuthGrantRequest[];
}

const authGrantRequestSchema: z.ZodType<AuthGrantRequest> = z.lazy(() =>
  z.object({
    groupId: requiredId(),
    isBlocked: z.boolean().optional(),
    roleId: z.number().optional(),
    subGroups: z.array(authGrantRequestSchema).optional(),
  }),
);

export const userNotificationsSchema = z.object({
  enableEmailNotifications: z.boolean(),
  options: z.object({
    newUserNotification: z.boolean(),
    passwordExpiry: z.boolean(),
    proactive: z.array(z.string()).nullable(),
    upgrade: z.array(z.string()).nullable(),
  }),
});
export type UserNotifications = z.infer<typeof userNotificationsSchema>;

export const userSchema = userBasicInfoSchema.extend({
  authGrants: z.array(authGrantSchema).nullish(),
  emailUpdatePending: z.boolean().optional(),
  isLocked: z.boolean(),
  lastLoginDate: z.string().optional(),
  notifications: userNotificationsSchema.optional(),
  passwordExpiryDate: z.string().optional(),
  tfaConfigured: z.boolean().optional(),
  uiIdentityId: z.string(),
});
export type User = z.infer<typeof userSchema>;

export const userActionsSchema = z.object({
  apiClient: z.boolean(),
  canEditTFA: z.boolean().optional(),
  delete: z.boolean(),
  edit: z.boolean(),
  editProfile: z.boolean().optional(),
  isCloneable: z.boolean(),
  resetPassword: z.boolean(),
  thirdPartyAccess: z.boolean(),
});

export const userListItemSchema = z.object({
  accountId: z.string().optional(),
  actions: userActionsSchema.nullish(),
  authGrants: z.array(authGrantSchema).nullish(),
  email: z.string(),
  firstName: z.string(),
  isLocked: z.boolean(),
  lastLoginDate: z.string().optional(),
  lastName: z.string(),
  tfaConfigured: z.boolean().optional(),
  tfaEnabled: z.boolean().optional(),
  uiIdentityId: z.string(),
  uiUserName: z.string().optional(),
});
export type UserListItem = z.infer<typeof userListItemSchema>;

export const TFA_ACTIONS = ['enable', 'disable', 'reset'] as const;
export type TFAAction = (typeof TFA_ACTIONS)[number];

const createUserBodySchema = userBasicInfoSchema.extend({
  authGrants: z.array(authGrantRequestSchema),
  notifications: userNotificationsSchema,
});

export const userEndpoints = {
  '/identity-management/v2/user-admin/ui-identities': {
    get: {
      $search: z.object({ actions: z.boolean(), authGrants: z.boolean(), groupId: z.number().optional() }),
      response: z.array(userListItemSchema),
      status: [200],
    },
    post: {
      $search: z.object({ sendEmail: z.boolean() }),
      request: createUserBodySchema,
      response: userSchema,
      status: [201],
    },
  },
  '/identity-management/v2/user-admin/ui-identities/{identityId}': {
    get: {
      $search: z.object({ actions: z.boolean(), authGrants: z.boolean(), notifications: z.boolean() }),
      response: userSchema,
      status: [200],
    },
    delete: {
      response: z.unknown().transform((): null => null),
      status: [200, 204],
    },
  },
  '/identity-management/v2/user-admin/ui-identities/{identityId}/auth-grants': {
    put: {
      request: z.array(authGrantRequestSchema),
      response: z.array(authGrantSchema),
      status: [200],
    },
  },
  '/identity-management/v2/user-admin/ui-identities/{identityId}/basic-info': {
    put: {
      request: userBasicInfoSchema,
      response: userBasicInfoSchema,
      status: [200],
    },
  },
  '/identity-management/v2/user-admin/ui-identities/{identityId}/notifications': {
    put: {
      request: userNotificationsSchema,
      response: userNotificationsSchema,
      status: [200],
    },
  },
  '/identity-management/v2/user-admin/ui-identities/{identityId}/tfa': {
    put: {
      $search: z.object({ action: z.enum(TFA_ACTIONS) }),
      response: z.null(),
      status: [204],
    },
  },
} satisfies RequestDefinitions;

const basicInfoInputShape = {
  ...userBasicInfoSchema.shape,
  country: requiredString(),
  email: email(),
  firstName: requiredString(),
  lastName: requiredString(),
};

const createUserRequestSchema = z.object({
  authGrants: z.array(authGrantRequestSchema, { required_error: BLANK }).min(1, BLANK),
  basicInfo: z.object(basicInfoInputShape, { required_error: BLANK }),
  notifications: userNotificationsSchema,
  sendEmail: z.boolean().optional(),
});

const identityRequestSchema = z.object({
  identityId: requiredString(),
});

const updateUserInfoRequestSchema = z.object({
  basicInfo: z.object(
    {
      ...basicInfoInputShape,
      preferredLanguage: requiredString(),
      sessionTimeOut: z.number({ required_error: BLANK }).refine((value) => value !== 0, BLANK),
      timeZone: requiredString(),
    },
    { required_error: BLANK },
  ),
  identityId: requiredString(),
});

const updateUserNotificationsRequestSchema = z.object({
  identityId: requiredString(),
  notifications: userNotificationsSchema,
});

const updateUserAuthGrantsRequestSchema = z.object({
  authGrants: z.array(authGrantRequestSchema, { required_error: BLANK }).min(1, BLANK),
  identityId: requiredString(),
});

const updateTFARequestSchema = z.object({
  action: oneOf(TFA_ACTIONS),
  identityId: requiredString(),
});

export interface CreateUserRequest {
  basicInfo: UserBasicInfo;
  authGrants: AuthGrantRequest[];
  notifications: UserNotifications;
  /** Mail the new user a welcome message with a link to set a password. */
  sendEmail?: boolean;
}

export interface GetUserRequest {
  identityId: string;
  actions?: boolean;
  authGrants?: boolean;
  notifications?: boolean;
}

export interface ListUsersRequest {
  /** Only users with access to this group. */
  groupId?: number;
  actions?: boolean;
  authGrants?: boolean;
}

export interface UpdateUserInfoRequest {
  identityId: string;
  basicInfo: UserBasicInfo;
}

export interface UpdateUserNotificationsRequest {
  identityId: string;
  notifications: UserNotifications;
}

export interface UpdateUserAuthGrantsRequest {
  identityId: string;
  authGrants: AuthGrantRequest[];
}

export interface UpdateTFARequest {
  identityId: string;
  action: TFAAction;
}

export interface Users {
  createUser(params: CreateUserRequest, opts?: Options): SafeWrapAsync<IAMOperationError, User>;
  getUser(params: GetUserRequest, opts?: Options): SafeWrapAsync<IAMOperationError, User>;
  listUsers(params?: ListUsersRequest, opts?: Options): SafeWrapAsync<IAMOperationError, UserListItem[]>;
  removeUser(params: { identityId: string }, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
  updateUserAuthGrants(
    params: UpdateUserAuthGrantsRequest,
    opts?: Options,
  ): SafeWrapAsync<IAMOperationError, AuthGrant[]>;
  updateUserInfo(params: UpdateUserInfoRequest, opts?: Options): SafeWrapAsync<IAMOperationError, UserBasicInfo>;
  updateUserNotifications(
    params: UpdateUserNotificationsRequest,
    opts?: Options,
  ): SafeWrapAsync<IAMOperationError, UserNotifications>;
  updateTFA(params: UpdateTFARequest, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
}

export class UsersAPI implements Users {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  createUser(params: CreateUserRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'create user', () =>
      withValidRequest(params, createUserRequestSchema, ({ authGrants, basicInfo, notifications, sendEmail }) =>
        this.#ctx.client.post(
          '/identity-management/v2/user-admin/ui-identities',
          { $search: { sendEmail: sendEmail ?? false } },
          { ...basicInfo, authGrants, notifications },
          opts,
        ),
      ),
    );
  }

  getUser(params: GetUserRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'get user', () =>
      withValidRequest(params, identityRequestSchema, ({ identityId }) =>
        this.#ctx.client.get(
          '/identity-management/v2/user-admin/ui-identities/{identityId}',
          {
            identityId,
            $search: {
              actions: params.actions ?? false,
              authGrants: params.authGrants ?? false,
              notifications: params.notifications ?? false,
            },
          },
          opts,
        ),
      ),
    );
  }

  listUsers(params: ListUsersRequest = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list users', () =>
      this.#ctx.client.get(
        '/identity-management/v2/user-admin/ui-identities',
        {
          $search: {
            actions: params.actions ?? false,
            authGrants: params.authGrants ?? false,
            groupId: params.groupId || undefined,
          },
        },
        opts,
      ),
    );
  }

  removeUser(params: { identityId: string }, opts?: Options) {
    return runOperation(this.#ctx.logger, 'remove user', () =>
      withValidRequest(params, identityRequestSchema, ({ identityId }) =>
        this.#ctx.client.delete('/identity-management/v2/user-admin/ui-identities/{identityId}', { identityId }, opts),
      ),
    );
  }

  updateUserAuthGrants(params: UpdateUserAuthGrantsRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'update user auth grants', () =>
      withValidRequest(params, updateUserAuthGrantsRequestSchema, ({ authGrants, identityId }) =>
        this.#ctx.client.put(
          '/identity-management/v2/user-admin/ui-identities/{identityId}/auth-grants',
          { identityId },
          authGrants,
          opts,
        ),
      ),
    );
  }

  updateUserInfo(params: UpdateUserInfoRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'update user info', () =>
      withValidRequest(params, updateUserInfoRequestSchema, ({ basicInfo, identityId }) =>
        this.#ctx.client.put(
          '/identity-management/v2/user-admin/ui-identities/{identityId}/basic-info',
          { identityId },
          basicInfo,
          opts,
        ),
      ),
    );
  }

  updateUserNotifications(params: UpdateUserNotificationsRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'update user notifications', () =>
      withValidRequest(params, updateUserNotificationsRequestSchema, ({ identityId, notifications }) =>
        this.#ctx.client.put(
          '/identity-management/v2/user-admin/ui-identities/{identityId}/notifications',
          { identityId },
          notifications,
          opts,
        ),
      ),
    );
  }

  updateTFA(params: UpdateTFARequest, opts?: Options) {
    return runOperation(this.#ctx.logger, "update user's two-factor authentication", () =>
      withValidRequest(params, updateTFARequestSchema, ({ action, identityId }) =>
        this.#ctx.client.put(
          '/identity-management/v2/user-admin/ui-identities/{identityId}/tfa',
          { identityId, $search: { action } },
          null,
          opts,
        ),
      ),
    );
  }
}
