import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import { requiredString } from './schema.js';
import type { IdentityRequest } from './userLock.js';

/** Present when the API answers 200. With `sendEmail` it answers 204 and mails the password instead. */
export const resetUserPasswordResponseSchema = z.object({ newPassword: z.string() }).nullable();
export type ResetUserPasswordResponse = z.infer<typeof resetUserPasswordResponseSchema>;

export const userPasswordEndpoints = {
  '/identity-management/v3/user-admin/ui-identities/{identityId}/reset-password': {
    post: {
      $search: z.object({ sendEmail: z.boolean() }),
      response: resetUserPasswordResponseSchema,
      status: [200, 204],
    },
  },
  '/identity-management/v3/user-admin/ui-identities/{identityId}/set-password': {
    post: {
      request: z.object({ newPassword: z.string() }),
      response: z.null(),
      status: [204],
    },
  },
} satisfies RequestDefinitions;

const resetUserPasswordRequestSchema = z.object({
  identityId: requiredString(),
  sendEmail: z.boolean().optional(),
});

const setUserPasswordRequestSchema = z.object({
  identityId: requiredString(),
  newPassword: requiredString(),
});

export interface ResetUserPasswordRequest extends IdentityRequest {
  sendEmail?: boolean;
}

export interface SetUserPasswordRequest extends IdentityRequest {
  newPassword: string;
}

export interface UserPassword {
  resetUserPassword(
    params: ResetUserPasswordRequest,
    opts?: Options,
  ): SafeWrapAsync<IAMOperationError, ResetUserPasswordResponse>;
  setUserPassword(params: SetUserPasswordRequest, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
}

export class UserPasswordAPI implements UserPassword {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  resetUserPassword(params: ResetUserPasswordRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'reset user password', () =>
      withValidRequest(params, resetUserPasswordRequestSchema, ({ identityId, sendEmail }) =>
        this.#ctx.client.post(
          '/identity-management/v3/user-admin/ui-identities/{identityId}/reset-password',
          { identityId, $search: { sendEmail: sendEmail ?? false } },
          null,
          opts,
        ),
      ),
    );
  }

  setUserPassword(params: SetUserPasswordRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'set user password', () =>
      withValidRequest(params, setUserPasswordRequestSchema, ({ identityId, newPassword }) =>
        this.#ctx.client.post(
          '/identity-management/v3/user-admin/ui-identities/{identityId}/set-password',
          { identityId },
          { newPassword },
          opts,
        ),
      ),
    );
  }
}
