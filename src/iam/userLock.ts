import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import { requiredString } from './schema.js';

/** Older deployments answer 200 with a body, newer ones 204. Either way nothing is returned. */
const lockResponse = z.unknown().transform((): null => null);

export const userLockEndpoints = {
  '/identity-management/v3/user-admin/ui-identities/{identityId}/lock': {
    post: {
      response: lockResponse,
      status: [200, 204],
    },
  },
  '/identity-management/v3/user-admin/ui-identities/{identityId}/unlock': {
    post: {
      response: lockResponse,
      status: [200, 204],
    },
  },
} satisfies RequestDefinitions;

const identityRequestSchema = z.object({
  identityId: requiredString(),
});

export interface IdentityRequest {
  identityId: string;
}

export interface UserLock {
  lockUser(params: IdentityRequest, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
  unlockUser(params: IdentityRequest, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
}

export class UserLockAPI implements UserLock {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  lockUser(params: IdentityRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'lock user', () =>
      withValidRequest(params, identityRequestSchema, ({ identityId }) =>
        this.#ctx.client.post('/identity-management/v3/user-admin/ui-identities/{identityId}/lock', { identityId }, null, opts),
      ),
    );
  }

  unlockUser(params: IdentityRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'unlock user', () =>
      withValidRequest(params, identityRequestSchema, ({ identityId }) =>
        this.#ctx.client.post(
          '/identity-management/v3/user-admin/ui-identities/{identityId}/unlock',
          { identityId },
          null,
          opts,
        ),
      ),
    );
  }
}
