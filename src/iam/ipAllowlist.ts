import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation } from './operation.js';

export const ipAllowlistStatusSchema = z.object({
  enabled: z.boolean(),
});
export type IPAllowlistStatus = z.infer<typeof ipAllowlistStatusSchema>;

export const ipAllowlistEndpoints = {
  '/identity-management/v3/user-admin/ip-acl/allowlist/disable': {
    post: {
      response: z.null(),
      status: [204],
    },
  },
  '/identity-management/v3/user-admin/ip-acl/allowlist/enable': {
    post: {
      response: z.null(),
      status: [204],
    },
  },
  '/identity-management/v3/user-admin/ip-acl/allowlist/status': {
    get: {
      response: ipAllowlistStatusSchema,
      status: [200],
    },
  },
} satisfies RequestDefinitions;

/** Switches the account-wide IP allowlist on and off. */
export interface IPAllowlist {
  disableIPAllowlist(opts?: Options): SafeWrapAsync<IAMOperationError, null>;
  enableIPAllowlist(opts?: Options): SafeWrapAsync<IAMOperationError, null>;
  getIPAllowlistStatus(opts?: Options): SafeWrapAsync<IAMOperationError, IPAllowlistStatus>;
}

export class IPAllowlistAPI implements IPAllowlist {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  disableIPAllowlist(opts?: Options) {
    return runOperation(this.#ctx.logger, 'disable ip allowlist', () =>
      this.#ctx.client.post('/identity-management/v3/user-admin/ip-acl/allowlist/disable', null, null, opts),
    );
  }

  enableIPAllowlist(opts?: Options) {
    return runOperation(this.#ctx.logger, 'enable ip allowlist', () =>
      this.#ctx.client.post('/identity-management/v3/user-admin/ip-acl/allowlist/enable', null, null, opts),
    );
  }

  getIPAllowlistStatus(opts?: Options) {
    return runOperation(this.#ctx.logger, 'get ip allowlist status', () =>
      this.#ctx.client.get('/identity-management/v3/user-admin/ip-acl/allowlist/status', null, opts),
    );
  }
}
