import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import { requiredString, SELF } from './schema.js';

export const passwordPolicySchema = z.object({
  caseDif: z.number(),
  maxRepeating: z.number(),
  minDigits: z.number(),
  minLength: z.number(),
  minLetters: z.number(),
  minNonAlpha: z.number(),
  minReuse: z.number(),
  pwclass: z.string(),
  rotateFrequency: z.number(),
});
export type PasswordPolicy = z.infer<typeof passwordPolicySchema>;

export const timezoneSchema = z.object({
  description: z.string(),
  offset: z.string(),
  posix: z.string(),
  timezone: z.string(),
});
export type Timezone = z.infer<typeof timezoneSchema>;

export const timeoutPolicySchema = z.object({
  name: z.string(),
  value: z.number(),
});
export type TimeoutPolicy = z.infer<typeof timeoutPolicySchema>;

export const accountSwitchKeySchema = z.object({
  accountName: z.string(),
  accountSwitchKey: z.string(),
});
export type AccountSwitchKey = z.infer<typeof accountSwitchKeySchema>;

const names = z.array(z.string());

export const supportEndpoints = {
  '/identity-management/v3/user-admin/common/password-policy': {
    get: { response: passwordPolicySchema, status: [200] },
  },
  '/identity-management/v3/user-admin/common/countries': {
    get: { response: names, status: [200] },
  },
  '/identity-management/v3/user-admin/common/countries/{country}/states': {
    get: { response: names, status: [200] },
  },
  '/identity-management/v3/user-admin/common/timezones': {
    get: { response: z.array(timezoneSchema), status: [200] },
  },
  '/identity-management/v3/user-admin/common/contact-types': {
    get: { response: names, status: [200] },
  },
  '/identity-management/v3/user-admin/common/supported-languages': {
    get: { response: names, status: [200] },
  },
  '/identity-management/v3/user-admin/common/notification-products': {
    get: { response: names, status: [200] },
  },
  '/identity-management/v3/user-admin/common/timeout-policies': {
    get: { response: z.array(timeoutPolicySchema), status: [200] },
  },
  '/identity-management/v3/api-clients/{clientId}/account-switch-keys': {
    get: {
      $search: z.object({ search: z.string().optional() }),
      response: z.array(accountSwitchKeySchema),
      status: [200],
    },
  },
} satisfies RequestDefinitions;

const listStatesRequestSchema = z.object({
  country: requiredString(),
});

export interface ListAccountSwitchKeysRequest {
  /** Defaults to the client making the call. */
  clientId?: string;
  /** Matches account names or switch keys. */
  search?: string;
}

/** Reference data used when filling in user profiles, plus account switch keys. */
export interface Support {
  getPasswordPolicy(opts?: Options): SafeWrapAsync<IAMOperationError, PasswordPolicy>;
  listCountries(opts?: Options): SafeWrapAsync<IAMOperationError, string[]>;
  listStates(params: { country: string }, opts?: Options): SafeWrapAsync<IAMOperationError, string[]>;
  listTimeZones(opts?: Options): SafeWrapAsync<IAMOperationError, Timezone[]>;
  listContactTypes(opts?: Options): SafeWrapAsync<IAMOperationError, string[]>;
  supportedLanguages(opts?: Options): SafeWrapAsync<IAMOperationError, string[]>;
  listProducts(opts?: Options): SafeWrapAsync<IAMOperationError, string[]>;
  listTimeoutPolicies(opts?: Options): SafeWrapAsync<IAMOperationError, TimeoutPolicy[]>;
  listAccountSwitchKeys(
    params?: ListAccountSwitchKeysRequest,
    opts?: Options,
  ): SafeWrapAsync<IAMOperationError, AccountSwitchKey[]>;
}

export class SupportAPI implements Support {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  getPasswordPolicy(opts?: Options) {
    return runOperation(this.#ctx.logger, 'get password policy', () =>
      this.#ctx.client.get('/identity-management/v3/user-admin/common/password-policy', null, opts),
    );
  }

  listCountries(opts?: Options) {
    return runOperation(this.#ctx.logger, 'list countries', () =>
      this.#ctx.client.get('/identity-management/v3/user-admin/common/countries', null, opts),
    );
  }

  listStates(params: { country: string }, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list states', () =>
      withValidRequest(params, listStatesRequestSchema, ({ country }) =>
        this.#ctx.client.get('/identity-management/v3/user-admin/common/countries/{country}/states', { country }, opts),
      ),
    );
  }

  listTimeZones(opts?: Options) {
    return runOperation(this.#ctx.logger, 'list time zones', () =>
      this.#ctx.client.get('/identity-management/v3/user-admin/common/timezones', null, opts),
    );
  }

  listContactTypes(opts?: Options) {
    return runOperation(this.#ctx.logger, 'list contact types', () =>
      this.#ctx.client.get('/identity-management/v3/user-admin/common/contact-types', null, opts),
    );
  }

  supportedLanguages(opts?: Options) {
    return runOperation(this.#ctx.logger, 'list supported languages', () =>
      this.#ctx.client.get('/identity-management/v3/user-admin/common/supported-languages', null, opts),
    );
  }

  listProducts(opts?: Options) {
    return runOperation(this.#ctx.logger, 'list products', () =>
      this.#ctx.client.get('/identity-management/v3/user-admin/common/notification-products', null, opts),
    );
  }

  listTimeoutPolicies(opts?: Options) {
    return runOperation(this.#ctx.logger, 'list timeout policies', () =>
      this.#ctx.client.get('/identity-management/v3/user-admin/common/timeout-policies', null, opts),
    );
  }

  listAccountSwitchKeys(params: ListAccountSwitchKeysRequest = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list account switch keys', () =>
      this.#ctx.client.get(
        '/identity-management/v3/api-clients/{clientId}/account-switch-keys',
        { clientId: params.clientId || SELF, $search: { search: params.search || undefined } },
        opts,
      ),
    );
  }
}
