import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import { BLANK, CREDENTIAL_STATUSES, credentialStatusSchema, oneOf, requiredId, SELF } from './schema.js';

export const credentialActionsSchema = z.object({
  activate: z.boolean().optional(),
  deactivate: z.boolean().optional(),
  delete: z.boolean().optional(),
  editDescription: z.boolean().optional(),
  editExpiration: z.boolean().optional(),
});
export type CredentialActions = z.infer<typeof credentialActionsSchema>;

export const credentialSchema = z.object({
  actions: credentialActionsSchema.nullish(),
  clientToken: z.string(),
  createdOn: z.string().optional(),
  credentialId: z.number(),
  description: z.string().nullish(),
  expiresOn: z.string().optional(),
  maxAllowedExpiry: z.string().optional(),
  status: credentialStatusSchema,
});
export type Credential = z.infer<typeof credentialSchema>;

/** Only returned once, on creation: the secret is never readable again. */
export const createdCredentialSchema = z.object({
  clientSecret: z.string(),
  clientToken: z.string(),
  createdOn: z.string().optional(),
  credentialId: z.number(),
  description: z.string().nullish(),
  expiresOn: z.string().optional(),
  status: credentialStatusSchema,
});
export type CreateCredentialResponse = z.infer<typeof createdCredentialSchema>;

export const updateCredentialResponseSchema = z.object({
  description: z.string().nullish(),
  expiresOn: z.string(),
  status: credentialStatusSchema,
});
export type UpdateCredentialResponse = z.infer<typeof updateCredentialResponseSchema>;

const RFC3339 = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})$/i;

const expiresOnSchema = z.union([
  z.string({ required_error: BLANK }).regex(RFC3339, 'must be an RFC 3339 timestamp'),
  z.date().refine((date) => !Number.isNaN(date.getTime()), 'must be a valid date'),
]);

export const updateCredentialBodySchema = z.object({
  description: z.string().optional(),
  expiresOn: z.string(),
  status: credentialStatusSchema,
});
export type UpdateCredentialBody = z.infer<typeof updateCredentialBodySchema>;

const updateCredentialRequestSchema = z.object({
  body: z.object(
    {
      description: z.string().optional(),
      expiresOn: expiresOnSchema,
      status: oneOf(CREDENTIAL_STATUSES),
    },
    { required_error: BLANK },
  ),
  clientId: z.string().optional(),
  credentialId: requiredId(),
});

const credentialIdRequestSchema = z.object({
  clientId: z.string().optional(),
  credentialId: requiredId(),
});

/**
 * The API rejects an `expiresOn` with no sub-second part on this endpoint, so a whole-second
 * timestamp is pushed forward by one nanosecond. Anything more precise is sent as given.
 */
export function padExpiresOn(expiresOn: string | Date): string {
  const value = typeof expiresOn === 'string' ? expiresOn : expiresOn.toISOString();
  const match = RFC3339.exec(value);
  if (!match) {
    return value;
  }

  const [, base, fraction = '', zone] = match;
  if (/[1-9]/.test(fraction)) {
    return value;
  }

  return `${base}.000000001${zone}`;
}

export const credentialEndpoints = {
  '/identity-management/v3/api-clients/{clientId}/credentials': {
    get: {
      $search: z.object({ actions: z.boolean() }),
      response: z.array(credentialSchema),
      status: [200],
    },
    post: {
      response: createdCredentialSchema,
      status: [201],
    },
  },
  '/identity-management/v3/api-clients/{clientId}/credentials/{credentialId}': {
    get: {
      $search: z.object({ actions: z.boolean() }),
      response: credentialSchema,
      status: [200],
    },
    put: {
      request: updateCredentialBodySchema,
      response: updateCredentialResponseSchema,
      status: [200],
    },
    delete: {
      response: z.null(),
      status: [204],
    },
  },
  '/identity-management/v3/api-clients/{clientId}/credentials/{credentialId}/deactivate': {
    post: {
      response: z.null(),
      status: [204],
    },
  },
  '/identity-management/v3/api-clients/{clientId}/credentials/deactivate': {
    post: {
      response: z.null(),
      status: [204],
    },
  },
} satisfies RequestDefinitions;

/** An omitted `clientId` targets the caller's own API client. */
export interface ClientScoped {
  clientId?: string;
}

export interface ListCredentialsRequest extends ClientScoped {
  actions?: boolean;
}

export interface GetCredentialRequest extends ClientScoped {
  credentialId: number;
  actions?: boolean;
}

export interface CredentialRequest extends ClientScoped {
  credentialId: number;
}

export interface UpdateCredentialRequest extends ClientScoped {
  credentialId: number;
  body: {
    description?: string;
    /** RFC 3339 timestamp or a Date. */
    expiresOn: string | Date;
    status: (typeof CREDENTIAL_STATUSES)[number];
  };
}

/** Credential operations of an API client. */
export interface Credentials {
  createCredential(params?: ClientScoped, opts?: Options): SafeWrapAsync<IAMOperationError, CreateCredentialResponse>;
  listCredentials(params?: ListCredentialsRequest, opts?: Options): SafeWrapAsync<IAMOperationError, Credential[]>;
  getCredential(params: GetCredentialRequest, opts?: Options): SafeWrapAsync<IAMOperationError, Credential>;
  updateCredential(
    params: UpdateCredentialRequest,
    opts?: Options,
  ): SafeWrapAsync<IAMOperationError, UpdateCredentialResponse>;
  deleteCredential(params: CredentialRequest, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
  deactivateCredential(params: CredentialRequest, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
  deactivateCredentials(params?: ClientScoped, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
}

export class CredentialsAPI implements Credentials {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  createCredential(params: ClientScoped = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'create credential', () =>
      this.#ctx.client.post(
        '/identity-management/v3/api-clients/{clientId}/credentials',
        { clientId: params.clientId || SELF },
        null,
        opts,
      ),
    );
  }

  listCredentials(params: ListCredentialsRequest = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list credentials', () =>
      this.#ctx.client.get(
        '/identity-management/v3/api-clients/{clientId}/credentials',
        { clientId: params.clientId || SELF, $search: { actions: params.actions ?? false } },
        opts,
      ),
    );
  }

  getCredential(params: GetCredentialRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'get credential', () =>
      withValidRequest(params, credentialIdRequestSchema, (valid) =>
        this.#ctx.client.get(
          '/identity-management/v3/api-clients/{clientId}/credentials/{credentialId}',
          {
            clientId: valid.clientId || SELF,
            credentialId: valid.credentialId,
            $search: { actions: params.actions ?? false },
          },
          opts,
        ),
      ),
    );
  }

  /**
   * Updates the description, expiry and status of a credential.
   * A whole-second `expiresOn` is sent with one extra nanosecond, see {@link padExpiresOn}.
   */
  updateCredential(params: UpdateCredentialRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'update credential', () =>
      withValidRequest(params, updateCredentialRequestSchema, ({ body, clientId, credentialId }) =>
        this.#ctx.client.put(
          '/identity-management/v3/api-clients/{clientId}/credentials/{credentialId}',
          { clientId: clientId || SELF, credentialId },
          {
            description: body.description || undefined,
            expiresOn: padExpiresOn(body.expiresOn),
            status: body.status,
          },
          opts,
        ),
      ),
    );
  }

  deleteCredential(params: CredentialRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'delete credential', () =>
      withValidRequest(params, credentialIdRequestSchema, (valid) =>
        this.#ctx.client.delete(
          '/identity-management/v3/api-clients/{clientId}/credentials/{credentialId}',
          { clientId: valid.clientId || SELF, credentialId: valid.credentialId },
          opts,
        ),
      ),
    );
  }

  deactivateCredential(params: CredentialRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'deactivate credential', () =>
      withValidRequest(params, credentialIdRequestSchema, (valid) =>
        this.#ctx.client.post(
          '/identity-management/v3/api-clients/{clientId}/credentials/{credentialId}/deactivate',
          { clientId: valid.clientId || SELF, credentialId: valid.credentialId },
          null,
          opts,
        ),
      ),
    );
  }

  deactivateCredentials(params: ClientScoped = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'deactivate credentials', () =>
      this.#ctx.client.post(
        '/identity-management/v3/api-clients/{clientId}/credentials/deactivate',
        { clientId: params.clientId || SELF },
        null,
        opts,
      ),
    );
  }
}
