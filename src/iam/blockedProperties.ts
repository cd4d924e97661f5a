import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import { BLANK, requiredId, requiredString } from './schema.js';

const blockedPropertiesPath = '/identity-management/v2/user-admin/ui-identities/{identityId}/groups/{groupId}/blocked-properties';

export const blockedPropertiesEndpoints = {
  [blockedPropertiesPath]: {
    get: {
      response: z.array(z.number()),
      status: [200],
    },
    put: {
      request: z.array(z.number()),
      response: z.array(z.number()),
      status: [200],
    },
  },
} satisfies RequestDefinitions;

const listBlockedPropertiesRequestSchema = z.object({
  groupId: requiredId(),
  identityId: requiredString(),
});

const updateBlockedPropertiesRequestSchema = listBlockedPropertiesRequestSchema.extend({
  properties: z.array(z.number(), { required_error: BLANK }),
});

export interface ListBlockedPropertiesRequest {
  identityId: string;
  groupId: number;
}

export interface UpdateBlockedPropertiesRequest extends ListBlockedPropertiesRequest {
  /** Full list of property IDs to block. It replaces the current list. */
  properties: number[];
}

/** Properties a user is denied within one group. */
export interface BlockedProperties {
  listBlockedProperties(params: ListBlockedPropertiesRequest, opts?: Options): SafeWrapAsync<IAMOperationError, number[]>;
  updateBlockedProperties(
    params: UpdateBlockedPropertiesRequest,
    opts?: Options,
  ): SafeWrapAsync<IAMOperationError, number[]>;
}

export class BlockedPropertiesAPI implements BlockedProperties {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  listBlockedProperties(params: ListBlockedPropertiesRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list blocked properties', () =>
      withValidRequest(params, listBlockedPropertiesRequestSchema, ({ groupId, identityId }) =>
        this.#ctx.client.get(blockedPropertiesPath, { groupId, identityId }, opts),
      ),
    );
  }

  updateBlockedProperties(params: UpdateBlockedPropertiesRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'update blocked properties', () =>
      withValidRequest(params, updateBlockedPropertiesRequestSchema, ({ groupId, identityId, properties }) =>
        this.#ctx.client.put(blockedPropertiesPath, { groupId, identityId }, properties, opts),
      ),
    );
  }
}
