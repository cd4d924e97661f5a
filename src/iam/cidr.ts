import { z } from 'zod';
import type { RequestDefinitions } from '../core/types.js';
import type { IAMOperationError } from '../error/operationError.js';
import type { Options } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type OperationContext, runOperation, withValidRequest } from './operation.js';
import { BLANK, cidrBlock, positiveId } from './schema.js';

export const cidrBlockSchema = z.object({
  actions: z.object({ delete: z.boolean(), edit: z.boolean() }).nullish(),
  cidrBlock: z.string(),
  cidrBlockId: z.number(),
  comments: z.string().nullish(),
  createdBy: z.string().optional(),
  createdDate: z.string().optional(),
  enabled: z.boolean(),
  modifiedBy: z.string().optional(),
  modifiedDate: z.string().optional(),
});
export type CIDRBlock = z.infer<typeof cidrBlockSchema>;

/**
 * Body shared by create and update. `comments` keeps absent and `null` apart, so a
 * `null` reaches the API as `null`.
 */
export const cidrBlockBodySchema = z.object({
  cidrBlock: cidrBlock(),
  comments: z.string().nullish(),
  enabled: z.boolean({ required_error: BLANK }),
});
export type CIDRBlockBody = z.input<typeof cidrBlockBodySchema>;

const cidrBlockIdRequestSchema = z.object({
  cidrBlockId: positiveId(),
});

const updateCIDRBlockRequestSchema = z.object({
  body: cidrBlockBodySchema,
  cidrBlockId: positiveId(),
});

const validateCIDRBlockRequestSchema = z.object({
  cidrBlock: cidrBlock(),
});

export const cidrEndpoints = {
  '/identity-management/v3/user-admin/ip-acl/allowlist': {
    get: {
      $search: z.object({ actions: z.boolean() }),
      response: z.array(cidrBlockSchema),
      status: [200],
    },
    post: {
      request: cidrBlockBodySchema,
      response: cidrBlockSchema,
      status: [201],
    },
  },
  '/identity-management/v3/user-admin/ip-acl/allowlist/{cidrBlockId}': {
    get: {
      $search: z.object({ actions: z.boolean() }),
      response: cidrBlockSchema,
      status: [200],
    },
    put: {
      request: cidrBlockBodySchema,
      response: cidrBlockSchema,
      status: [200],
    },
    delete: {
      response: z.null(),
      status: [204],
    },
  },
  '/identity-management/v3/user-admin/ip-acl/allowlist/validate': {
    get: {
      $search: z.object({ cidrblock: z.string() }),
      response: z.null(),
      status: [204],
    },
  },
} satisfies RequestDefinitions;

export interface GetCIDRBlockRequest {
  cidrBlockId: number;
  actions?: boolean;
}

export interface UpdateCIDRBlockRequest {
  cidrBlockId: number;
  body: CIDRBlockBody;
}

/** Entries of the account's IP allowlist. */
export interface CIDRBlocks {
  listCIDRBlocks(params?: { actions?: boolean }, opts?: Options): SafeWrapAsync<IAMOperationError, CIDRBlock[]>;
  createCIDRBlock(params: CIDRBlockBody, opts?: Options): SafeWrapAsync<IAMOperationError, CIDRBlock>;
  getCIDRBlock(params: GetCIDRBlockRequest, opts?: Options): SafeWrapAsync<IAMOperationError, CIDRBlock>;
  updateCIDRBlock(params: UpdateCIDRBlockRequest, opts?: Options): SafeWrapAsync<IAMOperationError, CIDRBlock>;
  deleteCIDRBlock(params: { cidrBlockId: number }, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
  /** Asks the API whether a block would be accepted. Resolves to `null` when it is. */
  validateCIDRBlock(params: { cidrBlock: string }, opts?: Options): SafeWrapAsync<IAMOperationError, null>;
}

export class CIDRBlocksAPI implements CIDRBlocks {
  #ctx: OperationContext;

  constructor(ctx: OperationContext) {
    this.#ctx = ctx;
  }

  listCIDRBlocks(params: { actions?: boolean } = {}, opts?: Options) {
    return runOperation(this.#ctx.logger, 'list CIDR blocks', () =>
      this.#ctx.client.get(
        '/identity-management/v3/user-admin/ip-acl/allowlist',
        { $search: { actions: params.actions ?? false } },
        opts,
      ),
    );
  }

  createCIDRBlock(params: CIDRBlockBody, opts?: Options) {
    return runOperation(this.#ctx.logger, 'create CIDR block', () =>
      withValidRequest(params, cidrBlockBodySchema, (body) =>
        this.#ctx.client.post('/identity-management/v3/user-admin/ip-acl/allowlist', null, body, opts),
      ),
    );
  }

  getCIDRBlock(params: GetCIDRBlockRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'get CIDR block', () =>
      withValidRequest(params, cidrBlockIdRequestSchema, ({ cidrBlockId }) =>
        this.#ctx.client.get(
          '/identity-management/v3/user-admin/ip-acl/allowlist/{cidrBlockId}',
          { cidrBlockId, $search: { actions: params.actions ?? false } },
          opts,
        ),
      ),
    );
  }

  updateCIDRBlock(params: UpdateCIDRBlockRequest, opts?: Options) {
    return runOperation(this.#ctx.logger, 'update CIDR block', () =>
      withValidRequest(params, updateCIDRBlockRequestSchema, ({ body, cidrBlockId }) =>
        this.#ctx.client.put(
          '/identity-management/v3/user-admin/ip-acl/allowlist/{cidrBlockId}',
          { cidrBlockId },
          body,
          opts,
        ),
      ),
    );
  }

  deleteCIDRBlock(params: { cidrBlockId: number }, opts?: Options) {
    return runOperation(this.#ctx.logger, 'delete CIDR block', () =>
      withValidRequest(params, cidrBlockIdRequestSchema, ({ cidrBlockId }) =>
        this.#ctx.client.delete('/identity-management/v3/user-admin/ip-acl/allowlist/{cidrBlockId}', { cidrBlockId }, opts),
      ),
    );
  }

  validateCIDRBlock(params: { cidrBlock: string }, opts?: Options) {
    return runOperation(this.#ctx.logger, 'validate CIDR block', () =>
      withValidRequest(params, validateCIDRBlockRequestSchema, (valid) =>
        this.#ctx.client.get(
          '/identity-management/v3/user-admin/ip-acl/allowlist/validate',
          { $search: { cidrblock: valid.cidrBlock } },
          opts,
        ),
      ),
    );
  }
}
