import { describe, expect, test, vi } from 'vitest';
import { z } from 'zod';
import { getOperationError } from '../error/operationError.js';
import { getValidationError } from '../error/validationError.js';
import { NoopLogger } from '../log/logger.js';
import { runOperation, withValidRequest } from './operation.js';

describe('runOperation', () => {
  test('passes data through', async () => {
    const [err, data] = await runOperation(new NoopLogger(), 'get group', () => Promise.resolve<[null, number]>([null, 1]));

    expect(err).toBeNull();
    expect(data).toBe(1);
  });

  test('wraps a failure in an operation error with the cause kept', async () => {
    const cause = new Error('boom');

    const [err] = await runOperation(new NoopLogger(), 'get group', () => Promise.resolve<[Error, null]>([cause, null]));

    expect(err?.message).toBe('get group');
    expect(getOperationError(err)?.operation).toBe('get group');
    expect(err?.cause).toBe(cause);
  });

  test('logs the operation name', async () => {
    const logger = new NoopLogger();
    const debug = vi.spyOn(logger, 'debug');

    await runOperation(logger, 'list roles', () => Promise.resolve<[null, string[]]>([null, []]));

    expect(debug).toHaveBeenCalledWith('list roles');
  });
});

describe('withValidRequest', () => {
  const schema = z.object({ groupId: z.number().min(1) });

  test('calls through with the parsed value', async () => {
    const call = vi.fn((valid: { groupId: number }) => Promise.resolve<[null, number]>([null, valid.groupId]));

    const [err, data] = await withValidRequest({ groupId: 5 }, schema, call);

    expect(err).toBeNull();
    expect(data).toBe(5);
    expect(call).toHaveBeenCalledWith({ groupId: 5 });
  });

  test('stops at the first invalid request', async () => {
    const call = vi.fn(() => Promise.resolve<[null, number]>([null, 1]));

    const [err] = await withValidRequest({ groupId: 0 }, schema, call);

    expect(err?.message).toBe('error validating request');
    expect(getValidationError(err)?.fields).toEqual(['groupId']);
    expect(call).not.toHaveBeenCalled();
  });
});
