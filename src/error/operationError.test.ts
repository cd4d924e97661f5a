import { describe, expect, it } from 'vitest';
import { getOperationError, IAMOperationError, isOperationError } from './operationError.js';

describe('IAMOperationError', () => {
  it('uses the operation name as message', () => {
    const cause = new Error('error doing request in post');
    const err = new IAMOperationError('create group', { cause });

    expect(err.message).toBe('create group');
    expect(err.operation).toBe('create group');
    expect(err.cause).toBe(cause);
  });
});

describe('isOperationError', () => {
  const err = new IAMOperationError('lock user');

  it('matches any operation without a name', () => {
    expect(isOperationError(err)).toBe(true);
  });

  it('matches the named operation only', () => {
    expect(isOperationError(err, 'lock user')).toBe(true);
    expect(isOperationError(err, 'unlock user')).toBe(false);
  });

  it('returns false for other errors', () => {
    expect(isOperationError(new Error('lock user'), 'lock user')).toBe(false);
  });
});

describe('getOperationError', () => {
  it('unwraps nested causes', () => {
    const err = new IAMOperationError('list roles');

    expect(getOperationError(new Error('outer', { cause: err }))).toBe(err);
    expect(getOperationError(new Error('outer'))).toBeNull();
  });
});
