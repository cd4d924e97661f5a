import { describe, expect, it } from 'vitest';
import { getValidationError, isValidationError, issuePath, ValidationError } from './validationError.js';

describe('ValidationError', () => {
  it('renders every issue into the message', () => {
    const err = new ValidationError('error validating data', [
      { message: 'cannot be blank', path: ['groupName'] },
      { message: 'must be no less than 1', path: ['body', { key: 'cidrBlockId' }] },
    ]);

    expect(err.message).toBe(
      'error validating data; issues: groupName: cannot be blank; body.cidrBlockId: must be no less than 1',
    );
    expect(err.fields).toEqual(['groupName', 'body.cidrBlockId']);
  });

  it('keeps the message as is without issues', () => {
    expect(new ValidationError('error validating on validation start', []).message).toBe(
      'error validating on validation start',
    );
  });

  it('names a pathless issue as the root', () => {
    expect(issuePath({ message: 'cannot be blank' })).toBe('(root)');
  });
});

describe('isValidationError', () => {
  it('finds a nested validation error', () => {
    const validation = new ValidationError('error validating data', [{ message: 'cannot be blank', path: ['name'] }]);
    const err = new Error('error validating request', { cause: validation });

    expect(isValidationError(err)).toBe(true);
    expect(getValidationError(err)).toBe(validation);
  });

  it('returns false for other errors', () => {
    expect(isValidationError(new Error('error validating request'))).toBe(false);
  });
});
