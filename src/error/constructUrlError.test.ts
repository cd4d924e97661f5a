import { describe, expect, it } from 'vitest';
import { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';

const PARTIAL = '/identity-management/v3/user-admin/groups/{groupId}';

describe('ConstructURLError', () => {
  it('keeps the partially built URL', () => {
    const err = new ConstructURLError('error constructing URL, path contains unreplaced {}', PARTIAL);

    expect(err.url).toBe(PARTIAL);
    expect(isConstructURLError(err)).toBe(true);
  });

  it('is found behind a wrapping error', () => {
    const err = new ConstructURLError('error constructing URL, path contains unreplaced {}', PARTIAL);
    const wrapped = new Error('error constructing URL in get', { cause: err });

    expect(getConstructURLError(wrapped)).toBe(err);
  });

  it('returns null when the chain has none', () => {
    expect(getConstructURLError(new Error('outer', { cause: new Error('inner') }))).toBeNull();
    expect(isConstructURLError(new Error('boom'))).toBe(false);
  });
});
