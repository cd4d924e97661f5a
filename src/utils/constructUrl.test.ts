import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ConstructURLError } from '../error/constructUrlError.js';
import { ValidationError } from '../error/validationError.js';
import { constructUrl } from './constructUrl.js';

describe('constructUrl', () => {
  it('substitutes and encodes path params and strips the leading slash', async () => {
    const [err, url] = await constructUrl('/identity-management/v3/users/{userName}/group-access', {
      userName: 'jane doe/admin',
    });

    expect(err).toBeNull();
    expect(url).toBe('identity-management/v3/users/jane%20doe%2Fadmin/group-access');
  });

  it('renders false booleans instead of omitting them', async () => {
    const schema = z.object({ actions: z.boolean(), groupAccess: z.boolean() });

    const [, url] = await constructUrl(
      '/identity-management/v3/api-clients/{clientId}',
      { clientId: 'self', $search: { actions: true, groupAccess: false } },
      schema,
    );

    expect(url).toBe('identity-management/v3/api-clients/self?actions=true&groupAccess=false');
  });

  it('leaves out undefined query values and encodes spaces as +', async () => {
    const schema = z.object({ search: z.string().optional(), groupId: z.number().optional() });

    const [, url] = await constructUrl('/accounts', { $search: { search: 'Name A', groupId: undefined } }, schema);

    expect(url).toBe('accounts?search=Name+A');
  });

  it('builds identical URLs for identical params', async () => {
    const schema = z.object({ actions: z.boolean(), grantedRoles: z.boolean(), users: z.boolean() });
    const params = { roleId: 12, $search: { users: false, actions: true, grantedRoles: false } };

    const [, first] = await constructUrl('/roles/{roleId}', params, schema);
    const [, second] = await constructUrl('/roles/{roleId}', params, schema);

    expect(first).toBe('roles/12?actions=true&grantedRoles=false&users=false');
    expect(second).toBe(first);
  });

  it('errors when path params are missing', async () => {
    const [err, url] = await constructUrl('/groups/{groupId}', null);

    expect(url).toBeNull();
    expect(err).toStrictEqual(
      new ConstructURLError('error constructing URL, path contains unreplaced {}', '/groups/{groupId}'),
    );
  });

  it('errors when search params fail the schema', async () => {
    const schema = z.object({ actions: z.boolean() });

    const [err] = await constructUrl('/groups', { $search: { actions: 'yes' } }, schema);

    expect(err?.message).toBe('error extracting search params');
    expect(err?.cause).toBeInstanceOf(ValidationError);
  });
});
