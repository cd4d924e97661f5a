import { afterEach, beforeEach, describe, expect, type Mock, test, vi } from 'vitest';
import { isOperationError } from '../error/operationError.js';
import { getValidationError } from '../error/validationError.js';
import { createIAM, type IAMClient } from './client.js';

const ROLES_URL = 'https://akab-test.luna.akamaiapis.net/identity-management/v2/user-admin/roles';

const role = {
  roleId: 123456,
  roleName: 'Deployers',
  roleDescription: 'ship things',
  type: 'custom',
  grantedRoles: [{ grantedRoleId: 992, grantedRoleName: 'Publisher' }],
};

describe('roles', () => {
  let mockedFetch: Mock<typeof fetch>;
  let iam: IAMClient;

  beforeEach(() => {
    mockedFetch = vi.fn<typeof fetch>();
    global.fetch = mockedFetch;
    iam = createIAM({ baseUrl: 'akab-test.luna.akamaiapis.net' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createRole', () => {
    test('maps granted role ids into the body', async () => {
      mockedFetch.mockResolvedValueOnce(Response.json(role, { status: 201 }));

      const [err, created] = await iam.roles.createRole({
        name: 'Deployers',
        description: 'ship things',
        grantedRoles: [{ id: 992 }],
      });

      expect(err).toBeNull();
      expect(created?.roleId).toBe(123456);
      const [url, init] = mockedFetch.mock.calls[0];
      expect(url).toBe(ROLES_URL);
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe('{"roleName":"Deployers","roleDescription":"ship things","grantedRoles":[{"grantedRoleId":992}]}');
    });

    test('leaves out an empty description', async () => {
      mockedFetch.mockResolvedValueOnce(Response.json(role, { status: 201 }));

      const [err] = await iam.roles.createRole({ name: 'Deployers', description: '', grantedRoles: [{ id: 992 }] });

      expect(err).toBeNull();
      expect(mockedFetch.mock.calls[0][1]?.body).toBe('{"roleName":"Deployers","grantedRoles":[{"grantedRoleId":992}]}');
    });

    test('requires a name and at least one granted role', async () => {
      const [err] = await iam.roles.createRole({ name: '', grantedRoles: [] });

      expect(isOperationError(err, 'create role')).toBe(true);
      expect(getValidationError(err)?.fields).toEqual(['grantedRoles', 'name']);
      expect(mockedFetch).not.toHaveBeenCalled();
    });
  });

  test('getRole sends every include flag', async () => {
    mockedFetch.mockResolvedValueOnce(Response.json(role));

    const [err] = await iam.roles.getRole({ roleId: 123456, users: true });

    expect(err).toBeNull();
    expect(mockedFetch.mock.calls[0][0]).toBe(`${ROLES_URL}/123456?actions=false&grantedRoles=false&users=true`);
  });

  test('updateRole puts to the role', async () => {
    mockedFetch.mockResolvedValueOnce(Response.json(role));

    const [err] = await iam.roles.updateRole({ roleId: 123456, name: 'Deployers', grantedRoles: [{ id: 992 }] });

    expect(err).toBeNull();
    const [url, init] = mockedFetch.mock.calls[0];
    expect(url).toBe(`${ROLES_URL}/123456`);
    expect(init?.method).toBe('PUT');
  });

  test('deleteRole accepts 204', async () => {
    mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

    const [err, result] = await iam.roles.deleteRole({ roleId: 123456 });

    expect(err).toBeNull();
    expect(result).toBeNull();
  });

  test('listRoles renders the filters in a fixed order', async () => {
    mockedFetch.mockResolvedValueOnce(Response.json([role]));

    const [err, roles] = await iam.roles.listRoles({ groupId: 12345, ignoreContext: true });

    expect(err).toBeNull();
    expect(roles).toHaveLength(1);
    expect(mockedFetch.mock.calls[0][0]).toBe(
      `${ROLES_URL}?actions=false&groupId=12345&ignoreContext=true&users=false`,
    );
  });

  test('listRoles sends the same URL for the same filters', async () => {
    mockedFetch.mockResolvedValueOnce(Response.json([role]));
    mockedFetch.mockResolvedValueOnce(Response.json([role]));

    await iam.roles.listRoles({ actions: true, groupId: 5 });
    await iam.roles.listRoles({ actions: true, groupId: 5 });

    expect(mockedFetch).toHaveBeenCalledTimes(2);
    expect(mockedFetch.mock.calls[1][0]).toBe(mockedFetch.mock.calls[0][0]);
    expect(mockedFetch.mock.calls[0][0]).toBe(`${ROLES_URL}?actions=true&groupId=5&ignoreContext=false&users=false`);
  });

  test('listGrantableRoles reads the grantable set', async () => {
    mockedFetch.mockResolvedValueOnce(Response.json([{ grantedRoleId: 992, grantedRoleName: 'Publisher' }]));

    const [err, grantable] = await iam.roles.listGrantableRoles();

    expect(err).toBeNull();
    expect(grantable?.[0].grantedRoleId).toBe(992);
    expect(mockedFetch.mock.calls[0][0]).toBe(`${ROLES_URL}/grantable-roles`);
  });
});
