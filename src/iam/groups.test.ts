import { afterEach, beforeEach, describe, expect, type Mock, test, vi } from 'vitest';
import { getIAMError } from '../error/iamError.js';
import { isOperationError } from '../error/operationError.js';
import { getValidationError } from '../error/validationError.js';
import { createIAM, type IAMClient } from './client.js';

const BASE_URL = 'https://akab-test.luna.akamaiapis.net/';

const json = (body: unknown, status: number) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const group = {
  groupId: 12345,
  groupName: 'Test Group',
  parentGroupId: 98765,
  createdBy: 'jdoe',
  createdDate: '2023-06-01T12:00:00.000Z',
  subGroups: [{ groupId: 23456, groupName: 'Child', parentGroupId: 12345, subGroups: [] }],
};

describe('groups', () => {
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

  describe('createGroup', () => {
    test('posts the name under the parent group', async () => {
      mockedFetch.mockResolvedValueOnce(json(group, 201));

      const [err, created] = await iam.groups.createGroup({ groupId: 98765, groupName: 'Test Group' });

      expect(err).toBeNull();
      expect(created?.subGroups?.[0].groupName).toBe('Child');
      const [url, init] = mockedFetch.mock.calls[0];
      expect(url).toBe(`${BASE_URL}identity-management/v3/user-admin/groups/98765`);
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe(JSON.stringify({ groupName: 'Test Group' }));
    });

    test('reports every missing field without calling the API', async () => {
      const [err] = await iam.groups.createGroup({ groupId: 0, groupName: '' });

      expect(isOperationError(err, 'create group')).toBe(true);
      expect(getValidationError(err)?.fields).toEqual(['groupId', 'groupName']);
      expect(getValidationError(err)?.message).toBe(
        'error validating data; issues: groupId: cannot be blank; groupName: cannot be blank',
      );
      expect(mockedFetch).not.toHaveBeenCalled();
    });

    test('decodes a problem payload into an IAM error', async () => {
      mockedFetch.mockResolvedValueOnce(
        json({ type: 'internal_error', title: 'Internal Server Error', detail: 'Error making request' }, 500),
      );

      const [err, created] = await iam.groups.createGroup({ groupId: 98765, groupName: 'Test Group' });

      expect(created).toBeNull();
      expect(err?.message).toBe('create group');
      const apiError = getIAMError(err);
      expect(apiError?.statusCode).toBe(500);
      expect(apiError?.title).toBe('Internal Server Error');
      expect(apiError?.detail).toBe('Error making request');
    });
  });

  test('getGroup sends the actions flag', async () => {
    mockedFetch.mockResolvedValueOnce(json(group, 200));

    const [err] = await iam.groups.getGroup({ groupId: 12345, actions: true });

    expect(err).toBeNull();
    expect(mockedFetch.mock.calls[0][0]).toBe(`${BASE_URL}identity-management/v3/user-admin/groups/12345?actions=true`);
  });

  test('getGroup decodes a body sent without a content type', async () => {
    const response = new Response(JSON.stringify({ groupId: 1, groupName: 'a' }), { status: 200 });
    response.headers.delete('Content-Type');
    mockedFetch.mockResolvedValueOnce(response);

    const [err, found] = await iam.groups.getGroup({ groupId: 1 });

    expect(err).toBeNull();
    expect(found?.groupName).toBe('a');
  });

  test('listGroups sends actions=false by default', async () => {
    mockedFetch.mockResolvedValueOnce(json([group], 200));

    const [err, groups] = await iam.groups.listGroups();

    expect(err).toBeNull();
    expect(groups).toHaveLength(1);
    expect(mockedFetch.mock.calls[0][0]).toBe(`${BASE_URL}identity-management/v3/user-admin/groups?actions=false`);
  });

  test('updateGroupName puts the new name', async () => {
    mockedFetch.mockResolvedValueOnce(json({ ...group, groupName: 'Renamed' }, 200));

    const [err, updated] = await iam.groups.updateGroupName({ groupId: 12345, groupName: 'Renamed' });

    expect(err).toBeNull();
    expect(updated?.groupName).toBe('Renamed');
    const [url, init] = mockedFetch.mock.calls[0];
    expect(url).toBe(`${BASE_URL}identity-management/v3/user-admin/groups/12345`);
    expect(init?.method).toBe('PUT');
    expect(init?.body).toBe(JSON.stringify({ groupName: 'Renamed' }));
  });

  describe('removeGroup', () => {
    test('accepts 204 with no body', async () => {
      mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

      const [err, removed] = await iam.groups.removeGroup({ groupId: 12345 });

      expect(err).toBeNull();
      expect(removed).toBeNull();
      expect(mockedFetch.mock.calls[0][1]?.method).toBe('DELETE');
    });

    test('treats an undeclared 200 as a failure', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('', { status: 200 }));

      const [err] = await iam.groups.removeGroup({ groupId: 12345 });

      expect(isOperationError(err, 'remove group')).toBe(true);
      expect(getIAMError(err)?.statusCode).toBe(200);
    });
  });

  test('moveGroup posts both ids', async () => {
    mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

    const [err] = await iam.groups.moveGroup({ sourceGroupId: 1, destinationGroupId: 2 });

    expect(err).toBeNull();
    const [url, init] = mockedFetch.mock.calls[0];
    expect(url).toBe(`${BASE_URL}identity-management/v3/user-admin/groups/move`);
    expect(init?.body).toBe(JSON.stringify({ sourceGroupId: 1, destinationGroupId: 2 }));
  });

  describe('listAffectedUsers', () => {
    test('renders the user type filter', async () => {
      mockedFetch.mockResolvedValueOnce(
        json([{ email: 'user@example.com', firstName: 'Jo', lastName: 'Doe', uiIdentityId: 'A-B-123' }], 200),
      );

      const [err, users] = await iam.groups.listAffectedUsers({
        sourceGroupId: 1,
        destinationGroupId: 2,
        userType: 'gainAccess',
      });

      expect(err).toBeNull();
      expect(users?.[0].uiIdentityId).toBe('A-B-123');
      expect(mockedFetch.mock.calls[0][0]).toBe(
        `${BASE_URL}identity-management/v3/user-admin/groups/move/1/2/affected-users?userType=gainAccess`,
      );
    });

    test('rejects an unknown user type', async () => {
      const [err] = await iam.groups.listAffectedUsers({
        sourceGroupId: 1,
        destinationGroupId: 2,
        // @ts-expect-error unknown user type on purpose
        userType: 'everyone',
      });

      expect(getValidationError(err)?.message).toBe(
        "error validating data; issues: userType: value 'everyone' is invalid. Must be one of: 'gainAccess' or 'lostAccess'",
      );
      expect(mockedFetch).not.toHaveBeenCalled();
    });
  });
});
