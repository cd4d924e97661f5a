import { afterEach, beforeEach, describe, expect, type Mock, test, vi } from 'vitest';
import { getIAMError } from '../error/iamError.js';
import { isOperationError } from '../error/operationError.js';
import { getValidationError } from '../error/validationError.js';
import { createIAM, type IAMClient } from './client.js';

const PROPERTIES_URL = 'https://akab-test.luna.akamaiapis.net/identity-management/v3/user-admin/properties';

const properties = [
  { groupId: 12345, groupName: 'Test Group', propertyId: 1, propertyName: 'www.example.com' },
  { groupId: 12345, groupName: 'Test Group', propertyId: 2, propertyName: 'api.example.com' },
];

const details = {
  groupId: 12345,
  groupName: 'Test Group',
  propertyId: 2,
  propertyName: 'api.example.com',
  createdBy: 'jdoe',
};

describe('properties', () => {
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

  test('listProperties filters by group', async () => {
    mockedFetch.mockResolvedValueOnce(Response.json(properties));

    const [err, found] = await iam.properties.listProperties({ groupId: 12345 });

    expect(err).toBeNull();
    expect(found).toHaveLength(2);
    expect(mockedFetch.mock.calls[0][0]).toBe(`${PROPERTIES_URL}?actions=false&groupId=12345`);
  });

  test('getProperty passes the group as a query parameter', async () => {
    mockedFetch.mockResolvedValueOnce(Response.json(details));

    const [err, property] = await iam.properties.getProperty({ propertyId: 2, groupId: 12345 });

    expect(err).toBeNull();
    expect(property?.createdBy).toBe('jdoe');
    expect(mockedFetch.mock.calls[0][0]).toBe(`${PROPERTIES_URL}/2?groupId=12345`);
  });

  test('listUsersForProperty renders the user type', async () => {
    mockedFetch.mockResolvedValueOnce(
      Response.json([{ firstName: 'Jo', lastName: 'Doe', isBlocked: true, uiIdentityId: 'A-B-123' }]),
    );

    const [err, users] = await iam.properties.listUsersForProperty({ propertyId: 2, userType: 'blocked' });

    expect(err).toBeNull();
    expect(users?.[0].isBlocked).toBe(true);
    expect(mockedFetch.mock.calls[0][0]).toBe(`${PROPERTIES_URL}/2/users?userType=blocked`);
  });

  describe('moveProperty', () => {
    test('puts both groups', async () => {
      mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

      const [err] = await iam.properties.moveProperty({
        propertyId: 2,
        body: { sourceGroupId: 12345, destinationGroupId: 54321 },
      });

      expect(err).toBeNull();
      const [url, init] = mockedFetch.mock.calls[0];
      expect(url).toBe(`${PROPERTIES_URL}/2`);
      expect(init?.method).toBe('PUT');
      expect(JSON.parse(String(init?.body))).toStrictEqual({ sourceGroupId: 12345, destinationGroupId: 54321 });
    });

    test('requires both groups', async () => {
      const [err] = await iam.properties.moveProperty({
        propertyId: 2,
        body: { sourceGroupId: 0, destinationGroupId: 0 },
      });

      expect(getValidationError(err)?.fields).toEqual(['body.destinationGroupId', 'body.sourceGroupId']);
      expect(mockedFetch).not.toHaveBeenCalled();
    });
  });

  test('blockUsers puts the identities', async () => {
    mockedFetch.mockResolvedValueOnce(
      Response.json([{ firstName: 'Jo', lastName: 'Doe', isBlocked: true, uiIdentityId: 'A-B-123' }]),
    );

    const [err] = await iam.properties.blockUsers({ propertyId: 2, body: [{ uiIdentityId: 'A-B-123' }] });

    expect(err).toBeNull();
    const [url, init] = mockedFetch.mock.calls[0];
    expect(url).toBe(`${PROPERTIES_URL}/2/users/block`);
    expect(init?.body).toBe('[{"uiIdentityId":"A-B-123"}]');
  });

  describe('mapPropertyIDToName', () => {
    test('returns the property name', async () => {
      mockedFetch.mockResolvedValueOnce(Response.json(details));

      const [err, name] = await iam.properties.mapPropertyIDToName({ propertyId: 2, groupId: 12345 });

      expect(err).toBeNull();
      expect(name).toBe('api.example.com');
    });

    test('wraps the lookup failure', async () => {
      mockedFetch.mockResolvedValueOnce(Response.json({ title: 'Not Found', detail: 'no property' }, { status: 404 }));

      const [err] = await iam.properties.mapPropertyIDToName({ propertyId: 2, groupId: 12345 });

      expect(isOperationError(err, 'map property by id')).toBe(true);
      expect(isOperationError(err?.cause, 'get property')).toBe(true);
      expect(getIAMError(err)?.statusCode).toBe(404);
    });
  });

  describe('mapPropertyNameToID', () => {
    test('finds the property in the group', async () => {
      mockedFetch.mockResolvedValueOnce(Response.json(properties));

      const [err, id] = await iam.properties.mapPropertyNameToID({ groupId: 12345, propertyName: 'api.example.com' });

      expect(err).toBeNull();
      expect(id).toBe(2);
      expect(mockedFetch.mock.calls[0][0]).toBe(`${PROPERTIES_URL}?actions=false&groupId=12345`);
    });

    test('fails when no property has the name', async () => {
      mockedFetch.mockResolvedValueOnce(Response.json(properties));

      const [err, id] = await iam.properties.mapPropertyNameToID({ groupId: 12345, propertyName: 'cdn.example.com' });

      expect(id).toBeNull();
      expect(err?.message).toBe('map property by name');
      expect(err?.cause).toStrictEqual(new Error("no property named 'cdn.example.com' in group 12345"));
    });
  });
});
