import { afterEach, beforeEach, describe, expect, type Mock, test, vi } from 'vitest';
import { isOperationError } from '../error/operationError.js';
import { getValidationError } from '../error/validationError.js';
import { createIAM, type IAMClient } from './client.js';
import { padExpiresOn } from './credentials.js';

const BASE_URL = 'https://akab-test.luna.akamaiapis.net/';

const json = (body: unknown, status: number) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const credential = {
  clientToken: 'akab-test-token',
  createdOn: '2024-01-10T10:00:00.000Z',
  credentialId: 123,
  description: 'deploy key',
  expiresOn: '2026-01-10T10:00:00.000Z',
  status: 'ACTIVE',
};

describe('padExpiresOn', () => {
  test('adds a nanosecond to a whole-second timestamp', () => {
    expect(padExpiresOn('2025-06-30T12:00:00Z')).toBe('2025-06-30T12:00:00.000000001Z');
  });

  test('adds a nanosecond when the fraction is all zeroes', () => {
    expect(padExpiresOn('2025-06-30T12:00:00.000+02:00')).toBe('2025-06-30T12:00:00.000000001+02:00');
  });

  test('keeps a timestamp that already has a sub-second part', () => {
    expect(padExpiresOn('2025-06-30T12:00:00.5Z')).toBe('2025-06-30T12:00:00.5Z');
  });

  test('formats a Date in UTC', () => {
    expect(padExpiresOn(new Date(Date.UTC(2025, 0, 1)))).toBe('2025-01-01T00:00:00.000000001Z');
  });
});

describe('credentials', () => {
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

  test('createCredential targets the calling client when no id is given', async () => {
    mockedFetch.mockResolvedValueOnce(json({ ...credential, clientSecret: 'test-secret' }, 201));

    const [err, created] = await iam.credentials.createCredential();

    expect(err).toBeNull();
    expect(created?.clientSecret).toBe('test-secret');
    const [url, init] = mockedFetch.mock.calls[0];
    expect(url).toBe(`${BASE_URL}identity-management/v3/api-clients/self/credentials`);
    expect(init?.method).toBe('POST');
    expect(init?.body).toBeUndefined();
  });

  test('listCredentials uses the given client id', async () => {
    mockedFetch.mockResolvedValueOnce(json([credential], 200));

    const [err, credentials] = await iam.credentials.listCredentials({ clientId: 'abcd1234', actions: true });

    expect(err).toBeNull();
    expect(credentials?.[0].credentialId).toBe(123);
    expect(mockedFetch.mock.calls[0][0]).toBe(
      `${BASE_URL}identity-management/v3/api-clients/abcd1234/credentials?actions=true`,
    );
  });

  test('getCredential requires a credential id', async () => {
    const [err] = await iam.credentials.getCredential({ credentialId: 0 });

    expect(isOperationError(err, 'get credential')).toBe(true);
    expect(getValidationError(err)?.fields).toEqual(['credentialId']);
    expect(mockedFetch).not.toHaveBeenCalled();
  });

  describe('updateCredential', () => {
    test('pads the expiry and leaves out an empty description', async () => {
      mockedFetch.mockResolvedValueOnce(
        json({ expiresOn: '2026-01-01T00:00:00.000000001Z', status: 'INACTIVE' }, 200),
      );

      const [err, updated] = await iam.credentials.updateCredential({
        credentialId: 123,
        body: { description: '', expiresOn: '2026-01-01T00:00:00Z', status: 'INACTIVE' },
      });

      expect(err).toBeNull();
      expect(updated?.status).toBe('INACTIVE');
      const [url, init] = mockedFetch.mock.calls[0];
      expect(url).toBe(`${BASE_URL}identity-management/v3/api-clients/self/credentials/123`);
      expect(init?.method).toBe('PUT');
      expect(init?.body).toBe(JSON.stringify({ expiresOn: '2026-01-01T00:00:00.000000001Z', status: 'INACTIVE' }));
    });

    test('rejects an unknown status and a malformed expiry', async () => {
      const [err] = await iam.credentials.updateCredential({
        credentialId: 123,
        // @ts-expect-error unknown status on purpose
        body: { expiresOn: 'tomorrow', status: 'PAUSED' },
      });

      expect(getValidationError(err)?.fields).toEqual(['body.expiresOn', 'body.status']);
      expect(mockedFetch).not.toHaveBeenCalled();
    });
  });

  test('deleteCredential accepts 204', async () => {
    mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

    const [err, result] = await iam.credentials.deleteCredential({ clientId: 'abcd1234', credentialId: 123 });

    expect(err).toBeNull();
    expect(result).toBeNull();
    const [url, init] = mockedFetch.mock.calls[0];
    expect(url).toBe(`${BASE_URL}identity-management/v3/api-clients/abcd1234/credentials/123`);
    expect(init?.method).toBe('DELETE');
  });

  test('deactivateCredential posts to the credential', async () => {
    mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

    const [err] = await iam.credentials.deactivateCredential({ credentialId: 123 });

    expect(err).toBeNull();
    expect(mockedFetch.mock.calls[0][0]).toBe(
      `${BASE_URL}identity-management/v3/api-clients/self/credentials/123/deactivate`,
    );
  });

  test('deactivateCredentials wraps a failure in its own operation error', async () => {
    mockedFetch.mockResolvedValueOnce(json({ type: 'not_found', title: 'Not Found', detail: 'no client' }, 404));

    const [err] = await iam.credentials.deactivateCredentials({ clientId: 'abcd1234' });

    expect(isOperationError(err, 'deactivate credentials')).toBe(true);
    expect(mockedFetch.mock.calls[0][0]).toBe(
      `${BASE_URL}identity-management/v3/api-clients/abcd1234/credentials/deactivate`,
    );
  });
});
