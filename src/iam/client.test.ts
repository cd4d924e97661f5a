import { afterEach, beforeEach, describe, expect, type Mock, test, vi } from 'vitest';
import type { Logger } from '../log/logger.js';
import { createIAM, IAMClient } from './client.js';

const BASE_URL = 'https://akab-test.luna.akamaiapis.net/';

describe('IAMClient', () => {
  let mockedFetch: Mock<typeof fetch>;

  beforeEach(() => {
    mockedFetch = vi.fn<typeof fetch>();
    global.fetch = mockedFetch;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('createIAM builds a client', () => {
    expect(createIAM({ baseUrl: 'akab-test.luna.akamaiapis.net' })).toBeInstanceOf(IAMClient);
  });

  test('every group shares one transport and its default headers', async () => {
    mockedFetch.mockImplementation(() => Promise.resolve(Response.json([])));
    const iam = createIAM({
      baseUrl: 'akab-test.luna.akamaiapis.net',
      fetchOpts: { headers: { 'X-Account': 'test-account' } },
    });

    await iam.groups.listGroups();
    await iam.roles.listGrantableRoles();

    for (const [url, init] of mockedFetch.mock.calls) {
      expect(String(url).startsWith(BASE_URL)).toBe(true);
      expect(new Headers(init?.headers).get('x-account')).toBe('test-account');
    }
  });

  test('config updates the headers of later requests', async () => {
    mockedFetch.mockImplementation(() => Promise.resolve(Response.json({ enabled: false })));
    const iam = createIAM({ baseUrl: 'akab-test.luna.akamaiapis.net' });

    iam.config({ fetchOpts: { headers: { 'X-Account': 'other-account' } } });
    await iam.ipAllowlist.getIPAllowlistStatus();

    expect(new Headers(mockedFetch.mock.calls[0][1]?.headers).get('x-account')).toBe('other-account');
  });

  test('logs the operation and the request at debug level', async () => {
    mockedFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));
    const logger: Logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
    const iam = createIAM({ baseUrl: 'akab-test.luna.akamaiapis.net', logger });

    await iam.groups.removeGroup({ groupId: 12345 });

    expect(logger.debug).toHaveBeenNthCalledWith(1, 'remove group');
    expect(logger.debug).toHaveBeenNthCalledWith(2, 'DELETE identity-management/v3/user-admin/groups/12345');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  test('warns about a rejected status', async () => {
    mockedFetch.mockResolvedValueOnce(Response.json({ title: 'Forbidden' }, { status: 403 }));
    const logger: Logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
    const iam = createIAM({ baseUrl: 'akab-test.luna.akamaiapis.net', logger });

    await iam.groups.removeGroup({ groupId: 12345 });

    expect(logger.warn).toHaveBeenCalledWith('unexpected status for DELETE identity-management/v3/user-admin/groups/12345', {
      status: 403,
      expected: [204],
    });
  });
});
