import { afterEach, describe, expect, it, vi, type Mock } from 'vitest';
import { PermissionChange } from '@permit/domain';
import {
  AuthorityTransportError,
  HttpAuthorityTransport,
} from '../../src/authority/HttpAuthorityTransport';

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

const sentBody = (fetchImpl: Mock<typeof fetch>): unknown => {
  const init = fetchImpl.mock.calls[0]?.[1];
  return JSON.parse(String(init?.body));
};

describe('HttpAuthorityTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('submits requests and returns the accepted ids', async () => {
    const change = PermissionChange.createForUser({ userId: 'alice', realmUrl: '*', mayRead: true });
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValueOnce(
      jsonResponse({ accepted: [change.id.value] })
    );
    const transport = new HttpAuthorityTransport({
      baseUrl: 'https://authority.test/',
      fetchImpl,
      headers: { authorization: 'Bearer test-token' },
    });

    const accepted = await transport.submit([change]);

    expect(accepted).toEqual([change.id.value]);
    expect(fetchImpl).toHaveBeenCalledWith(
      'https://authority.test/permission-changes',
      expect.objectContaining({
        method: 'POST',
        headers: { 'content-type': 'application/json', authorization: 'Bearer test-token' },
      })
    );
    expect(sentBody(fetchImpl)).toEqual({
      requests: [
        expect.objectContaining({
          id: change.id.value,
          userId: 'alice',
          realmUrl: '*',
          mayRead: true,
          mayWrite: null,
          mayManage: null,
        }),
      ],
    });
  });

  it('skips the round trip for empty batches', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const transport = new HttpAuthorityTransport({ baseUrl: 'https://authority.test', fetchImpl });

    expect(await transport.submit([])).toEqual([]);
    expect(await transport.fetchOutcomes([])).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('fetches outcomes and normalizes missing messages', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValueOnce(
      jsonResponse({
        outcomes: [
          { id: 'a', statusCode: 0 },
          { id: 'b', statusCode: 614, statusMessage: 'denied' },
          { id: 'c', statusCode: null, statusMessage: null },
        ],
      })
    );
    const transport = new HttpAuthorityTransport({ baseUrl: 'https://authority.test', fetchImpl });

    const outcomes = await transport.fetchOutcomes(['a', 'b', 'c']);

    expect(outcomes).toEqual([
      { id: 'a', statusCode: 0, statusMessage: null },
      { id: 'b', statusCode: 614, statusMessage: 'denied' },
      { id: 'c', statusCode: null, statusMessage: null },
    ]);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://authority.test/permission-changes/status');
    expect(sentBody(fetchImpl)).toEqual({ ids: ['a', 'b', 'c'] });
  });

  it('surfaces the server error message and status', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValueOnce(
      jsonResponse({ error: { message: 'authority unavailable' } }, 503)
    );
    const transport = new HttpAuthorityTransport({ baseUrl: 'https://authority.test', fetchImpl });

    const error = await transport.fetchOutcomes(['a']).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthorityTransportError);
    if (error instanceof AuthorityTransportError) {
      expect(error.message).toBe('authority unavailable');
      expect(error.status).toBe(503);
      expect(error.payload).toEqual({ error: { message: 'authority unavailable' } });
    }
  });

  it('falls back to a generic message for empty error bodies', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValueOnce(new Response(null, { status: 500 }));
    const transport = new HttpAuthorityTransport({ baseUrl: 'https://authority.test', fetchImpl });

    await expect(transport.fetchOutcomes(['a'])).rejects.toThrow(
      'Request to /permission-changes/status failed (status 500)'
    );
  });

  it('wraps network failures without a status', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValueOnce(new TypeError('connection refused'));
    const transport = new HttpAuthorityTransport({ baseUrl: 'https://authority.test', fetchImpl });

    const error = await transport.fetchOutcomes(['a']).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthorityTransportError);
    if (error instanceof AuthorityTransportError) {
      expect(error.message).toBe('Network error calling /permission-changes/status: connection refused');
      expect(error.status).toBeUndefined();
    }
  });

  it('rejects responses that do not match the expected shape', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({ accepted: 'all' }));
    const transport = new HttpAuthorityTransport({ baseUrl: 'https://authority.test', fetchImpl });
    const change = PermissionChange.createForUser({ userId: 'alice', realmUrl: '*' });

    await expect(transport.submit([change])).rejects.toThrow('Unexpected response from /permission-changes');
  });

  it('uses the global fetch by default', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({ outcomes: [] }));
    vi.stubGlobal('fetch', fetchMock);
    const transport = new HttpAuthorityTransport({ baseUrl: 'https://authority.test' });

    expect(await transport.fetchOutcomes(['a'])).toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
