import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { MdmError } from '@mdm-mcp/core';
import type { TokenProvider, TokenRequestOptions } from '../src/reltio/auth.js';
import { ReltioClient } from '../src/reltio/client.js';

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(typeof body === 'string' ? body : JSON.stringify(body), { status });
}

const API = 'https://dev.reltio.com/reltio/api/tenant1';

describe('ReltioClient', () => {
  let fetchMock: Mock<FetchFn>;
  let getAccessToken: Mock<(options?: TokenRequestOptions) => Promise<string>>;
  let client: ReltioClient;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal('fetch', fetchMock);
    getAccessToken = vi
      .fn<(options?: TokenRequestOptions) => Promise<string>>()
      .mockResolvedValueOnce('token-1')
      .mockResolvedValue('token-2');
    const tokenProvider: TokenProvider = { getAccessToken };
    client = new ReltioClient({ endpoint: { environment: 'dev' }, tokenProvider });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds api, permissions and export job urls', () => {
    expect(client.apiUrl('entities/abc123', 'tenant1')).toBe(`${API}/entities/abc123`);
    expect(client.apiUrl('', 'tenant1', 'permissions')).toBe('https://dev.reltio.com/reltio/permissions/tenant1');
    expect(client.exportJobUrl('entities/_crosswalksTree', 'tenant1')).toBe(
      'https://dev.reltio.com/jobs/export/tenant1/entities/_crosswalksTree'
    );
  });

  it('sends the bearer token, json headers and query parameters', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ uri: 'entities/abc123' }));

    const data = await client.request(`${API}/entities/abc123/_transitiveMatches`, {
      params: { deep: 1, limit: 10 },
    });

    expect(data).toEqual({ uri: 'entities/abc123' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(`${API}/entities/abc123/_transitiveMatches?deep=1&limit=10`);
    expect(init?.method).toBe('GET');
    expect(init?.body).toBeUndefined();
    expect(init?.headers).toEqual({
      Authorization: 'Bearer token-1',
      'Content-Type': 'application/json',
      Accept: 'application/json',
      Source: 'MDM-MCP-Server',
    });
  });

  it('serializes a POST body', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([]));

    await client.request(`${API}/entities/_search`, { method: 'POST', body: { filter: 'exists(uri)', max: 10 } });

    expect(fetchMock.mock.calls[0]?.[1]?.body).toBe('{"filter":"exists(uri)","max":10}');
  });

  it('re-authenticates once when the token is reported invalid', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ error: 'invalid_token' }, 401))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));

    await expect(client.request(`${API}/entities/abc123`)).resolves.toEqual({ ok: true });

    expect(getAccessToken).toHaveBeenCalledTimes(2);
    expect(getAccessToken).toHaveBeenLastCalledWith({ forceRefresh: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1]?.[1]?.headers).toMatchObject({ Authorization: 'Bearer token-2' });
  });

  it('gives up after the second invalid token response', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ error: 'invalid_token' }, 401));

    await expect(client.request(`${API}/entities/abc123`)).rejects.toMatchObject({ status: 401 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry other failures', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse('denied', 401));

    const error = await client.request(`${API}/entities/abc123`).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MdmError);
    expect(error).toMatchObject({
      code: 'API_REQUEST_ERROR',
      status: 401,
      body: 'denied',
      message: 'API request failed: 401 - denied',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('resolves an empty body to null', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 200 }));

    await expect(client.request(`${API}/entities/abc123/_notMatch`, { method: 'POST' })).resolves.toBeNull();
  });

  it('reports an aborted request as a timeout', async () => {
    fetchMock.mockRejectedValueOnce(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }));

    await expect(client.request(`${API}/entities/abc123`, { timeoutMs: 5000 })).rejects.toMatchObject({
      code: 'TIMEOUT_ERROR',
      message: 'Operation HTTP request timed out after 5 seconds',
    });
  });

  it('reports a connection failure as a server error', async () => {
    fetchMock.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    await expect(client.request(`${API}/entities/abc123`)).rejects.toMatchObject({
      code: 'SERVER_ERROR',
      message: 'Failed to connect to Reltio API: ECONNREFUSED',
    });
  });

  it('rejects a disallowed Origin header before sending anything', async () => {
    await expect(
      client.authorize(`${API}/entities/abc123`, { Origin: 'https://evil.example' })
    ).rejects.toMatchObject({ code: 'SECURITY_ERROR', message: 'Security requirements not met' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('propagates token failures from authorize', async () => {
    getAccessToken.mockReset().mockRejectedValue(
      new MdmError({ code: 'AUTHENTICATION_ERROR', message: 'Authentication failed: invalid_client' })
    );

    await expect(client.authorize(`${API}/entities/abc123`)).rejects.toMatchObject({
      code: 'AUTHENTICATION_ERROR',
    });
  });
});
