import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { AuthError } from '../errors';
import { silentLogger } from '../logging';
import { AuthApi } from './authApi';

const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'content-type': 'application/json' },
  });
}

describe('AuthApi', () => {
  const onToken = vi.fn();
  const api = new AuthApi(
    () => ({ baseUrl: 'https://pine.test', accessToken: 'test-token', log: silentLogger }),
    onToken,
  );

  beforeEach(() => {
    fetchMock.mockReset();
    onToken.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requests a code without sending the current token', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ status: 'success', data: { request_token: 'req-1' } }),
    );

    await expect(api.requestCode('user@example.test')).resolves.toEqual({
      request_token: 'req-1',
    });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://pine.test/api/v2/auth/email/request');
    expect(init?.body).toBe('{"email":"user@example.test"}');
    expect(init?.headers).not.toHaveProperty('Authorization');
  });

  it('hands the verified token to the client', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ access_token: 'test-access', id: 'u1', email: 'user@example.test' }),
    );

    const verified = await api.verifyCode('user@example.test', '1234', 'req-1');

    expect(verified.id).toBe('u1');
    expect(onToken).toHaveBeenCalledWith('test-access');
    expect(fetchMock.mock.calls[0]?.[1]?.body).toBe(
      '{"email":"user@example.test","code":"1234","request_token":"req-1"}',
    );
  });

  it('wraps failures in AuthError', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ detail: 'bad code' }, 401, 'Unauthorized'));

    const error = await api
      .verifyCode('user@example.test', '0000', 'req-1')
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toHaveProperty('message', 'Failed to verify auth code: HTTP 401 Unauthorized');
    expect(onToken).not.toHaveBeenCalled();
  });
});
