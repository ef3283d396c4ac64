import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SessionError } from '../errors';
import { silentLogger } from '../logging';
import { SessionsApi } from './sessionsApi';

const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'content-type': 'application/json' },
  });
}

function lastCall(): { url: string | undefined; method: string | undefined } {
  const call = fetchMock.mock.calls.at(-1);
  return { url: call?.[0], method: call?.[1]?.method };
}

describe('SessionsApi', () => {
  const api = new SessionsApi(() => ({
    baseUrl: 'https://pine.test',
    accessToken: 'test-token',
    log: silentLogger,
  }));

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('lists sessions with paging and an optional state filter', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        status: 'success',
        data: {
          sessions: [{ id: 'S1', title: 'Internet bill', state: 'chat' }],
          total: 1,
          limit: 30,
          offset: 0,
        },
      }),
    );

    const result = await api.list({ state: 'chat' });

    expect(lastCall()).toEqual({
      url: 'https://pine.test/api/v2/sessions?limit=30&offset=0&state=chat',
      method: 'GET',
    });
    expect(result.total).toBe(1);
    expect(result.sessions[0]).toEqual({
      id: 'S1',
      title: 'Internet bill',
      state: 'chat',
      created_at: '',
      updated_at: '',
    });
  });

  it('rejects a list response of the wrong shape', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ sessions: 'none' }));

    await expect(api.list()).rejects.toBeInstanceOf(SessionError);
  });

  it('creates a session', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ id: 'S9' }));

    const session = await api.create();

    expect(lastCall()).toEqual({ url: 'https://pine.test/api/v2/sessions', method: 'POST' });
    expect(session).toEqual({
      id: 'S9',
      title: '',
      state: 'init',
      created_at: '',
      updated_at: '',
    });
  });

  it('force deletes through a query flag', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ deleted: true }));

    await api.delete('S1', { force: true });

    expect(lastCall()).toEqual({
      url: 'https://pine.test/api/v2/sessions/S1?force_delete=true',
      method: 'DELETE',
    });
  });

  it('starts and stops the task of a session', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: 'success', data: { started: true } }));
    await expect(api.startTask('S1')).resolves.toEqual({ started: true });
    expect(lastCall().url).toBe('https://pine.test/api/v2/sessions/S1/start');

    fetchMock.mockResolvedValueOnce(jsonResponse([]));
    await expect(api.stopTask('S1')).resolves.toEqual({});
    expect(lastCall().url).toBe('https://pine.test/api/v2/sessions/S1/stop');
  });
});
