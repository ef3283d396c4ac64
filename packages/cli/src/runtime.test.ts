import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { HttpError, defaultConfig, type PineClientConfig } from '@pine-sdk/client';
import type { NormalizedEvent, SessionInfo } from '@pine-sdk/shared';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import { loadCredentials, saveCredentials } from './credentials';
import {
  EXIT_HTTP_ERROR,
  EXIT_NOT_LOGGED_IN,
  EXIT_OK,
  EXIT_USAGE,
  NOT_LOGGED_IN_MESSAGE,
  runCli,
  type CliClient,
} from './runtime';

function capture() {
  const chunks: string[] = [];
  return {
    write: (chunk: string) => {
      chunks.push(chunk);
    },
    text: () => chunks.join(''),
  };
}

const session: SessionInfo = {
  id: 'S9',
  title: 'Internet bill',
  state: 'chat',
  created_at: '',
  updated_at: '',
};

function createFakeClient(replies: NormalizedEvent[] = []) {
  const client = {
    auth: {
      requestCode: vi.fn(async (_email: string) => ({ request_token: 'req-1' })),
      verifyCode: vi.fn(async (email: string, _code: string, _requestToken: string) => ({
        access_token: 'test-access',
        id: 'u1',
        email,
      })),
    },
    sessions: {
      list: vi.fn(async () => ({ sessions: [session], total: 1, limit: 30, offset: 0 })),
      create: vi.fn(async () => session),
      delete: vi.fn(async (_sessionId: string, _options?: { force?: boolean }) => ({})),
      startTask: vi.fn(async (_sessionId: string) => ({ started: true })),
      stopTask: vi.fn(async (_sessionId: string) => ({ stopped: true })),
    },
    connect: vi.fn(async () => undefined),
    disconnect: vi.fn(async () => undefined),
    joinSession: vi.fn(async (_sessionId: string) => ({})),
    chat: vi.fn(async function* (_sessionId: string, _content: string) {
      yield* replies;
    }),
  } satisfies CliClient;
  return client;
}

describe('runCli', () => {
  let dir: string;
  let credentialsPath: string;
  let stdout: ReturnType<typeof capture>;
  let stderr: ReturnType<typeof capture>;
  let client: ReturnType<typeof createFakeClient>;
  let createClient: Mock<(config: PineClientConfig) => CliClient>;

  const run = (...argv: string[]) =>
    runCli({
      argv,
      stdout,
      stderr,
      credentialsPath,
      loadClientConfig: () => defaultConfig(),
      createClient,
    });

  const login = () =>
    saveCredentials(credentialsPath, {
      access_token: 'test-access',
      user_id: 'u1',
      email: 'user@example.test',
    });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pine-cli-'));
    credentialsPath = path.join(dir, 'config.json');
    stdout = capture();
    stderr = capture();
    client = createFakeClient();
    createClient = vi.fn((_config: PineClientConfig): CliClient => client);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('auth', () => {
    it('reports a missing login with exit code 3', async () => {
      await expect(run('auth', 'status')).resolves.toBe(EXIT_NOT_LOGGED_IN);
      expect(stderr.text()).toBe(`${NOT_LOGGED_IN_MESSAGE}\n`);
    });

    it('logs in with an emailed code and stores the token', async () => {
      const code = await run('auth', 'login', '--email', 'user@example.test', '--code', '1234');

      expect(code).toBe(EXIT_OK);
      expect(client.auth.requestCode).toHaveBeenCalledWith('user@example.test');
      expect(client.auth.verifyCode).toHaveBeenCalledWith('user@example.test', '1234', 'req-1');
      expect(stdout.text()).toBe('Logged in as user@example.test\n');
      expect(loadCredentials(credentialsPath)).toEqual({
        access_token: 'test-access',
        user_id: 'u1',
        email: 'user@example.test',
        base_url: 'https://www.19pine.ai',
      });
    });

    it('shows and clears the stored account', async () => {
      login();

      await expect(run('auth', 'status')).resolves.toBe(EXIT_OK);
      await expect(run('auth', 'logout')).resolves.toBe(EXIT_OK);
      await expect(run('auth', 'logout')).resolves.toBe(EXIT_OK);

      expect(stdout.text()).toBe(
        'Logged in as user@example.test (u1)\nLogged out\nNot logged in\n',
      );
    });
  });

  describe('sessions', () => {
    it('lists sessions with the stored credentials', async () => {
      login();

      await expect(run('sessions', 'list')).resolves.toBe(EXIT_OK);

      expect(createClient).toHaveBeenCalledWith(
        expect.objectContaining({ accessToken: 'test-access', userId: 'u1' }),
      );
      expect(client.sessions.list).toHaveBeenCalledWith({ state: undefined, limit: 30 });
      expect(stdout.text()).toBe('S9  chat  Internet bill\n');
    });

    it('says so when there are no sessions', async () => {
      login();
      client.sessions.list.mockResolvedValueOnce({ sessions: [], total: 0, limit: 30, offset: 0 });

      await run('sessions', 'list');

      expect(stdout.text()).toBe('No sessions\n');
    });

    it('force deletes a session', async () => {
      login();

      await expect(run('sessions', 'delete', 'S1', '--force')).resolves.toBe(EXIT_OK);

      expect(client.sessions.delete).toHaveBeenCalledWith('S1', { force: true });
      expect(stdout.text()).toBe('Deleted S1\n');
    });

    it('requires a login', async () => {
      await expect(run('sessions', 'list')).resolves.toBe(EXIT_NOT_LOGGED_IN);
      expect(createClient).not.toHaveBeenCalled();
    });
  });

  describe('send', () => {
    const replies: NormalizedEvent[] = [
      {
        sessionId: 'S9',
        emittedAt: 0,
        type: 'ack',
        data: { eventName: 'session:thinking', data: {} },
      },
      {
        sessionId: 'S9',
        emittedAt: 0,
        type: 'work_log',
        data: { lineId: 'a', text: 'Calling', status: 'done', updates: 1, partial: false },
      },
      {
        sessionId: 'S9',
        emittedAt: 0,
        type: 'text',
        data: { content: 'Done, you save $20.', fragments: 1, partial: false },
      },
    ];

    it('creates a session and prints the reply', async () => {
      login();
      client = createFakeClient(replies);

      await expect(run('send', 'Lower my bill')).resolves.toBe(EXIT_OK);

      expect(client.joinSession).toHaveBeenCalledWith('S9');
      expect(client.chat).toHaveBeenCalledWith('S9', 'Lower my bill');
      expect(client.disconnect).toHaveBeenCalledTimes(1);
      expect(stdout.text()).toBe('Session S9\n[work] Calling (done)\nDone, you save $20.\n');
    });

    it('prints one JSON event per line on an existing session', async () => {
      login();
      client = createFakeClient(replies);

      await run('send', 'hi', '--session', 'S1', '--json');

      expect(client.sessions.create).not.toHaveBeenCalled();
      expect(client.joinSession).toHaveBeenCalledWith('S1');
      const lines = stdout.text().trimEnd().split('\n');
      expect(lines.map((line) => JSON.parse(line))).toEqual(replies);
    });

    it('maps HTTP failures to exit code 4 and still disconnects', async () => {
      login();
      client.sessions.create.mockRejectedValueOnce(
        new HttpError(500, 'HTTP 500 Internal Server Error'),
      );

      await expect(run('send', 'hi')).resolves.toBe(EXIT_HTTP_ERROR);

      expect(stderr.text()).toBe('Request failed: HTTP 500 Internal Server Error\n');
      expect(client.disconnect).toHaveBeenCalledTimes(1);
    });
  });

  it('rejects unknown commands as usage errors', async () => {
    await expect(run('bogus')).resolves.toBe(EXIT_USAGE);
  });
});
