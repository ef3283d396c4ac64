import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ClientEvent, type NormalizedEvent, type SessionInfo } from '@pine-sdk/shared';

import { defaultConfig, type PineClientConfig } from './config';
import {
  ChatEngine,
  type ChatOptions,
  type HistoryOptions,
  type StreamOptions,
} from './engine/chatEngine';
import { AuthError, ConnectionError } from './errors';
import { AuthApi } from './http/authApi';
import type { HttpClientConfig } from './http/httpClient';
import { SessionsApi } from './http/sessionsApi';
import { createConsoleLogger, type PineLogger } from './logging';
import { SocketTransport } from './transport/socketTransport';
import type { TransportChannel } from './transport/types';

export const SESSION_WEB_URL = 'https://www.19pine.ai/app/chat';

export interface PineClientOptions {
  /** Overrides on top of the defaults; see `loadConfig` for env and file sources. */
  config?: Partial<PineClientConfig>;
  includeSystemEvents?: boolean;
  /** Where a generated device id is kept. Defaults to `~/.pine/device_id`. */
  deviceIdFile?: string;
  log?: PineLogger;
  /** Replaces the Socket.IO transport, mainly for tests. */
  createTransport?: (config: TransportFactoryConfig) => TransportChannel;
}

export interface TransportFactoryConfig {
  baseUrl: string;
  accessToken: string;
  userId: string;
  deviceId: string;
  config: PineClientConfig;
}

export function defaultDeviceIdFile(): string {
  return path.join(os.homedir(), '.pine', 'device_id');
}

/**
 * Read the persisted device id, creating one on first use. A device id that
 * cannot be written is still used for this process.
 */
export function loadOrCreateDeviceId(filePath: string, log?: PineLogger): string {
  try {
    const existing = fs.readFileSync(filePath, 'utf8').trim();
    if (existing) {
      return existing;
    }
  } catch (err) {
    if (!isMissingFileError(err)) {
      throw err;
    }
  }

  const deviceId = randomUUID();
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, deviceId, 'utf8');
  } catch (err) {
    log?.warn('could not persist device id', {
      filePath,
      error: err instanceof Error ? err.message : String(err),
    });
  }
  return deviceId;
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class PineClient {
  readonly config: PineClientConfig;
  readonly auth: AuthApi;
  readonly sessions: SessionsApi;
  private transport: TransportChannel | null = null;
  private engine: ChatEngine | null = null;
  private readonly log: PineLogger;

  constructor(private readonly options: PineClientOptions = {}) {
    this.config = defaultConfig(options.config);
    this.log = options.log ?? createConsoleLogger('pine-chat', { debug: this.config.debug });

    const httpConfig = (): HttpClientConfig => ({
      baseUrl: this.config.baseUrl,
      accessToken: this.config.accessToken,
      log: createConsoleLogger('pine-http', { debug: this.config.debug }),
    });
    this.auth = new AuthApi(httpConfig, (token) => {
      this.config.accessToken = token;
    });
    this.sessions = new SessionsApi(httpConfig);
  }

  static sessionUrl(sessionId: string): string {
    return `${SESSION_WEB_URL}/${encodeURIComponent(sessionId)}`;
  }

  get connected(): boolean {
    return this.transport?.connected ?? false;
  }

  setCredentials(accessToken: string, userId: string): void {
    this.config.accessToken = accessToken;
    this.config.userId = userId;
  }

  async connect(): Promise<void> {
    const { accessToken, userId } = this.config;
    if (!accessToken || !userId) {
      throw new AuthError(
        'An access token and user id are required; log in first',
        'not_authenticated',
      );
    }
    if (this.connected) {
      return;
    }
    if (this.engine) {
      this.engine.dispose();
    }

    const deviceId =
      this.config.deviceId ??
      loadOrCreateDeviceId(this.options.deviceIdFile ?? defaultDeviceIdFile(), this.log);
    this.config.deviceId = deviceId;

    const factoryConfig: TransportFactoryConfig = {
      baseUrl: this.config.baseUrl,
      accessToken,
      userId,
      deviceId,
      config: this.config,
    };
    const transport = this.options.createTransport
      ? this.options.createTransport(factoryConfig)
      : new SocketTransport({
          baseUrl: this.config.baseUrl,
          accessToken,
          userId,
          deviceId,
          readyTimeoutMs: this.config.readyTimeoutMs,
          requestTimeoutMs: this.config.requestTimeoutMs,
          reconnect: this.config.reconnect,
          log: createConsoleLogger('pine-transport', { debug: this.config.debug }),
        });

    this.transport = transport;
    this.engine = new ChatEngine({
      transport,
      engine: this.config.engine,
      log: this.log,
      ...(this.options.includeSystemEvents !== undefined
        ? { includeSystemEvents: this.options.includeSystemEvents }
        : {}),
    });
    await transport.connect();
  }

  async disconnect(): Promise<void> {
    const transport = this.transport;
    this.engine?.dispose();
    this.engine = null;
    this.transport = null;
    if (transport) {
      await transport.disconnect();
    }
  }

  async joinSession(sessionId: string): Promise<unknown> {
    return this.requireEngine().joinSession(sessionId);
  }

  leaveSession(sessionId: string): void {
    this.requireEngine().leaveSession(sessionId);
  }

  chat(
    sessionId: string,
    content: string,
    options: ChatOptions = {},
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    return this.requireEngine().chat(sessionId, content, options);
  }

  sendMessage(sessionId: string, content: string, options: ChatOptions = {}): void {
    this.requireEngine().sendMessage(sessionId, content, options);
  }

  listen(
    sessionId: string,
    options: StreamOptions = {},
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    return this.requireEngine().listen(sessionId, options);
  }

  subscribe(
    sessionId: string,
    options: StreamOptions = {},
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    return this.requireEngine().subscribe(sessionId, options);
  }

  getHistory(
    sessionId: string,
    options: HistoryOptions = {},
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    return this.requireEngine().getHistory(sessionId, options);
  }

  /** Create a session, join it, send `content` and yield the reply. Leaves the session afterwards. */
  async *createAndChat(
    content: string,
    options: ChatOptions & { onSession?: (session: SessionInfo) => void } = {},
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    const engine = this.requireEngine();
    const session = await this.sessions.create();
    options.onSession?.(session);
    await engine.joinSession(session.id);
    try {
      yield* engine.chat(session.id, content, options);
    } finally {
      if (engine.isJoined(session.id)) {
        engine.leaveSession(session.id);
      }
    }
  }

  sendFormResponse(sessionId: string, messageId: string, formData: Record<string, unknown>): void {
    this.requireEngine().sendReply(
      sessionId,
      ClientEvent.SessionFormToUser,
      { content: formData },
      messageId,
    );
  }

  sendAuthConfirmation(sessionId: string, messageId: string, data: Record<string, unknown>): void {
    this.requireEngine().sendReply(
      sessionId,
      ClientEvent.SessionInteractiveAuthConfirmation,
      { content: data },
      messageId,
    );
  }

  sendLocationResponse(
    sessionId: string,
    messageId: string,
    latitude: string,
    longitude: string,
  ): void {
    this.requireEngine().sendReply(
      sessionId,
      ClientEvent.SessionAskForLocation,
      { content: { latitude, longitude } },
      messageId,
    );
  }

  sendLocationSelection(
    sessionId: string,
    messageId: string,
    places: Array<Record<string, unknown>>,
  ): void {
    this.requireEngine().sendReply(
      sessionId,
      ClientEvent.SessionLocationSelection,
      { list: places },
      messageId,
    );
  }

  async cancel(sessionId: string): Promise<void> {
    await this.requireEngine().cancel(sessionId);
  }

  inconsistencyCount(sessionId: string): number {
    return this.engine?.inconsistencyCount(sessionId) ?? 0;
  }

  private requireEngine(): ChatEngine {
    if (!this.engine || !this.transport) {
      throw new ConnectionError('Not connected; call connect() first');
    }
    return this.engine;
  }
}
