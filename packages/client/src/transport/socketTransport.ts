import { randomUUID } from 'node:crypto';

import {
  SOCKETIO_PATH,
  TRANSPORT_LIFECYCLE_EVENTS,
  safeValidateEnvelope,
  type MessageEnvelope,
  type RawEvent,
} from '@pine-sdk/shared';
import { io, type Socket } from 'socket.io-client';

import { DEFAULT_RECONNECT_CONFIG, type ReconnectConfig } from '../config';
import { ConnectionError, TransportError } from '../errors';
import { createConsoleLogger, type PineLogger } from '../logging';
import { buildEnvelope } from './envelope';
import { decodeServerEvent, envelopeToDecodeInput } from './rawEvents';
import type {
  RequestOptions,
  SendOptions,
  TransportChannel,
  Unsubscribe,
} from './types';

export interface SocketTransportOptions {
  baseUrl: string;
  accessToken: string;
  userId: string;
  deviceId: string;
  readyTimeoutMs?: number;
  requestTimeoutMs?: number;
  reconnect?: ReconnectConfig;
  transports?: string[];
  log?: PineLogger;
}

/** Returns true when the envelope answered the pending request. */
type EnvelopeMatcher = (eventName: string, envelope: MessageEnvelope) => boolean;

export class SocketTransport implements TransportChannel {
  private socket: Socket | null = null;
  private connectionEpoch = 0;
  private sequence = 0;
  private reconnectAttempts = 0;
  private reconnectTimeoutId: NodeJS.Timeout | null = null;
  private intentionalClose = false;
  private readonly log: PineLogger;
  private readonly reconnectConfig: ReconnectConfig;
  private readonly matchers = new Set<EnvelopeMatcher>();
  private readonly rawHandlers = new Set<(event: RawEvent) => void>();
  private readonly disconnectHandlers = new Set<(reason: string) => void>();
  private readonly reconnectHandlers = new Set<() => void>();
  private readonly reconnectFailedHandlers = new Set<(error: TransportError) => void>();

  constructor(private readonly options: SocketTransportOptions) {
    this.log = options.log ?? createConsoleLogger('pine-transport');
    this.reconnectConfig = options.reconnect ?? DEFAULT_RECONNECT_CONFIG;
  }

  get connected(): boolean {
    return this.socket?.connected ?? false;
  }

  get epoch(): number {
    return this.connectionEpoch;
  }

  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    if (this.reconnectTimeoutId !== null) {
      clearTimeout(this.reconnectTimeoutId);
      this.reconnectTimeoutId = null;
    }
    this.intentionalClose = false;
    await this.open();
  }

  async disconnect(): Promise<void> {
    this.intentionalClose = true;
    this.log.debug('disconnecting');
    this.closeSocket();
  }

  async reconnect(): Promise<void> {
    const hadSocket = this.socket !== null;
    this.closeSocket();
    if (hadSocket) {
      this.notifyDisconnected('client reconnect');
    }
    this.intentionalClose = false;
    this.reconnectAttempts = 0;
    for (;;) {
      try {
        await this.open();
        this.notifyReconnected();
        return;
      } catch (err) {
        if (this.reconnectAttempts >= this.reconnectConfig.maxAttempts) {
          const error = this.exhausted(err);
          this.notifyReconnectFailed(error);
          throw error;
        }
        const delay = this.nextDelay();
        this.log.warn('reconnect attempt failed', {
          attempt: this.reconnectAttempts,
          delayMs: delay,
          error: err instanceof Error ? err.message : String(err),
        });
        await new Promise<void>((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  send(eventType: string, data: unknown, options: SendOptions = {}): void {
    this.emitEnvelope(eventType, data, options);
  }

  request(eventType: string, data: unknown, options: RequestOptions = {}): Promise<unknown> {
    const requestId = randomUUID();
    const timeoutMs = options.timeoutMs ?? this.options.requestTimeoutMs ?? 10_000;

    return new Promise<unknown>((resolve, reject) => {
      const matcher: EnvelopeMatcher = (eventName, envelope) => {
        if (eventName !== eventType) return false;
        const sameRequest = envelope.metadata.request_id === requestId;
        const sameSession =
          options.sessionId !== undefined &&
          envelope.payload.session_id === options.sessionId &&
          envelope.metadata.source.role !== 'user';
        if (!sameRequest && !sameSession) return false;
        cleanup();
        resolve(envelope.payload.data);
        return true;
      };
      const timeoutId = setTimeout(() => {
        cleanup();
        reject(new TransportError(`Timed out waiting for ${eventType} response`, { requestId }));
      }, timeoutMs);
      const cleanup = () => {
        clearTimeout(timeoutId);
        this.matchers.delete(matcher);
      };

      this.matchers.add(matcher);
      try {
        this.emitEnvelope(eventType, data, { ...options, requestId });
      } catch (err) {
        cleanup();
        reject(err);
      }
    });
  }

  onRawEvent(handler: (event: RawEvent) => void): Unsubscribe {
    this.rawHandlers.add(handler);
    return () => this.rawHandlers.delete(handler);
  }

  onDisconnect(handler: (reason: string) => void): Unsubscribe {
    this.disconnectHandlers.add(handler);
    return () => this.disconnectHandlers.delete(handler);
  }

  onReconnect(handler: () => void): Unsubscribe {
    this.reconnectHandlers.add(handler);
    return () => this.reconnectHandlers.delete(handler);
  }

  onReconnectFailed(handler: (error: TransportError) => void): Unsubscribe {
    this.reconnectFailedHandlers.add(handler);
    return () => this.reconnectFailedHandlers.delete(handler);
  }

  private emitEnvelope(
    eventType: string,
    data: unknown,
    options: SendOptions & { requestId?: string },
  ): void {
    const socket = this.socket;
    if (!socket || !socket.connected) {
      throw new ConnectionError(`Cannot send ${eventType}: not connected`);
    }
    const envelope = buildEnvelope(eventType, data, {
      userId: this.options.userId,
      deviceId: this.options.deviceId,
      sessionId: options.sessionId,
      messageId: options.messageId,
      requestId: options.requestId,
    });
    this.log.debug('emit', { eventType, sessionId: options.sessionId });
    socket.emit(eventType, envelope);
  }

  private open(): Promise<void> {
    const readyTimeoutMs = this.options.readyTimeoutMs ?? 15_000;
    const socket = io(this.options.baseUrl, {
      path: SOCKETIO_PATH,
      auth: { token: this.options.accessToken },
      transports: this.options.transports ?? ['websocket'],
      reconnection: false,
      forceNew: true,
    });
    this.socket = socket;

    socket.onAny((eventName: string, ...args: unknown[]) => {
      if (this.socket !== socket) {
        return;
      }
      this.handleIncoming(eventName, args[0]);
    });

    socket.on('disconnect', (reason: string) => {
      if (this.socket !== socket) {
        this.log.debug('disconnect: stale socket, ignoring');
        return;
      }
      this.log.info('disconnected', { reason, intentionalClose: this.intentionalClose });
      this.socket = null;
      if (this.intentionalClose) {
        return;
      }
      this.notifyDisconnected(reason);
      this.scheduleReconnect();
    });

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const timeoutId = setTimeout(() => {
        fail(new TransportError(`Timed out waiting for server ready after ${readyTimeoutMs}ms`));
      }, readyTimeoutMs);

      const fail = (error: TransportError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        if (this.socket === socket) {
          this.socket = null;
        }
        socket.removeAllListeners();
        socket.offAny();
        socket.disconnect();
        reject(error);
      };

      socket.once('connect_error', (err: Error) => {
        fail(new TransportError(`Connection failed: ${err.message}`, { cause: err.message }));
      });

      socket.once('ready', () => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        this.connectionEpoch += 1;
        this.sequence = 0;
        this.reconnectAttempts = 0;
        this.log.info('ready', { epoch: this.connectionEpoch });
        resolve();
      });
    });
  }

  private handleIncoming(eventName: string, raw: unknown): void {
    if (TRANSPORT_LIFECYCLE_EVENTS.has(eventName)) {
      return;
    }
    const parsed = safeValidateEnvelope(raw);
    if (!parsed.success) {
      this.log.warn('dropping malformed envelope', { eventName, error: parsed.error.message });
      return;
    }
    const envelope = parsed.data;

    for (const matcher of [...this.matchers]) {
      if (matcher(eventName, envelope)) {
        return;
      }
    }

    this.sequence += 1;
    const events = decodeServerEvent(envelopeToDecodeInput(eventName, envelope), {
      sequenceHint: this.sequence,
      connectionEpoch: this.connectionEpoch,
      receivedAt: Date.now(),
    });
    if (events.length === 0) {
      this.log.debug('dropping event without session id', { eventName });
    }
    for (const event of events) {
      for (const handler of [...this.rawHandlers]) {
        handler(event);
      }
    }
  }

  private nextDelay(): number {
    const delay = Math.min(
      this.reconnectConfig.delayMs * Math.pow(2, this.reconnectAttempts),
      this.reconnectConfig.maxDelayMs,
    );
    this.reconnectAttempts += 1;
    return delay;
  }

  private scheduleReconnect(): void {
    if (this.intentionalClose || this.reconnectTimeoutId !== null) {
      return;
    }
    if (this.reconnectAttempts >= this.reconnectConfig.maxAttempts) {
      this.notifyReconnectFailed(this.exhausted(undefined));
      return;
    }

    const delay = this.nextDelay();
    this.log.info('reconnecting', { attempt: this.reconnectAttempts, delayMs: delay });
    this.reconnectTimeoutId = setTimeout(() => {
      this.reconnectTimeoutId = null;
      this.open().then(
        () => this.notifyReconnected(),
        (err: unknown) => {
          this.log.warn('reconnect attempt failed', {
            attempt: this.reconnectAttempts,
            error: err instanceof Error ? err.message : String(err),
          });
          this.scheduleReconnect();
        },
      );
    }, delay);
  }

  private notifyDisconnected(reason: string): void {
    for (const handler of [...this.disconnectHandlers]) {
      handler(reason);
    }
  }

  private notifyReconnectFailed(error: TransportError): void {
    this.log.error('giving up on reconnect', { attempts: this.reconnectAttempts });
    for (const handler of [...this.reconnectFailedHandlers]) {
      handler(error);
    }
  }

  private notifyReconnected(): void {
    for (const handler of [...this.reconnectHandlers]) {
      handler();
    }
  }

  private exhausted(lastError: unknown): TransportError {
    return new TransportError(
      `Connection lost after ${this.reconnectAttempts} reconnect attempts`,
      lastError instanceof Error ? { cause: lastError.message } : undefined,
    );
  }

  private closeSocket(): void {
    if (this.reconnectTimeoutId !== null) {
      clearTimeout(this.reconnectTimeoutId);
      this.reconnectTimeoutId = null;
    }
    const socket = this.socket;
    this.socket = null;
    if (socket) {
      socket.removeAllListeners();
      socket.offAny();
      socket.disconnect();
    }
  }
}
