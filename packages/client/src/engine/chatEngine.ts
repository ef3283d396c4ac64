import {
  ClientEvent,
  safeValidateHistoryResponse,
  type HistoryMessage,
  type HistoryRequest,
  type NormalizedEvent,
} from '@pine-sdk/shared';

import type { EngineConfig } from '../config';
import { SessionError, isPineError, type TransportError } from '../errors';
import { createConsoleLogger, type PineLogger } from '../logging';
import { MALFORMED_PAYLOAD_CODE, decodeServerEvent } from '../transport/rawEvents';
import type { TransportChannel, Unsubscribe } from '../transport/types';
import { SessionRouter } from './sessionRouter';
import { SessionStream, type ConsumeMode } from './sessionStream';

export interface ChatEngineOptions {
  transport: TransportChannel;
  engine?: Partial<EngineConfig>;
  includeSystemEvents?: boolean;
  log?: PineLogger;
}

export interface StreamOptions {
  signal?: AbortSignal;
}

export interface ChatOptions extends StreamOptions {
  attachments?: Array<Record<string, unknown>>;
  referencedSessions?: Array<Record<string, string>>;
  /** Structured action, such as a suggested-reply button the user picked. */
  action?: Record<string, unknown>;
}

export interface HistoryOptions {
  maxMessages?: number;
  maxBytes?: number;
  order?: 'asc' | 'desc';
  fromMessageId?: string;
  requestWorkLog?: boolean;
}

export const DEFAULT_HISTORY_MAX_MESSAGES = 30;
export const DEFAULT_HISTORY_MAX_BYTES = 5 * 1024 * 1024;

/**
 * Connects the transport to the per-session streams and exposes the caller
 * facing generators.
 */
export class ChatEngine {
  private readonly router: SessionRouter;
  private readonly log: PineLogger;
  private readonly disposers: Unsubscribe[] = [];
  /** Bumped on every disconnect so a stale rejoin does not resume timers. */
  private disconnectCount = 0;

  constructor(private readonly options: ChatEngineOptions) {
    this.log = options.log ?? createConsoleLogger('pine-chat');
    this.router = new SessionRouter({
      createStream: (sessionId) => this.createStream(sessionId),
      log: this.log,
    });

    const { transport } = options;
    this.disposers.push(
      transport.onRawEvent((event) => {
        this.router.route(event);
      }),
      transport.onDisconnect((reason) => {
        this.log.warn('transport disconnected, suspending timers', { reason });
        this.disconnectCount += 1;
        this.router.suspendAll();
      }),
      transport.onReconnect(() => {
        this.handleReconnected().catch((err: unknown) => {
          this.log.error('failed to restore sessions after reconnect', err);
        });
      }),
      transport.onReconnectFailed((error) => this.handleReconnectFailed(error)),
    );
  }

  isJoined(sessionId: string): boolean {
    return this.router.isJoined(sessionId);
  }

  joinedSessionIds(): string[] {
    return this.router.joinedSessionIds();
  }

  async joinSession(sessionId: string): Promise<unknown> {
    this.router.join(sessionId);
    try {
      return await this.options.transport.request(ClientEvent.SessionJoin, null, { sessionId });
    } catch (err) {
      this.router.leave(sessionId);
      const message = err instanceof Error ? err.message : String(err);
      throw new SessionError(`Failed to join session ${sessionId}: ${message}`, 'join_failed');
    }
  }

  leaveSession(sessionId: string): void {
    this.router.leave(sessionId);
    if (this.options.transport.connected) {
      this.options.transport.send(ClientEvent.SessionLeave, null, { sessionId });
    }
  }

  /** Send a chat message without consuming the reply. */
  sendMessage(sessionId: string, content: string, options: ChatOptions = {}): void {
    const stream = this.requireStream(sessionId);
    this.options.transport.send(
      ClientEvent.SessionMessage,
      {
        content,
        attachments: options.attachments ?? [],
        referenced_sessions: options.referencedSessions ?? [],
        client_now_date: new Date().toISOString(),
        ...(options.action ? { action: options.action } : {}),
      },
      { sessionId },
    );
    stream.markMessageSent();
  }

  /** Send a reply event, such as a form submission, on a joined session. */
  sendReply(sessionId: string, eventType: string, data: unknown, messageId?: string): void {
    const stream = this.requireStream(sessionId);
    this.options.transport.send(eventType, data, { sessionId, messageId });
    stream.markMessageSent();
  }

  /** Send `content` and yield the reply until the turn completes. */
  async *chat(
    sessionId: string,
    content: string,
    options: ChatOptions = {},
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    const stream = this.requireStream(sessionId);
    const release = stream.attachConsumer();
    try {
      this.sendMessage(sessionId, content, options);
      yield* this.consume(stream, 'turn', options.signal);
    } finally {
      release();
    }
  }

  /** Yield the current turn without sending anything. */
  async *listen(
    sessionId: string,
    options: StreamOptions = {},
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    const stream = this.requireStream(sessionId);
    const release = stream.attachConsumer();
    try {
      stream.beginTurn();
      yield* this.consume(stream, 'turn', options.signal);
    } finally {
      release();
    }
  }

  /** Yield every event until the stream is cancelled or the session left. */
  async *subscribe(
    sessionId: string,
    options: StreamOptions = {},
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    const stream = this.requireStream(sessionId);
    const release = stream.attachConsumer();
    try {
      yield* this.consume(stream, 'persistent', options.signal);
    } finally {
      release();
    }
  }

  /**
   * Replay stored messages through an untimed stream. Events come back in
   * chronological order unless `order` is `desc`.
   */
  async *getHistory(
    sessionId: string,
    options: HistoryOptions = {},
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    const order = options.order ?? 'desc';
    const request: HistoryRequest = {
      max_messages: options.maxMessages ?? DEFAULT_HISTORY_MAX_MESSAGES,
      max_bytes: options.maxBytes ?? DEFAULT_HISTORY_MAX_BYTES,
      order,
      from_message_id: options.fromMessageId ?? null,
      request_work_log: options.requestWorkLog ?? false,
    };
    const response = await this.options.transport.request(ClientEvent.SessionHistory, request, {
      sessionId,
    });

    const parsed = safeValidateHistoryResponse(response);
    if (!parsed.success) {
      yield {
        sessionId,
        emittedAt: Date.now(),
        type: 'error',
        data: {
          code: MALFORMED_PAYLOAD_CODE,
          message: `Malformed history response: ${parsed.error.message}`,
          fatal: true,
          data: response,
        },
      };
      return;
    }

    const events = replayHistory(sessionId, parsed.data.messages, order, {
      ...(this.options.includeSystemEvents !== undefined
        ? { includeSystemEvents: this.options.includeSystemEvents }
        : {}),
      log: this.log,
    });
    for (const event of order === 'desc' ? events.reverse() : events) {
      yield event;
    }
  }

  /**
   * Flush and close the session's stream, then leave it. The transport is
   * disconnected when no joined session remains.
   */
  async cancel(sessionId: string): Promise<void> {
    const stream = this.router.get(sessionId);
    stream?.close();
    this.leaveSession(sessionId);
    if (this.router.size === 0 && this.options.transport.connected) {
      this.log.debug('last session cancelled, disconnecting');
      await this.options.transport.disconnect();
    }
  }

  inconsistencyCount(sessionId: string): number {
    return this.router.get(sessionId)?.inconsistencyCount ?? 0;
  }

  stream(sessionId: string): SessionStream | undefined {
    return this.router.get(sessionId);
  }

  dispose(): void {
    for (const dispose of this.disposers.splice(0)) {
      dispose();
    }
    this.router.closeAll();
  }

  private createStream(sessionId: string): SessionStream {
    return new SessionStream({
      sessionId,
      log: this.log,
      ...(this.options.engine ? { engine: this.options.engine } : {}),
      ...(this.options.includeSystemEvents !== undefined
        ? { includeSystemEvents: this.options.includeSystemEvents }
        : {}),
    });
  }

  private requireStream(sessionId: string): SessionStream {
    const stream = this.router.get(sessionId);
    if (!stream) {
      throw new SessionError(`Session ${sessionId} has not been joined`, 'not_joined');
    }
    return stream;
  }

  private async *consume(
    stream: SessionStream,
    mode: ConsumeMode,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<NormalizedEvent, void, undefined> {
    const onAbort = () => {
      this.cancel(stream.sessionId).catch((err: unknown) => {
        this.log.error('cancel failed', err);
      });
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      for (;;) {
        const event = await stream.next(mode);
        if (!event) {
          return;
        }
        yield event;
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async handleReconnected(): Promise<void> {
    const generation = this.disconnectCount;
    const sessionIds = this.router.joinedSessionIds();
    this.log.info('reconnected, rejoining sessions', { count: sessionIds.length });
    for (const sessionId of sessionIds) {
      try {
        await this.options.transport.request(ClientEvent.SessionJoin, null, { sessionId });
      } catch (err) {
        this.log.warn('failed to rejoin session', {
          sessionId,
          error: isPineError(err) ? err.code : String(err),
        });
      }
    }
    if (generation !== this.disconnectCount || !this.options.transport.connected) {
      this.log.debug('connection dropped during rejoin, timers stay suspended');
      return;
    }
    this.router.resumeAll();
  }

  private handleReconnectFailed(error: TransportError): void {
    this.log.error('reconnect attempts exhausted', { error: error.message });
    this.router.failAll(error);
  }
}

export interface ReplayOptions {
  includeSystemEvents?: boolean;
  log?: PineLogger;
}

/** Run stored history messages through an untimed session stream. */
export function replayHistory(
  sessionId: string,
  messages: HistoryMessage[],
  order: 'asc' | 'desc',
  options: ReplayOptions = {},
): NormalizedEvent[] {
  const stream = new SessionStream({
    sessionId,
    timed: false,
    ...(options.includeSystemEvents !== undefined
      ? { includeSystemEvents: options.includeSystemEvents }
      : {}),
    ...(options.log ? { log: options.log } : {}),
  });
  const chronological = order === 'desc' ? [...messages].reverse() : messages;
  const receivedAt = Date.now();

  chronological.forEach((message, index) => {
    const raws = decodeServerEvent(
      {
        eventName: message.type,
        sessionId,
        messageId: message.message_id,
        eventId: message.metadata?.event_id,
        data: message.data,
      },
      { sequenceHint: index + 1, connectionEpoch: 0, receivedAt },
    );
    for (const raw of raws) {
      stream.accept(raw);
    }
  });
  stream.flush();
  return stream.drain();
}
