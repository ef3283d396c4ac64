import type { RawEvent } from '@pine-sdk/shared';

import { UnknownSessionError, type TransportError } from '../errors';
import { createConsoleLogger, type PineLogger } from '../logging';
import type { SessionStream } from './sessionStream';

export interface SessionRouterOptions {
  createStream: (sessionId: string) => SessionStream;
  log?: PineLogger;
}

/**
 * Dispatch table from session id to stream. Streams are created lazily the
 * first time a joined session is looked up or receives an event.
 */
export class SessionRouter {
  private readonly joined = new Set<string>();
  private readonly streams = new Map<string, SessionStream>();
  private readonly log: PineLogger;

  constructor(private readonly options: SessionRouterOptions) {
    this.log = options.log ?? createConsoleLogger('pine-router');
  }

  join(sessionId: string): void {
    this.joined.add(sessionId);
  }

  isJoined(sessionId: string): boolean {
    return this.joined.has(sessionId);
  }

  get(sessionId: string): SessionStream | undefined {
    if (!this.joined.has(sessionId)) {
      return undefined;
    }
    let stream = this.streams.get(sessionId);
    if (!stream || stream.closed) {
      stream = this.options.createStream(sessionId);
      this.streams.set(sessionId, stream);
    }
    return stream;
  }

  /** Close and forget the session. Returns the stream that was closed, if any. */
  leave(sessionId: string): SessionStream | undefined {
    this.joined.delete(sessionId);
    const stream = this.streams.get(sessionId);
    this.streams.delete(sessionId);
    stream?.close();
    return stream;
  }

  route(raw: RawEvent): boolean {
    const stream = this.get(raw.sessionId);
    if (!stream) {
      const error = new UnknownSessionError(raw.sessionId);
      this.log.debug(error.message, { eventName: raw.eventName });
      return false;
    }
    stream.accept(raw);
    return true;
  }

  joinedSessionIds(): string[] {
    return Array.from(this.joined);
  }

  get size(): number {
    return this.joined.size;
  }

  suspendAll(): void {
    for (const stream of this.streams.values()) {
      stream.suspend();
    }
  }

  resumeAll(): void {
    for (const stream of this.streams.values()) {
      stream.resume();
    }
  }

  /** Surface a terminal error on every stream and forget all sessions. */
  failAll(error: TransportError): void {
    for (const stream of this.streams.values()) {
      stream.fail(error);
    }
    this.streams.clear();
    this.joined.clear();
  }

  closeAll(): void {
    for (const sessionId of this.joinedSessionIds()) {
      this.leave(sessionId);
    }
  }
}
