import type { RawEvent } from '@pine-sdk/shared';

import type { TransportError } from '../errors';

export interface SendOptions {
  sessionId?: string | undefined;
  messageId?: string | undefined;
}

export interface RequestOptions extends SendOptions {
  timeoutMs?: number;
}

export type Unsubscribe = () => void;

/**
 * One physical bidirectional connection shared by every joined session.
 * Delivery is in order within one connection; nothing is guaranteed across a
 * reconnect.
 */
export interface TransportChannel {
  readonly connected: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Drop the current connection and retry with backoff until one succeeds. */
  reconnect(): Promise<void>;
  send(eventType: string, data: unknown, options?: SendOptions): void;
  /**
   * Emit and resolve with the `data` of the first non-user reply that matches
   * the request id or, failing that, the session id.
   */
  request(eventType: string, data: unknown, options?: RequestOptions): Promise<unknown>;
  onRawEvent(handler: (event: RawEvent) => void): Unsubscribe;
  onDisconnect(handler: (reason: string) => void): Unsubscribe;
  onReconnect(handler: () => void): Unsubscribe;
  onReconnectFailed(handler: (error: TransportError) => void): Unsubscribe;
}
