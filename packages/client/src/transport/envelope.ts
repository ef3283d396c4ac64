import { randomUUID } from 'node:crypto';

import type { MessageEnvelope } from '@pine-sdk/shared';

export interface EnvelopeOptions {
  userId: string;
  deviceId: string;
  sessionId?: string | undefined;
  messageId?: string | undefined;
  requestId?: string | undefined;
  isVolatile?: boolean;
  now?: () => Date;
}

/**
 * Wrap client data in the envelope every client-to-server event carries.
 */
export function buildEnvelope(
  eventType: string,
  data: unknown,
  options: EnvelopeOptions,
): MessageEnvelope {
  const now = options.now ?? (() => new Date());
  return {
    metadata: {
      event_id: randomUUID(),
      request_id: options.requestId ?? randomUUID(),
      timestamp: now().toISOString(),
      source: {
        role: 'user',
        user_id: options.userId,
        device_id: options.deviceId,
      },
      is_volatile: options.isVolatile ?? false,
    },
    type: eventType,
    payload: {
      session_id: options.sessionId ?? null,
      message_id: options.messageId ?? null,
      type: eventType,
      data,
    },
  };
}
