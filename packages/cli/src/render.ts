import { PineClient } from '@pine-sdk/client';
import type { NormalizedEvent } from '@pine-sdk/shared';

function field(value: unknown, key: string): string | undefined {
  if (!value || typeof value !== 'object' || !(key in value)) {
    return undefined;
  }
  const entry: unknown = Reflect.get(value, key);
  return typeof entry === 'string' && entry.length > 0 ? entry : undefined;
}

/**
 * One human-readable line per event. Acks return undefined and are not printed.
 */
export function formatEvent(event: NormalizedEvent): string | undefined {
  switch (event.type) {
    case 'ack':
      return undefined;
    case 'text':
      return event.data.partial ? `${event.data.content} […]` : event.data.content;
    case 'work_log': {
      const status = event.data.status ? ` (${event.data.status})` : '';
      return `[work] ${event.data.text}${status}`;
    }
    case 'form': {
      const message = field(event.data.data, 'message_to_user');
      return message ? `[${event.data.formKind}] ${message}` : `[${event.data.formKind}]`;
    }
    case 'task_ready':
      return `[task ${event.data.taskId}] ready, waiting for confirmation`;
    case 'task_update':
      return `[task ${event.data.taskId}] ${event.data.previousStatus} -> ${event.data.status}`;
    case 'payment': {
      const message =
        field(event.data.data, 'message') ??
        field(event.data.data, 'content') ??
        event.data.paymentKind;
      return `[${event.data.paymentKind}] ${message} (${PineClient.sessionUrl(event.sessionId)})`;
    }
    case 'error':
      return `[error ${event.data.code}] ${event.data.message}`;
    case 'system':
      return `[${event.data.eventName}]`;
  }
}
