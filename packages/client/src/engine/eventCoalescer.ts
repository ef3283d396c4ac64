import {
  isTerminalTaskStatus,
  type NormalizedEvent,
  type RawEvent,
  type RawEventOf,
  type TaskStatus,
} from '@pine-sdk/shared';

import { DEFAULT_ENGINE_CONFIG } from '../config';
import { CoalescenceTimeoutExceeded } from '../errors';
import { createConsoleLogger, type PineLogger } from '../logging';
import { MALFORMED_PAYLOAD_CODE, TRANSPORT_LOST_CODE } from '../transport/rawEvents';
import { KeyedDebouncer } from './keyedDebouncer';

export interface EventCoalescerOptions {
  sessionId: string;
  emit: (event: NormalizedEvent) => void;
  workLogDebounceMs?: number;
  /** Seal open text after this much silence. Unset means only a complete marker seals. */
  textIdleTimeoutMs?: number | undefined;
  coalescenceCeilingMs?: number;
  /**
   * When false no timers are armed: buffers are sealed only by complete
   * markers or `flushAll()`. Used to replay history.
   */
  timed?: boolean;
  now?: () => number;
  log?: PineLogger;
}

export interface PushContext {
  /** Mirror status before a `task_update` was applied. */
  previousTaskStatus?: TaskStatus;
}

interface TextBuffer {
  messageId: string | undefined;
  fragments: string[];
  openedAt: number;
}

interface WorkLogLine {
  lineId: string;
  messageId: string | undefined;
  text: string;
  status: string | undefined;
  data: Record<string, unknown> | undefined;
  updates: number;
  openedAt: number;
}

const TEXT_IDLE_KEY = 'text:idle';
const TEXT_CEILING_KEY = 'text:ceiling';
const SEALED_MESSAGE_MEMORY = 1000;

function workLogKey(lineId: string): string {
  return `work_log:${lineId}`;
}

/**
 * Per-session buffering. Text fragments are merged until a complete marker (or
 * the optional idle timeout) seals them; work-log parts are debounced per line.
 * Everything else passes straight through.
 */
export class EventCoalescer {
  private text: TextBuffer | null = null;
  private readonly lines = new Map<string, WorkLogLine>();
  private readonly sealedMessageIds = new Set<string>();
  private readonly timers: KeyedDebouncer;
  private readonly now: () => number;
  private readonly log: PineLogger;
  private readonly timed: boolean;
  private readonly workLogDebounceMs: number;
  private readonly textIdleTimeoutMs: number | undefined;
  private readonly ceilingMs: number;

  constructor(private readonly options: EventCoalescerOptions) {
    this.now = options.now ?? (() => Date.now());
    this.timers = new KeyedDebouncer(this.now);
    this.log = options.log ?? createConsoleLogger('pine-coalescer');
    this.timed = options.timed ?? true;
    this.workLogDebounceMs = options.workLogDebounceMs ?? DEFAULT_ENGINE_CONFIG.workLogDebounceMs;
    this.textIdleTimeoutMs = options.textIdleTimeoutMs;
    this.ceilingMs = options.coalescenceCeilingMs ?? DEFAULT_ENGINE_CONFIG.coalescenceCeilingMs;
  }

  push(raw: RawEvent, context: PushContext = {}): void {
    switch (raw.kind) {
      case 'text_part':
        this.appendText(raw, false);
        return;
      case 'text_complete':
        this.appendText(raw, true);
        return;
      case 'work_log_part':
        this.updateWorkLog(raw);
        return;
      case 'task_update':
        if (isTerminalTaskStatus(raw.payload.status)) {
          this.flushAll();
        }
        this.emitTaskUpdate(raw, context.previousTaskStatus ?? 'not_started');
        return;
      case 'ack':
        this.options.emit({
          ...this.base(raw.messageId),
          type: 'ack',
          data: {
            eventName: raw.eventName,
            data: raw.payload.data,
            ...(raw.payload.status ? { status: raw.payload.status } : {}),
          },
        });
        return;
      case 'form':
        this.options.emit({
          ...this.base(raw.messageId),
          type: 'form',
          data: { formKind: raw.payload.formKind, data: raw.payload.data },
        });
        return;
      case 'payment':
        this.options.emit({
          ...this.base(raw.messageId),
          type: 'payment',
          data: { paymentKind: raw.payload.paymentKind, data: raw.payload.data },
        });
        return;
      case 'error':
        this.options.emit({
          ...this.base(raw.messageId),
          type: 'error',
          data: {
            code: raw.payload.code,
            message: raw.payload.message,
            fatal: isFatalErrorCode(raw.payload.code),
            ...(raw.payload.data !== undefined ? { data: raw.payload.data } : {}),
          },
        });
        return;
      case 'system':
        this.options.emit({
          ...this.base(raw.messageId),
          type: 'system',
          data: { eventName: raw.eventName, data: raw.payload.data },
        });
        return;
    }
  }

  /** Text under this message id was completed, so new fragments are replays. */
  isSealed(messageId: string): boolean {
    return this.sealedMessageIds.has(messageId);
  }

  hasPending(): boolean {
    return this.text !== null || this.lines.size > 0;
  }

  /** Emit every open buffer now: text first, then work-log lines in first-armed order. */
  flushAll(): void {
    if (this.text) {
      this.sealText(true);
    }
    for (const lineId of [...this.lines.keys()]) {
      this.flushLine(lineId, true);
    }
  }

  suspend(): void {
    this.timers.suspend();
  }

  resume(): void {
    this.timers.resume();
  }

  /** Drop every buffer and timer without emitting. */
  dispose(): void {
    this.timers.cancelAll();
    this.text = null;
    this.lines.clear();
  }

  private base(messageId: string | undefined): {
    sessionId: string;
    emittedAt: number;
    messageId?: string;
  } {
    return {
      sessionId: this.options.sessionId,
      emittedAt: this.now(),
      ...(messageId ? { messageId } : {}),
    };
  }

  private appendText(
    raw: RawEventOf<'text_part'> | RawEventOf<'text_complete'>,
    complete: boolean,
  ): void {
    const { messageId } = raw;
    if (messageId && this.sealedMessageIds.has(messageId)) {
      this.log.debug('dropping text for sealed message', { messageId });
      return;
    }

    if (
      this.text &&
      messageId !== undefined &&
      this.text.messageId !== undefined &&
      this.text.messageId !== messageId
    ) {
      this.sealText(true);
    }

    let buffer = this.text;
    if (!buffer) {
      buffer = { messageId, fragments: [], openedAt: this.now() };
      this.text = buffer;
      if (this.timed) {
        this.timers.arm(TEXT_CEILING_KEY, this.ceilingMs, () => this.onTextCeiling());
      }
    } else if (buffer.messageId === undefined && messageId !== undefined) {
      buffer.messageId = messageId;
    }

    if (raw.payload.content) {
      buffer.fragments.push(raw.payload.content);
    }

    if (complete) {
      this.sealText(false);
      return;
    }
    if (this.timed && this.textIdleTimeoutMs !== undefined) {
      this.timers.arm(TEXT_IDLE_KEY, this.textIdleTimeoutMs, () => this.sealText(true));
    }
  }

  private onTextCeiling(): void {
    if (!this.text) return;
    this.log.warn(new CoalescenceTimeoutExceeded('text', this.now() - this.text.openedAt).message);
    this.sealText(true);
  }

  private sealText(partial: boolean): void {
    const buffer = this.text;
    if (!buffer) return;
    this.text = null;
    this.timers.cancel(TEXT_IDLE_KEY);
    this.timers.cancel(TEXT_CEILING_KEY);
    // A partial seal leaves the message open: later fragments start a new buffer.
    if (buffer.messageId && !partial) {
      this.rememberSealed(buffer.messageId);
    }
    this.options.emit({
      ...this.base(buffer.messageId),
      type: 'text',
      data: {
        content: buffer.fragments.join(''),
        fragments: buffer.fragments.length,
        partial,
      },
    });
  }

  private rememberSealed(messageId: string): void {
    this.sealedMessageIds.add(messageId);
    if (this.sealedMessageIds.size > SEALED_MESSAGE_MEMORY) {
      const oldest = this.sealedMessageIds.values().next();
      if (!oldest.done) {
        this.sealedMessageIds.delete(oldest.value);
      }
    }
  }

  private updateWorkLog(raw: RawEventOf<'work_log_part'>): void {
    const { lineId } = raw.payload;
    let line = this.lines.get(lineId);
    if (!line) {
      line = {
        lineId,
        messageId: raw.messageId,
        text: '',
        status: undefined,
        data: undefined,
        updates: 0,
        openedAt: this.now(),
      };
      this.lines.set(lineId, line);
    }

    if (raw.payload.text !== undefined) {
      line.text = raw.payload.text;
    } else if (raw.payload.textDelta) {
      line.text += raw.payload.textDelta;
    }
    if (raw.payload.status) {
      line.status = raw.payload.status;
    }
    if (raw.payload.data) {
      line.data = { ...line.data, ...raw.payload.data };
    }
    if (raw.messageId) {
      line.messageId = raw.messageId;
    }
    line.updates += 1;

    if (!this.timed) {
      return;
    }
    const openForMs = this.now() - line.openedAt;
    if (openForMs >= this.ceilingMs) {
      this.log.warn(new CoalescenceTimeoutExceeded(workLogKey(lineId), openForMs).message);
      this.flushLine(lineId, true);
      return;
    }
    this.timers.arm(workLogKey(lineId), this.workLogDebounceMs, () => this.flushLine(lineId, false));
  }

  private flushLine(lineId: string, partial: boolean): void {
    const line = this.lines.get(lineId);
    if (!line) return;
    this.lines.delete(lineId);
    this.timers.cancel(workLogKey(lineId));
    this.options.emit({
      ...this.base(line.messageId),
      type: 'work_log',
      data: {
        lineId,
        text: line.text,
        updates: line.updates,
        partial,
        ...(line.status ? { status: line.status } : {}),
        ...(line.data ? { data: line.data } : {}),
      },
    });
  }

  private emitTaskUpdate(raw: RawEventOf<'task_update'>, previousStatus: TaskStatus): void {
    const { taskId, status, data } = raw.payload;
    if (raw.payload.normalizedType === 'task_ready') {
      this.options.emit({
        ...this.base(raw.messageId),
        type: 'task_ready',
        data: { taskId, status, data },
      });
      return;
    }
    this.options.emit({
      ...this.base(raw.messageId),
      type: 'task_update',
      data: { taskId, status, previousStatus, data },
    });
  }
}

export function isFatalErrorCode(code: string): boolean {
  return code === MALFORMED_PAYLOAD_CODE || code === TRANSPORT_LOST_CODE;
}
