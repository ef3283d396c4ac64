import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { NormalizedEvent, RawEvent, RawEventBase, TaskStatus } from '@pine-sdk/shared';

import { EventCoalescer, type EventCoalescerOptions } from './eventCoalescer';

let sequence = 0;

function baseOf(eventName: string, extra: Partial<RawEventBase> = {}): RawEventBase {
  sequence += 1;
  return {
    sessionId: 'S1',
    eventName,
    sequenceHint: sequence,
    connectionEpoch: 1,
    receivedAt: Date.now(),
    ...extra,
  };
}

function textPart(content: string, extra: Partial<RawEventBase> = {}): RawEvent {
  return { ...baseOf('session:text_part', extra), kind: 'text_part', payload: { content } };
}

function textComplete(content: string, extra: Partial<RawEventBase> = {}): RawEvent {
  return { ...baseOf('session:text_part', extra), kind: 'text_complete', payload: { content } };
}

function workLogPart(lineId: string, textDelta: string, status?: string): RawEvent {
  return {
    ...baseOf('session:work_log_part'),
    kind: 'work_log_part',
    payload: { lineId, textDelta, ...(status ? { status } : {}) },
  };
}

function taskUpdate(status: TaskStatus): RawEvent {
  return {
    ...baseOf('session:task_finished'),
    kind: 'task_update',
    payload: { taskId: 't1', status, normalizedType: 'task_update', data: {} },
  };
}

function createCoalescer(overrides: Partial<EventCoalescerOptions> = {}) {
  const events: NormalizedEvent[] = [];
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const coalescer = new EventCoalescer({
    sessionId: 'S1',
    emit: (event) => events.push(event),
    workLogDebounceMs: 3000,
    log,
    ...overrides,
  });
  return { coalescer, events, log };
}

describe('EventCoalescer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('text', () => {
    it('merges fragments into one event when the complete marker arrives', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(textPart('Hel'));
      coalescer.push(textPart('lo '));
      coalescer.push(textPart('world'));
      expect(events).toEqual([]);

      coalescer.push(textComplete(''));
      expect(events).toHaveLength(1);
      expect(events[0]).toEqual({
        sessionId: 'S1',
        emittedAt: 0,
        type: 'text',
        data: { content: 'Hello world', fragments: 3, partial: false },
      });
      expect(coalescer.hasPending()).toBe(false);
    });

    it('appends content carried by the complete marker', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(textPart('Good '));
      coalescer.push(textComplete('morning'));

      expect(events.map((event) => event.data)).toEqual([
        { content: 'Good morning', fragments: 2, partial: false },
      ]);
    });

    it('opens a new buffer after sealing', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(textComplete('first'));
      coalescer.push(textPart('sec'));
      coalescer.push(textComplete('ond'));

      expect(events.map((event) => (event.type === 'text' ? event.data.content : ''))).toEqual([
        'first',
        'second',
      ]);
    });

    it('seals the open buffer when a different message starts', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(textPart('one', { messageId: 'm1' }));
      coalescer.push(textPart('two', { messageId: 'm2' }));

      expect(events).toEqual([
        {
          sessionId: 'S1',
          emittedAt: 0,
          messageId: 'm1',
          type: 'text',
          data: { content: 'one', fragments: 1, partial: true },
        },
      ]);
      expect(coalescer.hasPending()).toBe(true);
    });

    it('drops fragments for a message that was already sealed', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(textComplete('done', { messageId: 'm1' }));
      coalescer.push(textPart('done', { messageId: 'm1' }));

      expect(events).toHaveLength(1);
      expect(coalescer.hasPending()).toBe(false);
      expect(coalescer.isSealed('m1')).toBe(true);
    });

    it('never seals on silence unless an idle timeout is configured', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(textPart('waiting'));
      vi.advanceTimersByTime(60_000);

      expect(events).toEqual([]);
    });

    it('seals as partial after the idle timeout', () => {
      const { coalescer, events } = createCoalescer({ textIdleTimeoutMs: 2000 });

      coalescer.push(textPart('a'));
      vi.advanceTimersByTime(1500);
      coalescer.push(textPart('b'));
      vi.advanceTimersByTime(1999);
      expect(events).toEqual([]);

      vi.advanceTimersByTime(1);
      expect(events.map((event) => event.data)).toEqual([
        { content: 'ab', fragments: 2, partial: true },
      ]);
    });

    it('flushes a buffer held past the safety ceiling', () => {
      const { coalescer, events, log } = createCoalescer({ coalescenceCeilingMs: 10_000 });

      coalescer.push(textPart('stuck'));
      vi.advanceTimersByTime(10_000);

      expect(events.map((event) => event.data)).toEqual([
        { content: 'stuck', fragments: 1, partial: true },
      ]);
      expect(log.warn).toHaveBeenCalledWith(
        'Buffer text was open for 10000ms and was flushed as a partial event',
      );
    });

    it('keeps the message open after an idle seal', () => {
      const { coalescer, events } = createCoalescer({ textIdleTimeoutMs: 1000 });

      coalescer.push(textPart('Hel', { messageId: 'm1' }));
      vi.advanceTimersByTime(1500);
      expect(coalescer.isSealed('m1')).toBe(false);

      coalescer.push(textPart('lo ', { messageId: 'm1' }));
      coalescer.push(textPart('world', { messageId: 'm1' }));
      coalescer.push(textComplete('', { messageId: 'm1' }));

      expect(events.map((event) => event.data)).toEqual([
        { content: 'Hel', fragments: 1, partial: true },
        { content: 'lo world', fragments: 2, partial: false },
      ]);
      expect(coalescer.isSealed('m1')).toBe(true);
    });

    it('keeps the message open after a ceiling flush', () => {
      const { coalescer, events } = createCoalescer({ coalescenceCeilingMs: 5000 });

      coalescer.push(textPart('Hel', { messageId: 'm1' }));
      vi.advanceTimersByTime(5000);
      coalescer.push(textComplete('lo', { messageId: 'm1' }));

      expect(events.map((event) => event.data)).toEqual([
        { content: 'Hel', fragments: 1, partial: true },
        { content: 'lo', fragments: 1, partial: false },
      ]);
      expect(coalescer.hasPending()).toBe(false);
    });
  });

  describe('work log', () => {
    it('emits one event after the quiet period with the latest state', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(workLogPart('step1', 'Search', 'running'));
      vi.advanceTimersByTime(1000);
      coalescer.push(workLogPart('step1', 'ing'));
      vi.advanceTimersByTime(1000);
      coalescer.push(workLogPart('step1', ' done', 'done'));

      vi.advanceTimersByTime(2999);
      expect(events).toEqual([]);

      vi.advanceTimersByTime(1);
      expect(events).toEqual([
        {
          sessionId: 'S1',
          emittedAt: 5000,
          type: 'work_log',
          data: {
            lineId: 'step1',
            text: 'Searching done',
            status: 'done',
            updates: 3,
            partial: false,
          },
        },
      ]);
    });

    it('replaces the line text on a snapshot', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(workLogPart('step1', 'draft'));
      coalescer.push({
        ...baseOf('session:work_log'),
        kind: 'work_log_part',
        payload: { lineId: 'step1', text: 'Final title', status: 'done' },
      });
      vi.advanceTimersByTime(3000);

      expect(events.map((event) => event.data)).toEqual([
        { lineId: 'step1', text: 'Final title', status: 'done', updates: 2, partial: false },
      ]);
    });

    it('debounces distinct lines independently', () => {
      const { coalescer, events } = createCoalescer();
      const emittedLines = () =>
        events.map((event) => (event.type === 'work_log' ? event.data.lineId : event.type));

      coalescer.push(workLogPart('step1', 'a'));
      vi.advanceTimersByTime(1000);
      coalescer.push(workLogPart('step2', 'b'));
      vi.advanceTimersByTime(1000);
      coalescer.push(workLogPart('step1', 'c'));

      vi.advanceTimersByTime(2000);
      expect(emittedLines()).toEqual(['step2']);

      vi.advanceTimersByTime(1000);
      expect(emittedLines()).toEqual(['step2', 'step1']);
      expect(events.map((event) => event.emittedAt)).toEqual([4000, 5000]);
    });

    it('flushes a line that keeps changing past the ceiling', () => {
      const { coalescer, events, log } = createCoalescer({ coalescenceCeilingMs: 5000 });

      for (let i = 0; i < 5; i += 1) {
        coalescer.push(workLogPart('busy', '.'));
        vi.advanceTimersByTime(1000);
      }
      expect(events).toEqual([]);

      coalescer.push(workLogPart('busy', '.'));
      expect(events.map((event) => event.data)).toEqual([
        { lineId: 'busy', text: '......', updates: 6, partial: true },
      ]);
      expect(log.warn).toHaveBeenCalledTimes(1);
    });

    it('freezes debounce timers while suspended', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(workLogPart('step1', 'a'));
      vi.advanceTimersByTime(1000);
      coalescer.suspend();
      vi.advanceTimersByTime(30_000);
      expect(events).toEqual([]);

      coalescer.resume();
      vi.advanceTimersByTime(2000);
      expect(events).toHaveLength(1);
    });
  });

  describe('pass-through', () => {
    it('does not flush unrelated buffers', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(textPart('Hi'));
      coalescer.push({
        ...baseOf('session:message_status'),
        kind: 'ack',
        payload: { status: 'received', data: { status: 'received' } },
      });

      expect(events).toEqual([
        {
          sessionId: 'S1',
          emittedAt: 0,
          type: 'ack',
          data: { eventName: 'session:message_status', status: 'received', data: { status: 'received' } },
        },
      ]);
      expect(coalescer.hasPending()).toBe(true);
    });

    it('flushes open buffers before a terminal task update', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(textPart('Booking'));
      coalescer.push(workLogPart('step1', 'Calling'));
      coalescer.push(taskUpdate('completed'), { previousTaskStatus: 'running' });

      expect(events.map((event) => event.type)).toEqual(['text', 'work_log', 'task_update']);
      expect(events[0]?.data).toEqual({ content: 'Booking', fragments: 1, partial: true });
      expect(events[2]?.data).toEqual({
        taskId: 't1',
        status: 'completed',
        previousStatus: 'running',
        data: {},
      });

      vi.advanceTimersByTime(10_000);
      expect(events).toHaveLength(3);
    });

    it('keeps buffers open across a non-terminal task update', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(workLogPart('step1', 'Calling'));
      coalescer.push(taskUpdate('running'));

      expect(events.map((event) => event.type)).toEqual(['task_update']);
      expect(coalescer.hasPending()).toBe(true);
    });

    it('maps task confirmations to task_ready', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push({
        ...baseOf('session:task_ready'),
        kind: 'task_update',
        payload: {
          taskId: 't1',
          status: 'awaiting_confirmation',
          normalizedType: 'task_ready',
          data: { required: 5 },
        },
      });

      expect(events).toEqual([
        {
          sessionId: 'S1',
          emittedAt: 0,
          type: 'task_ready',
          data: { taskId: 't1', status: 'awaiting_confirmation', data: { required: 5 } },
        },
      ]);
    });

    it('marks malformed payload errors as fatal', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push({
        ...baseOf('session:text_part'),
        kind: 'error',
        payload: { code: 'malformed_payload', message: 'bad' },
      });
      coalescer.push({
        ...baseOf('session:error'),
        kind: 'error',
        payload: { code: 'rate_limited', message: 'slow down' },
      });

      expect(events.map((event) => (event.type === 'error' ? event.data.fatal : null))).toEqual([
        true,
        false,
      ]);
    });
  });

  describe('flushAll', () => {
    it('emits text first, then lines in first-armed order', () => {
      const { coalescer, events } = createCoalescer();

      coalescer.push(workLogPart('b', '2'));
      coalescer.push(workLogPart('a', '1'));
      coalescer.push(textPart('tail'));
      coalescer.push(workLogPart('b', '3'));
      coalescer.flushAll();

      expect(
        events.map((event) => (event.type === 'work_log' ? event.data.lineId : event.type)),
      ).toEqual(['text', 'b', 'a']);

      vi.advanceTimersByTime(10_000);
      expect(events).toHaveLength(3);
    });

    it('only seals on markers or flushAll when untimed', () => {
      const { coalescer, events } = createCoalescer({ timed: false, textIdleTimeoutMs: 10 });

      coalescer.push(workLogPart('step1', 'x'));
      coalescer.push(textPart('y'));
      vi.advanceTimersByTime(200_000);
      expect(events).toEqual([]);

      coalescer.flushAll();
      expect(events.map((event) => event.type)).toEqual(['text', 'work_log']);
    });
  });
});
