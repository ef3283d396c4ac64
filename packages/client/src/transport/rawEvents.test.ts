import { describe, expect, it } from 'vitest';

import type { RawEvent } from '@pine-sdk/shared';

import { buildEnvelope } from './envelope';
import { decodeServerEvent, envelopeToDecodeInput, type DecodeInput } from './rawEvents';

const context = { sequenceHint: 4, connectionEpoch: 2, receivedAt: 1000 };

function decode(eventName: string, data: unknown, extra: Partial<DecodeInput> = {}): RawEvent[] {
  return decodeServerEvent({ eventName, sessionId: 'S1', data, ...extra }, context);
}

function only(events: RawEvent[]): RawEvent {
  expect(events).toHaveLength(1);
  const [event] = events;
  if (!event) throw new Error('expected one event');
  return event;
}

describe('decodeServerEvent', () => {
  it('ignores messages that carry no session id', () => {
    expect(decode('session:text', { content: 'hi' }, { sessionId: null })).toEqual([]);
  });

  it('tags text fragments with where and when they arrived', () => {
    expect(
      decode('session:text_part', { content: 'Hel' }, { eventId: 'e1', messageId: 'm1' }),
    ).toEqual([
      {
        sessionId: 'S1',
        eventName: 'session:text_part',
        sequenceHint: 4,
        connectionEpoch: 2,
        receivedAt: 1000,
        eventId: 'e1',
        messageId: 'm1',
        kind: 'text_part',
        payload: { content: 'Hel' },
      },
    ]);
  });

  it('treats a final fragment and a full text message as complete', () => {
    expect(only(decode('session:text_part', { content: 'lo', final: true })).kind).toBe(
      'text_complete',
    );
    expect(only(decode('session:text', { content: 'Hello' }))).toMatchObject({
      kind: 'text_complete',
      payload: { content: 'Hello' },
    });
  });

  it('maps a work log delta onto its line', () => {
    expect(
      only(
        decode('session:work_log_part', {
          step_id: 'step1',
          text_delta: 'Calling',
          status: 'running',
          data_delta: { phone: 'redacted' },
        }),
      ),
    ).toMatchObject({
      kind: 'work_log_part',
      payload: {
        lineId: 'step1',
        textDelta: 'Calling',
        status: 'running',
        data: { phone: 'redacted' },
      },
    });
  });

  it('expands a work log snapshot into one part per step', () => {
    const events = decode(
      'session:work_log',
      {
        steps: [
          { id: 'a', step_title: 'Search', step_details: 'Searching providers', status: 'done' },
          { id: 'b', step_title: 'Call' },
        ],
      },
      { eventId: 'e1' },
    );

    expect(events.map((event) => event.eventId)).toEqual(['e1#0', 'e1#1']);
    expect(events.map((event) => event.payload)).toEqual([
      {
        lineId: 'a',
        text: 'Searching providers',
        status: 'done',
        data: {
          id: 'a',
          step_type: '',
          step_title: 'Search',
          step_details: 'Searching providers',
          status: 'done',
        },
      },
      {
        lineId: 'b',
        text: 'Call',
        data: { id: 'b', step_type: '', step_title: 'Call', status: '' },
      },
    ]);
  });

  it('maps every form-like request to a form kind', () => {
    expect(
      only(decode('session:form_to_user', { message_to_user: 'Account number?' })).payload,
    ).toEqual({
      formKind: 'form',
      data: { message_to_user: 'Account number?' },
    });
    expect(only(decode('session:ask_for_location', { reason: 'nearby' })).payload).toEqual({
      formKind: 'location',
      data: { reason: 'nearby' },
    });
    expect(only(decode('session:three_way_call', {})).payload).toMatchObject({
      formKind: 'three_way_call',
    });
  });

  it('turns a payload that fails its schema into a malformed_payload error', () => {
    const event = only(decode('session:form_to_user', { message_to_user: 42 }));

    expect(event.kind).toBe('error');
    if (event.kind !== 'error') return;
    expect(event.payload.code).toBe('malformed_payload');
    expect(event.payload.message).toMatch(/^Malformed session:form_to_user payload: /);
    expect(event.payload.data).toEqual({ message_to_user: 42 });
  });

  it('marks task_ready as awaiting confirmation', () => {
    expect(only(decode('session:task_ready', { task_id: 't1', required: 5 })).payload).toEqual({
      taskId: 't1',
      status: 'awaiting_confirmation',
      normalizedType: 'task_ready',
      data: { task_id: 't1', required: 5, confirmed: false },
    });
  });

  it('normalizes task_finished statuses and falls back to the session id', () => {
    const success = only(decode('session:task_finished', { status: 'Success' }));
    expect(success.payload).toMatchObject({ taskId: 'S1', status: 'completed' });

    const canceled = only(decode('session:task_finished', { task_id: 't1', status: 'canceled' }));
    expect(canceled.payload).toMatchObject({ taskId: 't1', status: 'cancelled' });

    const unknown = only(decode('session:task_finished', { status: 'weird' }));
    expect(unknown.payload).toMatchObject({ status: 'completed' });
  });

  it('reads task progress out of session:state', () => {
    expect(only(decode('session:state', { content: 'task_started' })).payload).toMatchObject({
      taskId: 'S1',
      status: 'running',
      normalizedType: 'task_update',
    });
    expect(only(decode('session:state', { content: 'task_stale' })).payload).toMatchObject({
      status: 'failed',
    });
    expect(only(decode('session:state', { content: 'chat' }))).toMatchObject({
      kind: 'system',
      payload: { data: { content: 'chat' } },
    });
  });

  it('exposes known input states on system events', () => {
    expect(only(decode('session:input_state', { content: 'waiting_input' })).payload).toEqual({
      data: { content: 'waiting_input' },
      inputState: 'waiting_input',
    });
    expect(only(decode('session:input_state', { content: 'typing' })).payload).toEqual({
      data: { content: 'typing' },
    });
  });

  it('maps acknowledgements, payments, errors and unknown events', () => {
    expect(only(decode('session:message_status', { status: 'received' }))).toMatchObject({
      kind: 'ack',
      payload: { status: 'received' },
    });
    expect(only(decode('session:thinking', { content: 'thinking' }))).toMatchObject({
      kind: 'ack',
      payload: { status: 'thinking' },
    });
    expect(only(decode('session:reward', { message: 'You saved $20' }))).toMatchObject({
      kind: 'payment',
      payload: { paymentKind: 'reward' },
    });
    expect(
      only(decode('session:error', { code: 'quota', message: 'Out of credits' })),
    ).toMatchObject({
      kind: 'error',
      payload: { code: 'quota', message: 'Out of credits' },
    });
    expect(only(decode('session:card', { title: 'x' }))).toMatchObject({
      kind: 'system',
      payload: { data: { title: 'x' } },
    });
  });
});

describe('envelopeToDecodeInput', () => {
  it('reads the routing fields from an envelope', () => {
    const envelope = buildEnvelope(
      'session:text',
      { content: 'hi' },
      { userId: 'u1', deviceId: 'd1', sessionId: 'S1', messageId: 'm1' },
    );

    expect(envelopeToDecodeInput('session:text', envelope)).toEqual({
      eventName: 'session:text',
      sessionId: 'S1',
      messageId: 'm1',
      eventId: envelope.metadata.event_id,
      data: { content: 'hi' },
    });
  });
});
