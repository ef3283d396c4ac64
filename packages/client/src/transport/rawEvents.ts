import {
  ErrorDataSchema,
  FormRequestDataSchema,
  InputStateSchema,
  PaymentDataSchema,
  ServerEvent,
  StateContentDataSchema,
  TaskFinishedDataSchema,
  TaskReadyDataSchema,
  TextDataSchema,
  TextPartDataSchema,
  WorkLogDataSchema,
  WorkLogPartDataSchema,
  type FormKind,
  type MessageEnvelope,
  type RawEvent,
  type RawEventBase,
  type TaskStatus,
} from '@pine-sdk/shared';

/** Error code for payloads that fail their kind's schema. Ends the current turn. */
export const MALFORMED_PAYLOAD_CODE = 'malformed_payload';

/** Error code surfaced when reconnection attempts are exhausted. */
export const TRANSPORT_LOST_CODE = 'transport_lost';

export interface DecodeInput {
  eventName: string;
  sessionId: string | null | undefined;
  messageId?: string | null | undefined;
  eventId?: string | null | undefined;
  data: unknown;
}

export interface DecodeContext {
  sequenceHint: number;
  connectionEpoch: number;
  receivedAt: number;
}

const FORM_KINDS: Readonly<Record<string, FormKind>> = {
  [ServerEvent.SessionFormToUser]: 'form',
  [ServerEvent.SessionAskForLocation]: 'location',
  [ServerEvent.SessionLocationSelection]: 'location_selection',
  [ServerEvent.SessionInteractiveAuthConfirmation]: 'auth_confirmation',
  [ServerEvent.SessionThreeWayCall]: 'three_way_call',
};

const TASK_FINISHED_STATUSES: Readonly<Record<string, TaskStatus>> = {
  completed: 'completed',
  success: 'completed',
  cancelled: 'cancelled',
  canceled: 'cancelled',
  failed: 'failed',
  error: 'failed',
};

const SESSION_STATE_TASK_STATUSES: Readonly<Record<string, TaskStatus>> = {
  task_started: 'running',
  task_running: 'running',
  task_finished: 'completed',
  task_cancelled: 'cancelled',
  task_stale: 'failed',
};

export function envelopeToDecodeInput(eventName: string, envelope: MessageEnvelope): DecodeInput {
  return {
    eventName,
    sessionId: envelope.payload.session_id,
    messageId: envelope.payload.message_id,
    eventId: envelope.metadata.event_id,
    data: envelope.payload.data,
  };
}

/**
 * Map one server message to the raw events the engine consumes. Returns an
 * empty list for messages without a session id. A `session:work_log` snapshot
 * expands to one raw event per step.
 */
export function decodeServerEvent(input: DecodeInput, context: DecodeContext): RawEvent[] {
  if (!input.sessionId) {
    return [];
  }
  const base: RawEventBase = {
    sessionId: input.sessionId,
    eventName: input.eventName,
    sequenceHint: context.sequenceHint,
    connectionEpoch: context.connectionEpoch,
    receivedAt: context.receivedAt,
    ...(input.eventId ? { eventId: input.eventId } : {}),
    ...(input.messageId ? { messageId: input.messageId } : {}),
  };
  const { data } = input;

  const malformed = (issue: string): RawEvent[] => [
    {
      ...base,
      kind: 'error',
      payload: {
        code: MALFORMED_PAYLOAD_CODE,
        message: `Malformed ${input.eventName} payload: ${issue}`,
        data,
      },
    },
  ];

  const formKind = FORM_KINDS[input.eventName];
  if (formKind) {
    if (formKind === 'form') {
      const parsed = FormRequestDataSchema.safeParse(data);
      if (!parsed.success) return malformed(parsed.error.message);
      return [{ ...base, kind: 'form', payload: { formKind, data: parsed.data } }];
    }
    return [{ ...base, kind: 'form', payload: { formKind, data } }];
  }

  switch (input.eventName) {
    case ServerEvent.SessionMessageStatus:
    case ServerEvent.SessionThinking: {
      const status = readString(data, 'status') ?? readString(data, 'content');
      return [{ ...base, kind: 'ack', payload: { data, ...(status ? { status } : {}) } }];
    }

    case ServerEvent.SessionTextPart: {
      const parsed = TextPartDataSchema.safeParse(data);
      if (!parsed.success) return malformed(parsed.error.message);
      const payload = { content: parsed.data.content };
      return parsed.data.final
        ? [{ ...base, kind: 'text_complete', payload }]
        : [{ ...base, kind: 'text_part', payload }];
    }

    case ServerEvent.SessionText: {
      const parsed = TextDataSchema.safeParse(data);
      if (!parsed.success) return malformed(parsed.error.message);
      return [{ ...base, kind: 'text_complete', payload: { content: parsed.data.content } }];
    }

    case ServerEvent.SessionWorkLogPart: {
      const parsed = WorkLogPartDataSchema.safeParse(data);
      if (!parsed.success) return malformed(parsed.error.message);
      const part = parsed.data;
      return [
        {
          ...base,
          kind: 'work_log_part',
          payload: {
            lineId: part.step_id,
            ...(part.text_delta ? { textDelta: part.text_delta } : {}),
            ...(part.status ? { status: part.status } : {}),
            ...(part.data_delta ? { data: part.data_delta } : {}),
          },
        },
      ];
    }

    case ServerEvent.SessionWorkLog: {
      const parsed = WorkLogDataSchema.safeParse(data);
      if (!parsed.success) return malformed(parsed.error.message);
      return parsed.data.steps.map((step, index) => ({
        ...base,
        ...(base.eventId ? { eventId: `${base.eventId}#${index}` } : {}),
        kind: 'work_log_part' as const,
        payload: {
          lineId: step.id,
          text: step.step_details ?? step.step_title,
          ...(step.status ? { status: step.status } : {}),
          data: { ...step },
        },
      }));
    }

    case ServerEvent.SessionTaskReady: {
      const parsed = TaskReadyDataSchema.safeParse(data);
      if (!parsed.success) return malformed(parsed.error.message);
      return [
        {
          ...base,
          kind: 'task_update',
          payload: {
            taskId: parsed.data.task_id ?? base.sessionId,
            status: 'awaiting_confirmation',
            normalizedType: 'task_ready',
            data: parsed.data,
          },
        },
      ];
    }

    case ServerEvent.SessionTaskFinished: {
      const parsed = TaskFinishedDataSchema.safeParse(data);
      if (!parsed.success) return malformed(parsed.error.message);
      const status = TASK_FINISHED_STATUSES[parsed.data.status.toLowerCase()] ?? 'completed';
      return [
        {
          ...base,
          kind: 'task_update',
          payload: {
            taskId: parsed.data.task_id ?? base.sessionId,
            status,
            normalizedType: 'task_update',
            data: parsed.data,
          },
        },
      ];
    }

    case ServerEvent.SessionState: {
      const parsed = StateContentDataSchema.safeParse(data);
      if (!parsed.success) return malformed(parsed.error.message);
      const status = SESSION_STATE_TASK_STATUSES[parsed.data.content];
      if (!status) {
        return [{ ...base, kind: 'system', payload: { data: parsed.data } }];
      }
      return [
        {
          ...base,
          kind: 'task_update',
          payload: {
            taskId: parsed.data.task_id ?? base.sessionId,
            status,
            normalizedType: 'task_update',
            data: parsed.data,
          },
        },
      ];
    }

    case ServerEvent.SessionInputState: {
      const parsed = StateContentDataSchema.safeParse(data);
      if (!parsed.success) return malformed(parsed.error.message);
      const inputState = InputStateSchema.safeParse(parsed.data.content);
      return [
        {
          ...base,
          kind: 'system',
          payload: {
            data: parsed.data,
            ...(inputState.success ? { inputState: inputState.data } : {}),
          },
        },
      ];
    }

    case ServerEvent.SessionPayment:
    case ServerEvent.SessionReward: {
      const parsed = PaymentDataSchema.safeParse(data);
      if (!parsed.success) return malformed(parsed.error.message);
      const paymentKind = input.eventName === ServerEvent.SessionReward ? 'reward' : 'payment';
      return [{ ...base, kind: 'payment', payload: { paymentKind, data: parsed.data } }];
    }

    case ServerEvent.SessionError: {
      const parsed = ErrorDataSchema.safeParse(data);
      if (!parsed.success) return malformed(parsed.error.message);
      return [
        {
          ...base,
          kind: 'error',
          payload: { code: parsed.data.code, message: parsed.data.message, data: parsed.data },
        },
      ];
    }

    default:
      return [{ ...base, kind: 'system', payload: { data } }];
  }
}

function readString(value: unknown, key: string): string | undefined {
  if (!value || typeof value !== 'object' || !(key in value)) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' && field.length > 0 ? field : undefined;
}
