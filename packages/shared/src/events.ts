import { z } from 'zod';

export const TaskStatusSchema = z.enum([
  'not_started',
  'running',
  'awaiting_confirmation',
  'completed',
  'cancelled',
  'failed',
]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set([
  'completed',
  'cancelled',
  'failed',
]);

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.has(status);
}

export const FormKindSchema = z.enum([
  'form',
  'location',
  'location_selection',
  'auth_confirmation',
  'three_way_call',
]);
export type FormKind = z.infer<typeof FormKindSchema>;

export const PaymentKindSchema = z.enum(['payment', 'reward']);
export type PaymentKind = z.infer<typeof PaymentKindSchema>;

// ---------------------------------------------------------------------------
// Raw events: one per delivered server message, tagged with the engine kind.
// ---------------------------------------------------------------------------

export const RawEventKindSchema = z.enum([
  'ack',
  'work_log_part',
  'text_part',
  'text_complete',
  'form',
  'task_update',
  'payment',
  'error',
  'system',
]);
export type RawEventKind = z.infer<typeof RawEventKindSchema>;

export interface RawEventBase {
  sessionId: string;
  /** Wire event name the raw event was decoded from. */
  eventName: string;
  /**
   * Monotonic per physical connection, restarting on every new connection.
   * Only comparable together with `connectionEpoch`.
   */
  sequenceHint: number;
  connectionEpoch: number;
  /** Server-assigned envelope id; stable across redelivery. */
  eventId?: string | undefined;
  messageId?: string | undefined;
  receivedAt: number;
}

export interface AckRawPayload {
  status?: string | undefined;
  data: unknown;
}

export interface WorkLogPartRawPayload {
  lineId: string;
  /** Appended to the line text. */
  textDelta?: string | undefined;
  /** Replaces the line text. Takes precedence over `textDelta`. */
  text?: string | undefined;
  status?: string | undefined;
  data?: Record<string, unknown> | undefined;
}

export interface TextRawPayload {
  content: string;
}

export interface FormRawPayload {
  formKind: FormKind;
  data: unknown;
}

export interface TaskUpdateRawPayload {
  taskId: string;
  status: TaskStatus;
  /** `task_ready` when the server asked the user to confirm a task. */
  normalizedType: 'task_ready' | 'task_update';
  data: unknown;
}

export interface PaymentRawPayload {
  paymentKind: PaymentKind;
  data: unknown;
}

export interface ErrorRawPayload {
  code: string;
  message: string;
  data?: unknown;
}

export interface SystemRawPayload {
  data: unknown;
  inputState?: 'waiting_input' | 'processing' | undefined;
}

export type RawEvent =
  | (RawEventBase & { kind: 'ack'; payload: AckRawPayload })
  | (RawEventBase & { kind: 'work_log_part'; payload: WorkLogPartRawPayload })
  | (RawEventBase & { kind: 'text_part'; payload: TextRawPayload })
  | (RawEventBase & { kind: 'text_complete'; payload: TextRawPayload })
  | (RawEventBase & { kind: 'form'; payload: FormRawPayload })
  | (RawEventBase & { kind: 'task_update'; payload: TaskUpdateRawPayload })
  | (RawEventBase & { kind: 'payment'; payload: PaymentRawPayload })
  | (RawEventBase & { kind: 'error'; payload: ErrorRawPayload })
  | (RawEventBase & { kind: 'system'; payload: SystemRawPayload });

export type RawEventOf<K extends RawEventKind> = Extract<RawEvent, { kind: K }>;

// ---------------------------------------------------------------------------
// Normalized events: what the public generator yields.
// ---------------------------------------------------------------------------

export const NormalizedEventTypeSchema = z.enum([
  'ack',
  'work_log',
  'form',
  'text',
  'task_ready',
  'task_update',
  'payment',
  'error',
  'system',
]);
export type NormalizedEventType = z.infer<typeof NormalizedEventTypeSchema>;

export const AckEventDataSchema = z.object({
  eventName: z.string(),
  status: z.string().optional(),
  data: z.unknown(),
});

export const WorkLogEventDataSchema = z.object({
  lineId: z.string(),
  text: z.string(),
  status: z.string().optional(),
  data: z.record(z.string(), z.unknown()).optional(),
  /** Number of parts merged into this emission. */
  updates: z.number().int().positive(),
  partial: z.boolean(),
});

export const FormEventDataSchema = z.object({
  formKind: FormKindSchema,
  data: z.unknown(),
});

export const TextEventDataSchema = z.object({
  content: z.string(),
  /** Number of fragments merged into this emission. */
  fragments: z.number().int().nonnegative(),
  /** True when the buffer was flushed without a complete marker. */
  partial: z.boolean(),
});

export const TaskReadyEventDataSchema = z.object({
  taskId: z.string(),
  status: TaskStatusSchema,
  data: z.unknown(),
});

export const TaskUpdateEventDataSchema = z.object({
  taskId: z.string(),
  status: TaskStatusSchema,
  previousStatus: TaskStatusSchema,
  data: z.unknown(),
});

export const PaymentEventDataSchema = z.object({
  paymentKind: PaymentKindSchema,
  data: z.unknown(),
});

export const ErrorEventDataSchema = z.object({
  code: z.string(),
  message: z.string(),
  /** A fatal error is always the last event of its stream. */
  fatal: z.boolean(),
  data: z.unknown().optional(),
});

export const SystemEventDataSchema = z.object({
  eventName: z.string(),
  data: z.unknown(),
});

const NormalizedEventBaseSchema = z.object({
  sessionId: z.string(),
  emittedAt: z.number().int().nonnegative(),
  messageId: z.string().optional(),
});

export const NormalizedEventSchema = z.discriminatedUnion('type', [
  NormalizedEventBaseSchema.extend({ type: z.literal('ack'), data: AckEventDataSchema }),
  NormalizedEventBaseSchema.extend({ type: z.literal('work_log'), data: WorkLogEventDataSchema }),
  NormalizedEventBaseSchema.extend({ type: z.literal('form'), data: FormEventDataSchema }),
  NormalizedEventBaseSchema.extend({ type: z.literal('text'), data: TextEventDataSchema }),
  NormalizedEventBaseSchema.extend({
    type: z.literal('task_ready'),
    data: TaskReadyEventDataSchema,
  }),
  NormalizedEventBaseSchema.extend({
    type: z.literal('task_update'),
    data: TaskUpdateEventDataSchema,
  }),
  NormalizedEventBaseSchema.extend({ type: z.literal('payment'), data: PaymentEventDataSchema }),
  NormalizedEventBaseSchema.extend({ type: z.literal('error'), data: ErrorEventDataSchema }),
  NormalizedEventBaseSchema.extend({ type: z.literal('system'), data: SystemEventDataSchema }),
]);

export type NormalizedEvent = z.infer<typeof NormalizedEventSchema>;
export type NormalizedEventOf<T extends NormalizedEventType> = Extract<
  NormalizedEvent,
  { type: T }
>;

export type AckEventData = z.infer<typeof AckEventDataSchema>;
export type WorkLogEventData = z.infer<typeof WorkLogEventDataSchema>;
export type FormEventData = z.infer<typeof FormEventDataSchema>;
export type TextEventData = z.infer<typeof TextEventDataSchema>;
export type TaskReadyEventData = z.infer<typeof TaskReadyEventDataSchema>;
export type TaskUpdateEventData = z.infer<typeof TaskUpdateEventDataSchema>;
export type PaymentEventData = z.infer<typeof PaymentEventDataSchema>;
export type ErrorEventData = z.infer<typeof ErrorEventDataSchema>;
export type SystemEventData = z.infer<typeof SystemEventDataSchema>;

export function validateNormalizedEvent(data: unknown): NormalizedEvent {
  return NormalizedEventSchema.parse(data);
}

export function safeValidateNormalizedEvent(
  data: unknown,
): z.SafeParseReturnType<unknown, NormalizedEvent> {
  return NormalizedEventSchema.safeParse(data);
}
