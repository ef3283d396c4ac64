import { z } from 'zod';

export const SOCKETIO_PATH = '/api/v2/socket.io/';

/**
 * Server-to-client event names.
 */
export const ServerEvent = {
  SessionMessageStatus: 'session:message_status',
  SessionThinking: 'session:thinking',
  SessionTextPart: 'session:text_part',
  SessionText: 'session:text',
  SessionWorkLogPart: 'session:work_log_part',
  SessionWorkLog: 'session:work_log',
  SessionFormToUser: 'session:form_to_user',
  SessionAskForLocation: 'session:ask_for_location',
  SessionLocationSelection: 'session:location_selection',
  SessionInteractiveAuthConfirmation: 'session:interactive_auth_confirmation',
  SessionThreeWayCall: 'session:three_way_call',
  SessionTaskReady: 'session:task_ready',
  SessionTaskFinished: 'session:task_finished',
  SessionPayment: 'session:payment',
  SessionReward: 'session:reward',
  SessionError: 'session:error',
  SessionState: 'session:state',
  SessionInputState: 'session:input_state',
  SessionUpdateTitle: 'session:update_title',
  SessionRichContent: 'session:rich_content',
  SessionCard: 'session:card',
  SessionNextTasks: 'session:next_tasks',
  SessionRetry: 'session:retry',
  SessionHistory: 'session:history',
  SessionJoin: 'session:join',
} as const;
export type ServerEventName = (typeof ServerEvent)[keyof typeof ServerEvent];

/**
 * Client-to-server event names.
 */
export const ClientEvent = {
  SessionJoin: 'session:join',
  SessionLeave: 'session:leave',
  SessionMessage: 'session:message',
  SessionHistory: 'session:history',
  SessionFormToUser: 'session:form_to_user',
  SessionInteractiveAuthConfirmation: 'session:interactive_auth_confirmation',
  SessionAskForLocation: 'session:ask_for_location',
  SessionLocationSelection: 'session:location_selection',
} as const;
export type ClientEventName = (typeof ClientEvent)[keyof typeof ClientEvent];

/**
 * Socket.IO lifecycle events that never carry an envelope.
 */
export const TRANSPORT_LIFECYCLE_EVENTS: ReadonlySet<string> = new Set([
  'connect',
  'disconnect',
  'connect_error',
  'ready',
]);

export const SourceRoleSchema = z.enum(['user', 'agent', 'system']);
export type SourceRole = z.infer<typeof SourceRoleSchema>;

export const MessageSourceSchema = z.object({
  role: z.string(),
  user_id: z.string().nullish(),
  device_id: z.string().nullish(),
  /** Platform identifier sent by first-party apps. */
  plat: z.string().nullish(),
  version: z.string().nullish(),
});
export type MessageSource = z.infer<typeof MessageSourceSchema>;

export const MessageMetadataSchema = z.object({
  event_id: z.string(),
  request_id: z.string().nullish(),
  timestamp: z.string(),
  source: MessageSourceSchema,
  is_volatile: z.boolean().default(false),
});
export type MessageMetadata = z.infer<typeof MessageMetadataSchema>;

export const SessionMessagePayloadSchema = z.object({
  session_id: z.string().nullish(),
  message_id: z.string().nullish(),
  quoted_message_id: z.string().nullish(),
  type: z.string().nullish(),
  data: z.unknown().optional(),
});
export type SessionMessagePayload = z.infer<typeof SessionMessagePayloadSchema>;

export const MessageEnvelopeSchema = z.object({
  metadata: MessageMetadataSchema,
  type: z.string(),
  payload: SessionMessagePayloadSchema,
});
export type MessageEnvelope = z.infer<typeof MessageEnvelopeSchema>;

export function validateEnvelope(data: unknown): MessageEnvelope {
  return MessageEnvelopeSchema.parse(data);
}

export function safeValidateEnvelope(
  data: unknown,
): z.SafeParseReturnType<unknown, MessageEnvelope> {
  return MessageEnvelopeSchema.safeParse(data);
}

export const HistoryRequestSchema = z.object({
  max_messages: z.number().int().positive(),
  max_bytes: z.number().int().positive(),
  order: z.enum(['asc', 'desc']),
  from_message_id: z.string().nullish(),
  request_work_log: z.boolean(),
});
export type HistoryRequest = z.infer<typeof HistoryRequestSchema>;

/**
 * One stored message returned by `session:history`. The server stores the
 * original event name and payload of each message it delivered.
 */
export const HistoryMessageSchema = z.object({
  type: z.string(),
  message_id: z.string().nullish(),
  data: z.unknown().optional(),
  metadata: MessageMetadataSchema.partial().nullish(),
});
export type HistoryMessage = z.infer<typeof HistoryMessageSchema>;

export const HistoryResponseSchema = z.object({
  messages: z.array(HistoryMessageSchema).default([]),
  has_more: z.boolean().optional(),
});
export type HistoryResponse = z.infer<typeof HistoryResponseSchema>;

export function safeValidateHistoryResponse(
  data: unknown,
): z.SafeParseReturnType<unknown, HistoryResponse> {
  return HistoryResponseSchema.safeParse(data);
}
