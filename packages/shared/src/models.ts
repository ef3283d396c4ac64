import { z } from 'zod';

// Payload schemas for the `payload.data` field of server events. Unknown keys
// are kept so callers see everything the server sent.

export const TextPartDataSchema = z
  .object({
    content: z.string().default(''),
    final: z.boolean().default(false),
  })
  .passthrough();
export type TextPartData = z.infer<typeof TextPartDataSchema>;

export const TextDataSchema = z
  .object({
    content: z.string().default(''),
  })
  .passthrough();
export type TextData = z.infer<typeof TextDataSchema>;

export const WorkLogPartDataSchema = z
  .object({
    step_id: z.string().default('unknown'),
    text_delta: z.string().nullish(),
    data_delta: z.record(z.string(), z.unknown()).nullish(),
    status: z.string().nullish(),
  })
  .passthrough();
export type WorkLogPartData = z.infer<typeof WorkLogPartDataSchema>;

export const WorkLogStepSchema = z
  .object({
    id: z.string(),
    step_type: z.string().default(''),
    step_title: z.string().default(''),
    step_details: z.string().nullish(),
    status: z.string().default(''),
    start_time: z.number().nullish(),
    data: z.record(z.string(), z.unknown()).nullish(),
    can_retry: z.boolean().nullish(),
    can_cancel: z.boolean().nullish(),
    is_collapsed: z.boolean().nullish(),
  })
  .passthrough();
export type WorkLogStep = z.infer<typeof WorkLogStepSchema>;

export const WorkLogDataSchema = z.object({
  steps: z.array(WorkLogStepSchema).default([]),
});
export type WorkLogData = z.infer<typeof WorkLogDataSchema>;

export const TaskReadyDataSchema = z
  .object({
    task_id: z.string().nullish(),
    required: z.number().default(0),
    suggested: z.number().nullish(),
    confirmed: z.boolean().default(false),
  })
  .passthrough();
export type TaskReadyData = z.infer<typeof TaskReadyDataSchema>;

export const TaskCompletionSchema = z
  .object({
    result_title: z.string().default(''),
    result_description: z.string().nullish(),
    share_text: z.string().nullish(),
    summary: z.record(z.string(), z.unknown()).nullish(),
  })
  .passthrough();
export type TaskCompletion = z.infer<typeof TaskCompletionSchema>;

export const TaskFinishedDataSchema = z
  .object({
    task_id: z.string().nullish(),
    status: z.string().default(''),
    completion: TaskCompletionSchema.nullish(),
  })
  .passthrough();
export type TaskFinishedData = z.infer<typeof TaskFinishedDataSchema>;

/**
 * `session:state` and `session:input_state` both carry their value in `content`.
 */
export const StateContentDataSchema = z
  .object({
    content: z.string(),
    task_id: z.string().nullish(),
  })
  .passthrough();
export type StateContentData = z.infer<typeof StateContentDataSchema>;

export const InputStateSchema = z.enum(['waiting_input', 'processing']);
export type InputState = z.infer<typeof InputStateSchema>;

export const ErrorDataSchema = z
  .object({
    code: z.string().default('server_error'),
    message: z.string().default(''),
  })
  .passthrough();
export type ErrorData = z.infer<typeof ErrorDataSchema>;

export const FormFieldSchema = z
  .object({
    name: z.string(),
    type: z.string().default('text'),
    label: z.string().nullish(),
    placeholder: z.string().nullish(),
    is_required: z.boolean().nullish(),
    pii_level: z.string().nullish(),
    prefilled: z.string().nullish(),
    options: z.array(z.string()).nullish(),
  })
  .passthrough();
export type FormField = z.infer<typeof FormFieldSchema>;

export const FormRequestDataSchema = z
  .object({
    message_to_user: z.string().default(''),
    form: z
      .object({
        fields: z.array(FormFieldSchema).default([]),
        content: z.record(z.string(), z.unknown()).nullish(),
        is_submitted: z.boolean().default(false),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type FormRequestData = z.infer<typeof FormRequestDataSchema>;

export const PaymentDataSchema = z
  .object({
    payment_id: z.string().nullish(),
    message: z.string().nullish(),
    content: z.string().nullish(),
    charge_type: z.string().default(''),
    currency_code: z.string().nullish(),
    currency_symbol: z.string().nullish(),
    estimated_savings: z.number().nullish(),
    actual_savings: z.number().nullish(),
    actual_payment_amount: z.number().nullish(),
    status: z.string().nullish(),
    task_status: z.string().nullish(),
  })
  .passthrough();
export type PaymentData = z.infer<typeof PaymentDataSchema>;

export const SessionInfoSchema = z
  .object({
    id: z.string(),
    type: z.string().nullish(),
    title: z.string().default(''),
    is_stale: z.boolean().nullish(),
    is_processed: z.boolean().nullish(),
    state: z.string().default('init'),
    version: z.string().nullish(),
    created_at: z.string().default(''),
    updated_at: z.string().default(''),
  })
  .passthrough();
export type SessionInfo = z.infer<typeof SessionInfoSchema>;

export const SessionListResponseSchema = z.object({
  sessions: z.array(SessionInfoSchema),
  total: z.number().int().nonnegative(),
  limit: z.number().int().nonnegative(),
  offset: z.number().int().nonnegative(),
});
export type SessionListResponse = z.infer<typeof SessionListResponseSchema>;

export const AuthRequestCodeResponseSchema = z
  .object({
    request_token: z.string(),
  })
  .passthrough();
export type AuthRequestCodeResponse = z.infer<typeof AuthRequestCodeResponseSchema>;

export const AuthVerifyResponseSchema = z
  .object({
    access_token: z.string(),
    id: z.string(),
    email: z.string(),
  })
  .passthrough();
export type AuthVerifyResponse = z.infer<typeof AuthVerifyResponseSchema>;
