import {
  SessionInfoSchema,
  SessionListResponseSchema,
  type SessionInfo,
  type SessionListResponse,
} from '@pine-sdk/shared';

import { SessionError } from '../errors';
import { httpRequest, type HttpClientConfig } from './httpClient';

export interface ListSessionsOptions {
  state?: string | undefined;
  limit?: number;
  offset?: number;
}

export type SessionActionResult = Record<string, unknown>;

/**
 * Session and task REST endpoints. The engine only needs session ids from
 * here; it never calls these itself.
 */
export class SessionsApi {
  constructor(private readonly getConfig: () => HttpClientConfig) {}

  async list(options: ListSessionsOptions = {}): Promise<SessionListResponse> {
    const body = await httpRequest(this.getConfig(), {
      path: '/v2/sessions',
      query: {
        limit: options.limit ?? 30,
        offset: options.offset ?? 0,
        state: options.state,
      },
    });
    return parseOrThrow(SessionListResponseSchema.safeParse(body), 'list sessions');
  }

  async get(sessionId: string): Promise<SessionInfo> {
    const body = await httpRequest(this.getConfig(), {
      path: `/v2/sessions/${encodeURIComponent(sessionId)}`,
    });
    return parseOrThrow(SessionInfoSchema.safeParse(body), 'get session');
  }

  async create(): Promise<SessionInfo> {
    const body = await httpRequest(this.getConfig(), { path: '/v2/sessions', method: 'POST' });
    return parseOrThrow(SessionInfoSchema.safeParse(body), 'create session');
  }

  async delete(sessionId: string, options: { force?: boolean } = {}): Promise<unknown> {
    return httpRequest(this.getConfig(), {
      path: `/v2/sessions/${encodeURIComponent(sessionId)}`,
      method: 'DELETE',
      ...(options.force ? { query: { force_delete: 'true' } } : {}),
    });
  }

  async startTask(sessionId: string): Promise<SessionActionResult> {
    return this.action(sessionId, 'start');
  }

  async stopTask(sessionId: string): Promise<SessionActionResult> {
    return this.action(sessionId, 'stop');
  }

  async updateScheduledCallReminder(options: {
    sessionId: string;
    messageId: string;
    scheduledTime: string;
    enabled: boolean;
  }): Promise<SessionActionResult> {
    const body = await httpRequest(this.getConfig(), {
      path: `/v2/sessions/${encodeURIComponent(options.sessionId)}/scheduled-call-reminder`,
      method: 'PUT',
      body: {
        message_id: options.messageId,
        scheduled_time: options.scheduledTime,
        scheduled_call_reminder: options.enabled,
      },
    });
    return asRecord(body);
  }

  async socialShare(options: {
    sessionId: string;
    platform: string;
    sharedUrl: string;
  }): Promise<SessionActionResult> {
    const body = await httpRequest(this.getConfig(), {
      path: `/v2/sessions/${encodeURIComponent(options.sessionId)}/social-share`,
      method: 'POST',
      body: { platform: options.platform, shared_url: options.sharedUrl },
    });
    return asRecord(body);
  }

  private async action(sessionId: string, action: 'start' | 'stop'): Promise<SessionActionResult> {
    const body = await httpRequest(this.getConfig(), {
      path: `/v2/sessions/${encodeURIComponent(sessionId)}/${action}`,
      method: 'POST',
    });
    return asRecord(body);
  }
}

function asRecord(body: unknown): SessionActionResult {
  if (body && typeof body === 'object' && !Array.isArray(body)) {
    return { ...body };
  }
  return {};
}

function parseOrThrow<T>(
  result: { success: true; data: T } | { success: false; error: { message: string } },
  operation: string,
): T {
  if (!result.success) {
    throw new SessionError(`Unexpected response to ${operation}: ${result.error.message}`);
  }
  return result.data;
}
