import { HttpError } from '../errors';
import { createConsoleLogger, type PineLogger } from '../logging';

export interface HttpClientConfig {
  baseUrl: string;
  accessToken?: string | undefined;
  log?: PineLogger | undefined;
}

export interface HttpRequestOptions {
  path: string;
  method?: string;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  headers?: Record<string, string>;
  /** Send the bearer token. Defaults to true. */
  authenticated?: boolean;
}

export const USER_AGENT = 'pine-sdk-ts/0.1.0';

const defaultLog = createConsoleLogger('pine-http');

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted = { ...headers };
  if (redacted['Authorization']) {
    redacted['Authorization'] = '[redacted]';
  }
  return redacted;
}

function formatBodyForLog(body: unknown): unknown {
  if (typeof body === 'string') {
    return body.length > 500 ? `${body.slice(0, 500)}…` : body;
  }
  return body;
}

/**
 * Responses from the REST API are wrapped as `{ status: 'success', data }`.
 */
export function unwrapResponse(body: unknown): unknown {
  if (body && typeof body === 'object' && 'status' in body && 'data' in body) {
    return body.data;
  }
  return body;
}

export function apiUrl(baseUrl: string, path: string): URL {
  const trimmedBase = baseUrl.replace(/\/+$/, '');
  const trimmedPath = path.startsWith('/') ? path : `/${path}`;
  return new URL(`${trimmedBase}/api${trimmedPath}`);
}

export async function httpRequest(
  config: HttpClientConfig,
  init: HttpRequestOptions,
): Promise<unknown> {
  const log = config.log ?? defaultLog;
  const url = apiUrl(config.baseUrl, init.path);
  if (init.query) {
    for (const [key, value] of Object.entries(init.query)) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
  }

  const authenticated = init.authenticated !== false;
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
    'User-Agent': USER_AGENT,
    ...(authenticated && config.accessToken
      ? { Authorization: `Bearer ${config.accessToken}` }
      : {}),
    ...(init.headers ?? {}),
  };

  const method = init.method ?? 'GET';
  const requestInit: RequestInit = { method, headers };
  if (init.body !== undefined) {
    requestInit.body = JSON.stringify(init.body);
  }

  let response: Response;
  try {
    response = await fetch(url.toString(), requestInit);
  } catch (err) {
    log.error('fetch failed', {
      url: url.toString(),
      method,
      headers: redactHeaders(headers),
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }

  const text = await response.text();
  const contentType = response.headers.get('content-type') ?? '';
  const isJson = contentType.includes('application/json');
  const parsedBody: unknown = text && isJson ? JSON.parse(text) : text;

  if (!response.ok) {
    log.error('http error', {
      url: url.toString(),
      method,
      status: response.status,
      statusText: response.statusText,
      body: formatBodyForLog(parsedBody),
    });
    throw new HttpError(
      response.status,
      `HTTP ${response.status} ${response.statusText || 'Error'}`.trim(),
      parsedBody,
    );
  }

  return unwrapResponse(parsedBody);
}
