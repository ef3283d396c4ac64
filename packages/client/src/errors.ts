export class PineError extends Error {
  code: string;
  details?: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

export function isPineError(err: unknown): err is PineError {
  return err instanceof PineError;
}

export class AuthError extends PineError {
  constructor(message: string, code = 'auth_error') {
    super(code, message);
  }
}

export class SessionError extends PineError {
  constructor(message: string, code = 'session_error', details?: unknown) {
    super(code, message, details);
  }
}

export class ConnectionError extends PineError {
  constructor(message: string) {
    super('connection_error', message);
  }
}

export class HttpError extends PineError {
  status: number;
  body?: unknown;

  constructor(status: number, message: string, body?: unknown) {
    super('http_error', message);
    this.status = status;
    if (body !== undefined) {
      this.body = body;
    }
  }
}

/**
 * The physical connection was lost or could not be established. Retried
 * locally; surfaced to callers only once retries are exhausted.
 */
export class TransportError extends PineError {
  constructor(message: string, details?: unknown) {
    super('transport_error', message, details);
  }
}

/**
 * An event arrived for a session this client never joined (or already left).
 * Never surfaced to callers.
 */
export class UnknownSessionError extends PineError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('unknown_session', `Received event for unknown session ${sessionId}`);
    this.sessionId = sessionId;
  }
}

/**
 * The server reported a state transition the client did not expect. The local
 * state is corrected to match the server; never surfaced to callers.
 */
export class ProtocolInconsistencyError extends PineError {
  constructor(message: string, details?: unknown) {
    super('protocol_inconsistency', message, details);
  }
}

/**
 * A coalescing buffer stayed open past the safety ceiling and was flushed as a
 * partial event.
 */
export class CoalescenceTimeoutExceeded extends PineError {
  readonly bufferKey: string;
  readonly openForMs: number;

  constructor(bufferKey: string, openForMs: number) {
    super(
      'coalescence_timeout',
      `Buffer ${bufferKey} was open for ${openForMs}ms and was flushed as a partial event`,
    );
    this.bufferKey = bufferKey;
    this.openForMs = openForMs;
  }
}
