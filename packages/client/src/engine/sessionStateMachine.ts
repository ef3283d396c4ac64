import {
  isTerminalTaskStatus,
  type InputState,
  type NormalizedEvent,
  type TaskStatus,
} from '@pine-sdk/shared';

export type SessionPhase =
  | 'idle'
  | 'awaiting_response'
  | 'responding'
  | 'awaiting_user_input'
  | 'closed';

export type SessionSignal =
  | { type: 'message_sent' }
  | { type: 'content'; event: NormalizedEvent }
  | { type: 'input_state'; state: InputState }
  | { type: 'close' };

export interface Transition<S> {
  state: S;
  /** Set when the signal did not fit the current state and the state was corrected. */
  inconsistency?: string;
}

export interface TaskState {
  taskId: string;
  sessionId: string;
  status: TaskStatus;
}

export interface TaskReport {
  taskId: string;
  sessionId: string;
  status: TaskStatus;
}

export interface TaskTransition extends Transition<TaskState> {
  previousStatus: TaskStatus;
}

const ALLOWED_TASK_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  not_started: ['running', 'awaiting_confirmation', 'cancelled', 'failed'],
  running: ['awaiting_confirmation', 'completed', 'cancelled', 'failed'],
  awaiting_confirmation: ['running', 'completed', 'cancelled', 'failed'],
  completed: [],
  cancelled: [],
  failed: [],
};

export function isAllowedTaskTransition(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED_TASK_TRANSITIONS[from].includes(to);
}

/** Content that asks the user for something before the conversation can go on. */
export function requiresReply(event: NormalizedEvent): boolean {
  return event.type === 'form' || event.type === 'task_ready';
}

function contentPhase(phase: SessionPhase, event: NormalizedEvent): SessionPhase {
  switch (event.type) {
    case 'text':
      return 'idle';
    case 'form':
    case 'task_ready':
      return 'awaiting_user_input';
    case 'task_update':
      return isTerminalTaskStatus(event.data.status) ? 'idle' : 'responding';
    case 'ack':
    case 'work_log':
    case 'payment':
      return 'responding';
    case 'error':
      return event.data.fatal ? 'idle' : phase;
    case 'system':
      return phase;
  }
}

/**
 * Session lifecycle reducer. Never throws: the server is authoritative, so a
 * signal that does not fit is applied anyway and reported as an inconsistency.
 */
export function reduceSessionPhase(
  phase: SessionPhase,
  signal: SessionSignal,
): Transition<SessionPhase> {
  if (signal.type === 'close') {
    return { state: 'closed' };
  }
  if (phase === 'closed') {
    return { state: 'closed', inconsistency: `${describe(signal)} after the session closed` };
  }

  switch (signal.type) {
    case 'message_sent':
      if (phase === 'awaiting_response' || phase === 'responding') {
        return {
          state: 'awaiting_response',
          inconsistency: `message sent while ${phase}`,
        };
      }
      return { state: 'awaiting_response' };

    case 'content':
      return { state: contentPhase(phase, signal.event) };

    case 'input_state':
      if (signal.state === 'waiting_input') {
        return { state: phase === 'responding' ? 'idle' : phase };
      }
      return { state: phase === 'awaiting_response' ? 'responding' : phase };
  }
}

/**
 * Task lifecycle reducer. Same-status reports are no-ops; anything outside the
 * allowed transitions is forced to the reported status.
 */
export function reduceTaskStatus(
  state: TaskState | undefined,
  report: TaskReport,
): TaskTransition {
  const previousStatus = state?.status ?? 'not_started';
  const next: TaskState = {
    taskId: report.taskId,
    sessionId: report.sessionId,
    status: report.status,
  };
  if (previousStatus === report.status || isAllowedTaskTransition(previousStatus, report.status)) {
    return { state: next, previousStatus };
  }
  return {
    state: next,
    previousStatus,
    inconsistency: `task ${report.taskId} moved from ${previousStatus} to ${report.status}`,
  };
}

function describe(signal: SessionSignal): string {
  switch (signal.type) {
    case 'content':
      return `${signal.event.type} event`;
    case 'input_state':
      return `input state ${signal.state}`;
    default:
      return signal.type;
  }
}
