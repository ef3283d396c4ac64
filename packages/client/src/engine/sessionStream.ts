import {
  isTerminalTaskStatus,
  type InputState,
  type NormalizedEvent,
  type RawEvent,
  type RawEventOf,
  type TaskStatus,
} from '@pine-sdk/shared';

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config';
import { ProtocolInconsistencyError, SessionError, type TransportError } from '../errors';
import { createConsoleLogger, type PineLogger } from '../logging';
import { TRANSPORT_LOST_CODE } from '../transport/rawEvents';
import { EventCoalescer } from './eventCoalescer';
import { EventQueue } from './eventQueue';
import {
  reduceSessionPhase,
  reduceTaskStatus,
  type SessionPhase,
  type SessionSignal,
  type TaskState,
} from './sessionStateMachine';

export interface SessionStreamOptions {
  sessionId: string;
  engine?: Partial<EngineConfig>;
  /** False replays history: no debounce or ceiling timers. */
  timed?: boolean;
  /** Surface events the engine does not interpret as `system` events. */
  includeSystemEvents?: boolean;
  now?: () => number;
  log?: PineLogger;
}

export type ConsumeMode = 'turn' | 'persistent';

const SEEN_EVENT_MEMORY = 2000;

/** Event types that show the assistant has answered in the current turn. */
const AGENT_CONTENT_TYPES: ReadonlySet<NormalizedEvent['type']> = new Set([
  'work_log',
  'text',
  'form',
  'task_ready',
  'task_update',
  'payment',
]);

/**
 * Everything the engine keeps for one joined session: its coalescer, lifecycle
 * phase, task mirror and the FIFO the public generator reads from.
 */
export class SessionStream {
  readonly sessionId: string;
  private phaseValue: SessionPhase = 'idle';
  private inconsistencies = 0;
  private readonly tasks = new Map<string, TaskState>();
  private readonly queue: EventQueue<NormalizedEvent>;
  private readonly coalescer: EventCoalescer;
  private readonly seenEventIds = new Set<string>();
  private lastSequence: { epoch: number; hint: number } | null = null;
  private agentResponded = false;
  private turnComplete = false;
  private consumerAttached = false;
  private readonly includeSystemEvents: boolean;
  private readonly now: () => number;
  private readonly log: PineLogger;

  constructor(options: SessionStreamOptions) {
    this.sessionId = options.sessionId;
    this.includeSystemEvents = options.includeSystemEvents ?? false;
    this.now = options.now ?? (() => Date.now());
    this.log = options.log ?? createConsoleLogger('pine-chat');
    const engine = { ...DEFAULT_ENGINE_CONFIG, ...options.engine };

    this.queue = new EventQueue<NormalizedEvent>(engine.queueCapacity, (dropped) => {
      this.log.warn('event queue full, dropping oldest event', {
        sessionId: this.sessionId,
        type: dropped.type,
      });
    });
    this.coalescer = new EventCoalescer({
      sessionId: this.sessionId,
      emit: (event) => this.handleEmitted(event),
      workLogDebounceMs: engine.workLogDebounceMs,
      textIdleTimeoutMs: engine.textIdleTimeoutMs,
      coalescenceCeilingMs: engine.coalescenceCeilingMs,
      timed: options.timed ?? true,
      now: this.now,
      log: this.log,
    });
  }

  get phase(): SessionPhase {
    return this.phaseValue;
  }

  get closed(): boolean {
    return this.phaseValue === 'closed';
  }

  get inconsistencyCount(): number {
    return this.inconsistencies;
  }

  get isTurnComplete(): boolean {
    return this.turnComplete;
  }

  get queuedCount(): number {
    return this.queue.size;
  }

  task(taskId: string): TaskState | undefined {
    return this.tasks.get(taskId);
  }

  hasPendingBuffers(): boolean {
    return this.coalescer.hasPending();
  }

  accept(raw: RawEvent): void {
    if (this.closed) {
      this.log.debug('dropping event for closed stream', {
        sessionId: this.sessionId,
        eventName: raw.eventName,
      });
      return;
    }
    if (this.isDuplicate(raw)) {
      return;
    }

    switch (raw.kind) {
      case 'system':
        if (this.includeSystemEvents) {
          this.coalescer.push(raw);
        }
        if (raw.payload.inputState) {
          this.applyInputState(raw.payload.inputState);
        }
        return;
      case 'task_update':
        this.coalescer.push(raw, { previousTaskStatus: this.applyTaskReport(raw) });
        return;
      default:
        this.coalescer.push(raw);
    }
  }

  /** Start a new turn: the next completed turn ends `next(true)` again. */
  beginTurn(): void {
    this.turnComplete = false;
    this.agentResponded = false;
  }

  markMessageSent(): void {
    this.beginTurn();
    this.applySignal({ type: 'message_sent' });
  }

  /**
   * Claim the stream for one consumer. Returns the release function.
   */
  attachConsumer(): () => void {
    if (this.consumerAttached) {
      throw new SessionError(
        `Session ${this.sessionId} already has an active consumer`,
        'consumer_busy',
      );
    }
    this.consumerAttached = true;
    return () => {
      this.consumerAttached = false;
    };
  }

  /**
   * Next queued event, waiting while the queue is empty. Resolves `undefined`
   * once the stream is closed and drained or, in `turn` mode, once the turn is
   * complete and no buffer is still pending.
   */
  async next(mode: ConsumeMode): Promise<NormalizedEvent | undefined> {
    for (;;) {
      const event = this.queue.shift();
      if (event) {
        return event;
      }
      if (this.closed) {
        return undefined;
      }
      if (mode === 'turn' && this.turnComplete && !this.coalescer.hasPending()) {
        return undefined;
      }
      await this.queue.wait();
    }
  }

  /** Take every queued event without waiting. */
  drain(): NormalizedEvent[] {
    return this.queue.drain();
  }

  flush(): void {
    this.coalescer.flushAll();
  }

  suspend(): void {
    this.coalescer.suspend();
  }

  resume(): void {
    this.coalescer.resume();
  }

  /** Flush, surface a terminal transport error, then close. */
  fail(error: TransportError): void {
    if (this.closed) return;
    this.coalescer.flushAll();
    this.handleEmitted({
      sessionId: this.sessionId,
      emittedAt: this.now(),
      type: 'error',
      data: { code: TRANSPORT_LOST_CODE, message: error.message, fatal: true },
    });
    this.close();
  }

  /** Flush whatever is buffered, then close. Queued events stay readable. */
  close(): void {
    if (this.closed) return;
    this.coalescer.flushAll();
    this.applySignal({ type: 'close' });
    this.coalescer.dispose();
    this.queue.wake();
  }

  private handleEmitted(event: NormalizedEvent): void {
    this.applySignal({ type: 'content', event });
    if (AGENT_CONTENT_TYPES.has(event.type)) {
      this.agentResponded = true;
    }
    if (event.type === 'task_update' && isTerminalTaskStatus(event.data.status)) {
      this.turnComplete = true;
    }
    if (event.type === 'error' && event.data.fatal) {
      this.turnComplete = true;
    }
    this.queue.push(event);
  }

  private applyInputState(state: InputState): void {
    this.applySignal({ type: 'input_state', state });
    if (state === 'waiting_input' && this.agentResponded) {
      this.turnComplete = true;
      this.queue.wake();
    }
  }

  private applyTaskReport(raw: RawEventOf<'task_update'>): TaskStatus {
    const transition = reduceTaskStatus(this.tasks.get(raw.payload.taskId), {
      taskId: raw.payload.taskId,
      sessionId: this.sessionId,
      status: raw.payload.status,
    });
    this.tasks.set(raw.payload.taskId, transition.state);
    if (transition.inconsistency) {
      this.recordInconsistency(transition.inconsistency);
    }
    return transition.previousStatus;
  }

  private applySignal(signal: SessionSignal): void {
    const transition = reduceSessionPhase(this.phaseValue, signal);
    this.phaseValue = transition.state;
    if (transition.inconsistency) {
      this.recordInconsistency(transition.inconsistency);
    }
  }

  private recordInconsistency(message: string): void {
    this.inconsistencies += 1;
    const error = new ProtocolInconsistencyError(message, { sessionId: this.sessionId });
    this.log.warn(error.message, { sessionId: this.sessionId, count: this.inconsistencies });
  }

  private isDuplicate(raw: RawEvent): boolean {
    if (raw.eventId) {
      if (this.seenEventIds.has(raw.eventId)) {
        this.log.debug('dropping duplicate event', {
          sessionId: this.sessionId,
          eventId: raw.eventId,
        });
        return true;
      }
      this.seenEventIds.add(raw.eventId);
      if (this.seenEventIds.size > SEEN_EVENT_MEMORY) {
        const oldest = this.seenEventIds.values().next();
        if (!oldest.done) {
          this.seenEventIds.delete(oldest.value);
        }
      }
    }

    const last = this.lastSequence;
    if (
      last &&
      (raw.connectionEpoch < last.epoch ||
        (raw.connectionEpoch === last.epoch && raw.sequenceHint < last.hint))
    ) {
      this.log.debug('dropping stale event', {
        sessionId: this.sessionId,
        epoch: raw.connectionEpoch,
        sequenceHint: raw.sequenceHint,
      });
      return true;
    }
    this.lastSequence = { epoch: raw.connectionEpoch, hint: raw.sequenceHint };
    return false;
  }
}
