/**
 * TaskSession - state machine for one automation job
 *
 *   created ──start──▶ running ──▶ completed | failed | cancelled | timed_out
 *      │
 *      └──cancel / idle reclaim──▶ cancelled
 *
 * Responsibilities:
 * - Own the session's event bus and publish status_changed on every transition
 * - Spawn the worker without blocking the caller and capture its outcome
 * - Cooperative cancellation with a grace deadline, after which the session
 *   is forced terminal whether or not the worker acknowledged
 * - Release the worker and close the bus exactly once, on entering a terminal state
 */

import { logger } from '../../config/logger.js';
import { InvalidStateError, getErrorMessage } from '../errors.js';
import type { ArtifactStore } from '../../lib/artifacts/artifact-store.js';
import type { SessionEvent, SessionEventInput } from '../../types/events.js';
import {
  isTerminalState,
  type SessionFailure,
  type SessionOutcome,
  type SessionState,
  type SessionView,
  type TerminalSessionState,
} from '../../types/session.js';
import type { WorkerAdapter, WorkerEventSink, WorkerResult } from '../../types/worker.js';
import { SessionEventBus, type SessionEventBusOptions } from './session-event-bus.js';

/**
 * System- or caller-initiated stop of a running session
 */
export type StopReason = 'cancelled' | 'timed_out';

type WorkerSettlement =
  | { kind: 'result'; result: WorkerResult }
  | { kind: 'crashed'; error: unknown }
  | { kind: 'skipped' };

export interface TaskSessionInit {
  sessionId: string;
  task: string;
  bus: SessionEventBusOptions;
  artifacts: ArtifactStore;
  recentLogLimit: number;
  now: () => number;
}

const STOP_MESSAGES: Record<StopReason, string> = {
  cancelled: 'Cancelled by request',
  timed_out: 'Running time limit exceeded',
};

export class TaskSession {
  readonly sessionId: string;
  readonly task: string;
  readonly createdAt: number;

  private _state: SessionState = 'created';
  private startedAt: number | null = null;
  private finishedAt: number | null = null;
  private outcome: SessionOutcome | null = null;
  private cancelRequested = false;
  private cancelAcknowledged = false;

  private readonly eventBus: SessionEventBus;
  private readonly artifacts: ArtifactStore;
  private readonly recentLogs: SessionEvent<'log'>[] = [];
  private readonly recentLogLimit: number;
  private readonly now: () => number;

  // Live worker handle (only while running)
  private worker?: WorkerAdapter;
  private abortController?: AbortController;
  private execution?: Promise<WorkerSettlement>;
  private pendingStop?: Promise<SessionView>;

  constructor(init: TaskSessionInit) {
    this.sessionId = init.sessionId;
    this.task = init.task;
    this.artifacts = init.artifacts;
    this.recentLogLimit = init.recentLogLimit;
    this.now = init.now;
    this.createdAt = init.now();
    this.eventBus = new SessionEventBus(init.sessionId, init.bus);
  }

  // =========================================================================
  // Commands
  // =========================================================================

  /**
   * created → running. The worker is created and run on a later tick;
   * this method returns as soon as the transition is recorded.
   */
  start(createWorker: () => WorkerAdapter): void {
    if (this._state !== 'created') {
      throw new InvalidStateError(this.sessionId, this._state, 'start');
    }

    this.abortController = new AbortController();
    this.startedAt = this.now();
    this.transition('running');

    logger.info({ sessionId: this.sessionId }, 'Session started');

    this.execution = this.execute(createWorker, this.abortController.signal);
  }

  /**
   * Stop the session.
   *
   * A created session ends immediately. A running session has its worker
   * signalled and is made terminal once the worker settles or the grace
   * period runs out, whichever comes first. Concurrent stops share one
   * teardown. Throws synchronously if the session is already terminal.
   */
  stop(reason: StopReason, graceMs: number): Promise<SessionView> {
    if (isTerminalState(this._state)) {
      throw new InvalidStateError(
        this.sessionId,
        this._state,
        reason === 'timed_out' ? 'time out' : 'cancel'
      );
    }

    if (this.pendingStop) {
      return this.pendingStop;
    }

    this.cancelRequested = true;

    if (this._state === 'created' || !this.execution) {
      this.finish('cancelled', { failure: { kind: 'cancelled', message: 'Cancelled before start' } });
      return Promise.resolve(this.toView());
    }

    logger.info({ sessionId: this.sessionId, reason, graceMs }, 'Stopping session');
    this.abortController?.abort(reason);

    this.pendingStop = this.awaitTeardown(this.execution, reason, graceMs);
    return this.pendingStop;
  }

  /**
   * Drive a never-started session terminal so the registry can drop it
   */
  reclaimIdle(): void {
    if (this._state !== 'created') {
      throw new InvalidStateError(this.sessionId, this._state, 'reclaim');
    }
    this.finish('cancelled', {
      failure: { kind: 'idle_reclaimed', message: 'Session was never started' },
    });
  }

  // =========================================================================
  // Worker Execution
  // =========================================================================

  private async execute(
    createWorker: () => WorkerAdapter,
    signal: AbortSignal
  ): Promise<WorkerSettlement> {
    // Run the worker outside the caller's stack
    await Promise.resolve();

    let settlement: WorkerSettlement;
    if (signal.aborted) {
      settlement = { kind: 'skipped' };
    } else {
      try {
        this.worker = createWorker();
        const result = await this.worker.run(this.task, this.sink, signal);
        settlement = { kind: 'result', result };
      } catch (error) {
        settlement = { kind: 'crashed', error };
      }
    }

    this.settle(settlement, signal);
    return settlement;
  }

  private settle(settlement: WorkerSettlement, signal: AbortSignal): void {
    if (isTerminalState(this._state)) {
      logger.debug({ sessionId: this.sessionId, state: this._state }, 'Worker settled after session ended');
      return;
    }

    // A pending stop owns the transition
    if (signal.aborted) return;

    switch (settlement.kind) {
      case 'result': {
        const { result } = settlement;
        if (result.status === 'succeeded') {
          this.finish('completed', { result: result.result });
        } else {
          this.fail({ kind: 'worker_failure', message: result.error });
        }
        break;
      }
      case 'crashed':
        logger.error({ error: settlement.error, sessionId: this.sessionId }, 'Worker crashed');
        this.fail({ kind: 'internal', message: 'Worker terminated unexpectedly' });
        break;
      case 'skipped':
        break;
    }
  }

  private async awaitTeardown(
    execution: Promise<WorkerSettlement>,
    reason: StopReason,
    graceMs: number
  ): Promise<SessionView> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'deadline'>((resolve) => {
      timer = setTimeout(() => resolve('deadline'), graceMs);
    });

    const winner = await Promise.race([
      execution.then(() => 'settled' as const),
      deadline,
    ]);
    clearTimeout(timer);

    if (!isTerminalState(this._state)) {
      this.cancelAcknowledged = winner === 'settled';
      if (!this.cancelAcknowledged) {
        logger.warn({ sessionId: this.sessionId, reason, graceMs }, 'Worker did not acknowledge stop, forcing');
      }
      this.finish(reason, { failure: { kind: reason, message: STOP_MESSAGES[reason] } });
    }

    return this.toView();
  }

  // =========================================================================
  // Event Sink (handed to the worker)
  // =========================================================================

  private readonly sink: WorkerEventSink = {
    log: (level, message) => {
      this.emit({
        type: 'log',
        payload: { level, message, timestamp: new Date(this.now()).toISOString() },
      });
    },

    screenshot: (image, mimeType = 'image/png') => {
      if (this._state !== 'running') return;

      if (typeof image === 'string') {
        this.emit({
          type: 'screenshot',
          payload: { ref: image, mimeType, byteLength: 0, timestamp: new Date(this.now()).toISOString() },
        });
        return;
      }

      const artifact = this.artifacts.put(this.sessionId, image, mimeType);
      this.emit({
        type: 'screenshot',
        payload: {
          ref: artifact.ref,
          mimeType,
          byteLength: artifact.data.byteLength,
          timestamp: new Date(artifact.createdAt).toISOString(),
        },
      });
    },

    error: (detail) => {
      this.emit({ type: 'error', payload: { detail } });
    },
  };

  /**
   * Worker-originated events are only accepted while running
   */
  private emit(input: SessionEventInput): void {
    if (this._state !== 'running') {
      logger.debug({ sessionId: this.sessionId, type: input.type, state: this._state }, 'Ignoring worker event');
      return;
    }

    const event = this.eventBus.publish(input);
    if (event?.type === 'log') {
      this.recentLogs.push(event);
      if (this.recentLogs.length > this.recentLogLimit) {
        this.recentLogs.shift();
      }
    }
  }

  // =========================================================================
  // Transitions
  // =========================================================================

  private transition(state: SessionState): void {
    this._state = state;
    this.eventBus.publish({ type: 'status_changed', payload: { state } });
  }

  private fail(failure: SessionFailure): void {
    this.eventBus.publish({ type: 'error', payload: { detail: failure.message } });
    this.finish('failed', { failure });
  }

  private finish(state: TerminalSessionState, outcome: SessionOutcome): void {
    this.outcome = copyOutcome(outcome);
    this.finishedAt = this.now();
    this.transition(state);

    logger.info(
      {
        sessionId: this.sessionId,
        state,
        durationMs: this.startedAt === null ? 0 : this.finishedAt - this.startedAt,
      },
      'Session finished'
    );

    this.releaseResources();
  }

  private releaseResources(): void {
    if (this.abortController && !this.abortController.signal.aborted) {
      this.abortController.abort('finished');
    }
    this.abortController = undefined;

    const worker = this.worker;
    this.worker = undefined;
    if (worker) {
      void this.disposeWorker(worker);
    }

    this.eventBus.close();
  }

  private async disposeWorker(worker: WorkerAdapter): Promise<void> {
    try {
      await worker.dispose?.();
    } catch (error) {
      logger.warn({ error: getErrorMessage(error), sessionId: this.sessionId }, 'Worker dispose failed');
    }
  }

  // =========================================================================
  // Queries
  // =========================================================================

  get state(): SessionState {
    return this._state;
  }

  get isTerminal(): boolean {
    return isTerminalState(this._state);
  }

  getEventBus(): SessionEventBus {
    return this.eventBus;
  }

  /** Running longer than the limit and not already being stopped */
  isOverdue(now: number, runningTimeoutMs: number): boolean {
    return (
      this._state === 'running' &&
      !this.pendingStop &&
      this.startedAt !== null &&
      now - this.startedAt >= runningTimeoutMs
    );
  }

  isIdle(now: number, createdIdleMs: number): boolean {
    return this._state === 'created' && now - this.createdAt >= createdIdleMs;
  }

  isExpired(now: number, retentionMs: number): boolean {
    return this.finishedAt !== null && now - this.finishedAt >= retentionMs;
  }

  toView(): SessionView {
    return {
      sessionId: this.sessionId,
      task: this.task,
      state: this._state,
      createdAt: this.createdAt,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      outcome: this.outcome && copyOutcome(this.outcome),
      cancelRequested: this.cancelRequested,
      cancelAcknowledged: this.cancelAcknowledged,
      subscriberCount: this.eventBus.subscriberCount,
      lastSeq: this.eventBus.lastSeq,
      recentLogs: [...this.recentLogs],
    };
  }
}

/**
 * Neither the worker nor a view shares the stored outcome. Results that
 * cannot be cloned (functions, for one) are kept and handed out as-is.
 */
function copyOutcome(outcome: SessionOutcome): SessionOutcome {
  if ('failure' in outcome) {
    return { failure: { ...outcome.failure } };
  }

  try {
    return { result: structuredClone(outcome.result) };
  } catch {
    return { result: outcome.result };
  }
}
