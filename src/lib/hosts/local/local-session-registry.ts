/**
 * LocalSessionRegistry - In-memory session registry
 *
 * Owns the session table for single-process deployments. Every
 * check-then-mutate sequence (capacity check + insert, state check +
 * transition) runs synchronously on the event loop with no await in between,
 * so concurrent create/start/cancel calls cannot overshoot the limit or
 * double-start a session.
 *
 * A recurring ticker enforces the running timeout and sweeps sessions past
 * their retention window.
 */

import { randomUUID } from 'crypto';
import { logger } from '../../../config/logger.js';
import { CapacityExceededError, NotFoundError, ShuttingDownError, getErrorMessage } from '../../../core/errors.js';
import type { SessionRegistry } from '../../../core/host/session-registry.js';
import type { SessionEventBus } from '../../../core/session/session-event-bus.js';
import { TaskSession } from '../../../core/session/task-session.js';
import { resolveRegistryConfig, type RegistryConfig } from '../../../types/runtime.js';
import type { SessionView } from '../../../types/session.js';
import type { WorkerFactory } from '../../../types/worker.js';
import { InMemoryArtifactStore, type Artifact, type ArtifactStore } from '../../artifacts/artifact-store.js';

export interface LocalSessionRegistryDeps {
  createWorker: WorkerFactory;
  config?: Partial<RegistryConfig>;
  artifacts?: ArtifactStore;
  now?: () => number;
}

export class LocalSessionRegistry implements SessionRegistry {
  // Session table, insertion order = creation order
  private readonly sessions = new Map<string, TaskSession>();

  // Dependencies
  private readonly createWorker: WorkerFactory;
  private readonly config: RegistryConfig;
  private readonly artifacts: ArtifactStore;
  private readonly now: () => number;

  private ticker?: NodeJS.Timeout;
  private shuttingDown = false;

  constructor(deps: LocalSessionRegistryDeps) {
    this.createWorker = deps.createWorker;
    this.config = resolveRegistryConfig(deps.config);
    this.now = deps.now ?? Date.now;
    this.artifacts = deps.artifacts ?? new InMemoryArtifactStore({ now: this.now });
    logger.info({ config: this.config }, 'LocalSessionRegistry initialized');
  }

  // ==========================================================================
  // Commands (SessionRegistry interface)
  // ==========================================================================

  create(task: string): SessionView {
    // Nothing would time out or sweep a session admitted now
    if (this.shuttingDown) {
      logger.warn('Rejecting session create, registry is shutting down');
      throw new ShuttingDownError();
    }

    const active = this.getActiveCount();
    if (active >= this.config.maxConcurrentSessions) {
      logger.warn(
        { active, limit: this.config.maxConcurrentSessions },
        'Rejecting session create, capacity reached'
      );
      throw new CapacityExceededError(this.config.maxConcurrentSessions);
    }

    const session = new TaskSession({
      sessionId: randomUUID(),
      task,
      bus: {
        bufferSize: this.config.eventBufferSize,
        queueDepth: this.config.subscriberQueueDepth,
      },
      artifacts: this.artifacts,
      recentLogLimit: this.config.recentLogLimit,
      now: this.now,
    });
    this.sessions.set(session.sessionId, session);

    logger.info(
      { sessionId: session.sessionId, activeCount: active + 1 },
      'Session created'
    );

    return session.toView();
  }

  start(sessionId: string): SessionView {
    const session = this.require(sessionId);
    session.start(() => this.createWorker({ sessionId, task: session.task }));
    return session.toView();
  }

  cancel(sessionId: string): Promise<SessionView> {
    const session = this.require(sessionId);
    logger.info({ sessionId, state: session.state }, 'Cancel requested');
    return session.stop('cancelled', this.config.cancelGraceMs);
  }

  async remove(sessionId: string): Promise<void> {
    const session = this.require(sessionId);

    if (!session.isTerminal) {
      await session.stop('cancelled', this.config.cancelGraceMs);
    }

    this.sessions.delete(sessionId);
    logger.info({ sessionId, sessionCount: this.sessions.size }, 'Session removed');
  }

  get(sessionId: string): SessionView {
    return this.require(sessionId).toView();
  }

  list(): Iterable<SessionView> {
    return {
      [Symbol.iterator]: () => this.iterateViews(),
    };
  }

  // ==========================================================================
  // Background Policies
  // ==========================================================================

  enforceTimeouts(now: number = this.now()): number {
    let signalled = 0;

    for (const session of this.sessions.values()) {
      if (!session.isOverdue(now, this.config.runningTimeoutMs)) continue;

      logger.warn(
        { sessionId: session.sessionId, runningTimeoutMs: this.config.runningTimeoutMs },
        'Session exceeded running timeout'
      );

      session.stop('timed_out', this.config.cancelGraceMs).catch((error: unknown) => {
        logger.error({ error: getErrorMessage(error), sessionId: session.sessionId }, 'Failed to time out session');
      });
      signalled++;
    }

    return signalled;
  }

  sweep(now: number = this.now()): number {
    let removed = 0;

    for (const [sessionId, session] of this.sessions) {
      if (session.isIdle(now, this.config.createdIdleMs)) {
        session.reclaimIdle();
        this.sessions.delete(sessionId);
        removed++;
        logger.info({ sessionId }, 'Reclaimed idle session');
        continue;
      }

      if (session.isTerminal && session.isExpired(now, this.config.sessionRetentionMs)) {
        this.sessions.delete(sessionId);
        removed++;
        logger.debug({ sessionId, state: session.state }, 'Swept terminal session');
      }
    }

    const artifactsRemoved = this.artifacts.sweep(now);

    if (removed > 0 || artifactsRemoved > 0) {
      logger.info(
        { removed, artifactsRemoved, sessionCount: this.sessions.size },
        'Sweep complete'
      );
    }

    return removed;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getEventBus(sessionId: string): SessionEventBus {
    return this.require(sessionId).getEventBus();
  }

  getArtifact(ref: string): Artifact | undefined {
    return this.artifacts.get(ref);
  }

  getActiveCount(): number {
    let active = 0;
    for (const session of this.sessions.values()) {
      if (!session.isTerminal) active++;
    }
    return active;
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  initialize(): void {
    if (this.ticker) return;

    this.ticker = setInterval(() => {
      this.enforceTimeouts();
      this.sweep();
    }, this.config.sweepIntervalMs);
    this.ticker.unref();

    logger.info({ sweepIntervalMs: this.config.sweepIntervalMs }, 'Session ticker started');
  }

  async shutdown(): Promise<void> {
    this.shuttingDown = true;

    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = undefined;
    }

    const active = [...this.sessions.values()].filter((session) => !session.isTerminal);
    logger.info({ activeCount: active.length }, 'Shutting down LocalSessionRegistry...');

    const results = await Promise.allSettled(
      active.map((session) => session.stop('cancelled', this.config.cancelGraceMs))
    );
    for (const [index, result] of results.entries()) {
      if (result.status === 'rejected') {
        logger.error(
          { error: getErrorMessage(result.reason), sessionId: active[index]?.sessionId },
          'Failed to cancel session during shutdown'
        );
      }
    }

    logger.info('LocalSessionRegistry shutdown complete');
  }

  isHealthy(): boolean {
    return !this.shuttingDown;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private require(sessionId: string): TaskSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError(sessionId);
    }
    return session;
  }

  private *iterateViews(): Generator<SessionView> {
    const snapshot = [...this.sessions.values()].sort((a, b) => a.createdAt - b.createdAt);
    for (const session of snapshot) {
      yield session.toView();
    }
  }
}
