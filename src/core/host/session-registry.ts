/**
 * SessionRegistry Interface - the single authority over session identity,
 * admission control and lifecycle bookkeeping
 *
 * Only the registry mutates session state. Transports (REST, Socket.IO, SSE)
 * call these commands and map the thrown SessionRuntimeErrors onto their
 * own error shapes.
 */

import type { SessionEventBus } from '../session/session-event-bus.js';
import type { Artifact } from '../../lib/artifacts/artifact-store.js';
import type { SessionView } from '../../types/session.js';

export interface SessionRegistry {
  /** Admit a new session in `created`. Throws CapacityExceededError or ShuttingDownError. */
  create(task: string): SessionView;

  /** created → running; the worker is spawned without waiting on it */
  start(sessionId: string): SessionView;

  /**
   * Cancel a created or running session.
   * NotFound / InvalidState are thrown synchronously; the promise resolves
   * once the worker acknowledged or the grace deadline forced the state.
   */
  cancel(sessionId: string): Promise<SessionView>;

  /** Cancel if still active, then drop the session from the table */
  remove(sessionId: string): Promise<void>;

  get(sessionId: string): SessionView;

  /** Lazy snapshot in creation order; iterating again takes a fresh snapshot */
  list(): Iterable<SessionView>;

  /** Time out overdue running sessions; returns how many were signalled */
  enforceTimeouts(now?: number): number;

  /** Reclaim expired terminal and idle created sessions; returns how many were removed */
  sweep(now?: number): number;

  getEventBus(sessionId: string): SessionEventBus;

  getArtifact(ref: string): Artifact | undefined;

  /** Sessions not yet in a terminal state */
  getActiveCount(): number;

  getSessionCount(): number;

  /** Start the timeout/sweep ticker */
  initialize(): void;

  /** Stop the ticker and cancel everything still active */
  shutdown(): Promise<void>;

  isHealthy(): boolean;
}
