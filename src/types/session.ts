/**
 * Session data types
 *
 * Shapes returned to callers of the registry and the REST API.
 * Sessions are process-local; nothing here is persisted.
 */

import type { SessionEvent } from './events.js';

// ============================================================================
// Lifecycle States
// ============================================================================

export const SESSION_STATES = [
  'created',
  'running',
  'completed',
  'failed',
  'cancelled',
  'timed_out',
] as const;

export type SessionState = (typeof SESSION_STATES)[number];

export type TerminalSessionState = Exclude<SessionState, 'created' | 'running'>;

export const TERMINAL_STATES: ReadonlySet<SessionState> = new Set<SessionState>([
  'completed',
  'failed',
  'cancelled',
  'timed_out',
]);

export function isTerminalState(state: SessionState): state is TerminalSessionState {
  return TERMINAL_STATES.has(state);
}

// ============================================================================
// Outcome
// ============================================================================

/**
 * Why a session ended without completing.
 *
 * - worker_failure: the worker reported an unrecoverable task error
 * - internal: the worker threw or rejected instead of returning a result
 * - cancelled: caller-initiated cancel
 * - timed_out: the running timeout elapsed
 * - idle_reclaimed: a created session was never started
 */
export type SessionFailureKind =
  | 'worker_failure'
  | 'internal'
  | 'cancelled'
  | 'timed_out'
  | 'idle_reclaimed';

export interface SessionFailure {
  kind: SessionFailureKind;
  message: string;
}

export type SessionOutcome =
  | { result: unknown }
  | { failure: SessionFailure };

// ============================================================================
// Session View
// ============================================================================

/**
 * Read-only snapshot of a session
 */
export interface SessionView {
  sessionId: string;
  task: string;
  state: SessionState;
  createdAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  outcome: SessionOutcome | null;
  cancelRequested: boolean;
  /** True when the worker settled before the cancel grace deadline */
  cancelAcknowledged: boolean;
  subscriberCount: number;
  lastSeq: number;
  /** Most recent log events, oldest first */
  recentLogs: SessionEvent<'log'>[];
}
