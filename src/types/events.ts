/**
 * Session Event Schema
 *
 * A single event structure flows unchanged from worker → event bus → gateway → client:
 * { type, seq, payload, context }
 *
 * - type: event type ('status_changed', 'log', 'screenshot', 'error')
 * - seq: per-session sequence number, strictly increasing from 1
 * - payload: event-specific data
 * - context: sessionId and emission timestamp
 *
 * 'gap' is never published. Each subscription synthesizes it when its queue
 * overflows, so it only exists on the delivery side.
 */

import type { SessionState } from './session.js';

// ============================================================================
// Event Context
// ============================================================================

export interface SessionEventContext {
  sessionId: string;

  /** ISO timestamp when the event was created */
  timestamp: string;
}

// ============================================================================
// Event Payloads - Single Source of Truth
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export interface SessionEventPayloads {
  'status_changed': {
    state: SessionState;
  };

  'log': {
    level: LogLevel;
    message: string;
    timestamp: string;
  };

  /**
   * Screenshot bytes live in the ArtifactStore; the event carries the reference
   */
  'screenshot': {
    ref: string;
    mimeType: string;
    byteLength: number;
    timestamp: string;
  };

  'error': {
    detail: string;
  };
}

export type SessionEventType = keyof SessionEventPayloads;

export const SESSION_EVENT_TYPES = [
  'status_changed',
  'log',
  'screenshot',
  'error',
] as const satisfies readonly SessionEventType[];

export interface SessionEvent<K extends SessionEventType = SessionEventType> {
  readonly type: K;
  readonly seq: number;
  readonly payload: Readonly<SessionEventPayloads[K]>;
  readonly context: Readonly<SessionEventContext>;
}

/**
 * Discriminated union of every published event
 */
export type AnySessionEvent = {
  [K in SessionEventType]: SessionEvent<K>;
}[SessionEventType];

// ============================================================================
// Gap Marker
// ============================================================================

/**
 * Synthetic marker telling one subscriber that events fromSeq..toSeq
 * (inclusive) were not delivered to it. seq equals toSeq so a subscriber's
 * stream stays strictly increasing.
 */
export interface GapMarker {
  readonly type: 'gap';
  readonly seq: number;
  readonly payload: Readonly<{
    fromSeq: number;
    toSeq: number;
    count: number;
  }>;
  readonly context: Readonly<SessionEventContext>;
}

/**
 * What a subscriber actually receives
 */
export type StreamItem = AnySessionEvent | GapMarker;

// ============================================================================
// Factories
// ============================================================================

/**
 * What a publisher hands to the bus: type and payload, before seq and context are assigned
 */
export type SessionEventInput = {
  [K in SessionEventType]: { type: K; payload: SessionEventPayloads[K] };
}[SessionEventType];

export function createSessionEvent(
  input: SessionEventInput,
  seq: number,
  sessionId: string,
): AnySessionEvent {
  Object.freeze(input.payload);
  return Object.freeze({
    ...input,
    seq,
    context: Object.freeze({ sessionId, timestamp: new Date().toISOString() }),
  });
}

export function createGapMarker(sessionId: string, fromSeq: number, toSeq: number): GapMarker {
  return Object.freeze({
    type: 'gap',
    seq: toSeq,
    payload: Object.freeze({ fromSeq, toSeq, count: toSeq - fromSeq + 1 }),
    context: Object.freeze({ sessionId, timestamp: new Date().toISOString() }),
  });
}

export function isGapMarker(item: StreamItem): item is GapMarker {
  return item.type === 'gap';
}

// ============================================================================
// Socket.IO Event Maps
// ============================================================================

export interface AttachResponse {
  success: boolean;
  error?: string;
  code?: string;
}

export interface ServerToClientEvents {
  /**
   * Every stream item for an attached session, in seq order
   */
  'session:event': (item: StreamItem) => void;

  /**
   * The session reached a terminal state and its stream has drained
   */
  'session:end': (data: { sessionId: string; state: SessionState }) => void;

  /**
   * Connection-level error (not tied to one stream item)
   */
  'error': (error: {
    message: string;
    code?: string;
    sessionId?: string;
  }) => void;
}

export interface ClientToServerEvents {
  'session:attach': (
    sessionId: string,
    callback: (response: AttachResponse) => void
  ) => void;

  'session:detach': (
    sessionId: string,
    callback: (response: { success: boolean }) => void
  ) => void;
}

export interface InterServerEvents {
  // Reserved for adapter-based multi-server coordination
}

export interface SocketData {
  joinedAt?: number;
}
