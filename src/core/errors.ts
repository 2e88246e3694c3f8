/**
 * Command errors
 *
 * Thrown synchronously by registry commands and never affect other sessions.
 * Worker failures, timeouts and stream gaps are not errors: they are stored
 * as session outcome or delivered in band.
 */

import type { SessionState } from '../types/session.js';

export type SessionErrorCode =
  | 'SESSION_NOT_FOUND'
  | 'INVALID_SESSION_STATE'
  | 'CAPACITY_EXCEEDED'
  | 'REGISTRY_SHUTTING_DOWN';

export abstract class SessionRuntimeError extends Error {
  abstract readonly code: SessionErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /** Extra fields surfaced to clients alongside the message */
  details(): Record<string, unknown> {
    return {};
  }
}

export class NotFoundError extends SessionRuntimeError {
  readonly code = 'SESSION_NOT_FOUND';

  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
  }

  override details(): Record<string, unknown> {
    return { sessionId: this.sessionId };
  }
}

export class InvalidStateError extends SessionRuntimeError {
  readonly code = 'INVALID_SESSION_STATE';

  constructor(
    readonly sessionId: string,
    readonly currentState: SessionState,
    readonly command: string,
  ) {
    super(`Cannot ${command} session ${sessionId} in state ${currentState}`);
  }

  override details(): Record<string, unknown> {
    return { sessionId: this.sessionId, currentState: this.currentState };
  }
}

export class CapacityExceededError extends SessionRuntimeError {
  readonly code = 'CAPACITY_EXCEEDED';

  constructor(readonly limit: number) {
    super(`Concurrent session limit of ${limit} reached`);
  }

  override details(): Record<string, unknown> {
    return { limit: this.limit };
  }
}

export class ShuttingDownError extends SessionRuntimeError {
  readonly code = 'REGISTRY_SHUTTING_DOWN';

  constructor() {
    super('Session registry is shutting down');
  }
}

export function isSessionRuntimeError(error: unknown): error is SessionRuntimeError {
  return error instanceof SessionRuntimeError;
}

/**
 * Extract error message from unknown error object
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Internal server error';
}
