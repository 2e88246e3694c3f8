/**
 * Session Stream Runtime - Public API
 *
 * Admits, runs, cancels and times out long-running automation sessions and
 * streams their events to any number of observers.
 *
 * @example
 * ```typescript
 * import { createSessionRuntime } from 'session-stream-runtime';
 *
 * const runtime = createSessionRuntime({ createWorker: (session) => new MyBrowserWorker(session) });
 * await runtime.start();
 *
 * const app = runtime.createRestServer();
 * ```
 */

// ============================================================================
// Runtime Factory
// ============================================================================

export { createSessionRuntime } from './runtime.js';
export type { SessionRuntime, RuntimeConfig } from './runtime.js';

// ============================================================================
// Core Types
// ============================================================================

export type {
  // Session model
  SessionState,
  TerminalSessionState,
  SessionFailureKind,
  SessionFailure,
  SessionOutcome,
  SessionView,

  // Event types
  LogLevel,
  SessionEventType,
  SessionEventPayloads,
  SessionEvent,
  AnySessionEvent,
  GapMarker,
  StreamItem,
  ServerToClientEvents,
  ClientToServerEvents,
  InterServerEvents,
  SocketData,
  AttachResponse,

  // Worker seam
  WorkerAdapter,
  WorkerEventSink,
  WorkerFactory,
  WorkerResult,
  ScreenshotInput,

  // Configuration
  RegistryConfig,
  TransportOptions,
} from './types/index.js';

export {
  SESSION_STATES,
  SESSION_EVENT_TYPES,
  DEFAULT_REGISTRY_CONFIG,
  isTerminalState,
  isGapMarker,
} from './types/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  SessionRuntimeError,
  NotFoundError,
  InvalidStateError,
  CapacityExceededError,
  ShuttingDownError,
  isSessionRuntimeError,
} from './core/errors.js';
export type { SessionErrorCode } from './core/errors.js';

// ============================================================================
// Core Building Blocks (for advanced use cases)
// ============================================================================

export { SessionEventBus, Subscription, TaskSession } from './core/session/index.js';
export { StreamingGateway, MockClientConnection } from './core/host/index.js';
export type { SessionRegistry, Attachment, ClientConnection, StreamEndInfo } from './core/host/index.js';
export { LocalSessionRegistry, attachLocalTransport } from './lib/hosts/local/index.js';
export type { SocketIOServerInstance } from './lib/hosts/local/index.js';
export { InMemoryArtifactStore } from './lib/artifacts/artifact-store.js';
export type { Artifact, ArtifactStore } from './lib/artifacts/artifact-store.js';

// ============================================================================
// REST Server (for custom setups)
// ============================================================================

export { createRestServer, errorResponse } from './transport/rest/server.js';

// ============================================================================
// Workers
// ============================================================================

export { ScriptedWorker, createScriptedWorkerFactory } from './lib/workers/scripted/index.js';
export type { ScriptedWorkerOptions } from './lib/workers/scripted/index.js';
