export type {
  SessionState,
  TerminalSessionState,
  SessionFailureKind,
  SessionFailure,
  SessionOutcome,
  SessionView,
} from './session.js';
export { SESSION_STATES, TERMINAL_STATES, isTerminalState } from './session.js';

export type {
  LogLevel,
  SessionEventContext,
  SessionEventPayloads,
  SessionEventType,
  SessionEventInput,
  SessionEvent,
  AnySessionEvent,
  GapMarker,
  StreamItem,
  AttachResponse,
  ServerToClientEvents,
  ClientToServerEvents,
  InterServerEvents,
  SocketData,
} from './events.js';
export {
  SESSION_EVENT_TYPES,
  createSessionEvent,
  createGapMarker,
  isGapMarker,
} from './events.js';

export type {
  WorkerResult,
  ScreenshotInput,
  WorkerEventSink,
  WorkerAdapter,
  WorkerFactory,
} from './worker.js';

export type { RegistryConfig, RuntimeConfig, TransportOptions } from './runtime.js';
export { DEFAULT_REGISTRY_CONFIG, resolveRegistryConfig } from './runtime.js';
