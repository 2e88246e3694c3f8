/**
 * Runtime configuration types
 */

import type { ArtifactStore } from '../lib/artifacts/artifact-store.js';
import type { WorkerFactory } from './worker.js';

// ============================================================================
// Registry Configuration
// ============================================================================

export interface RegistryConfig {
  /** Non-terminal sessions admitted at once */
  maxConcurrentSessions: number;

  /** Wall-clock limit measured from entry into `running` */
  runningTimeoutMs: number;

  /** How long cancel waits for the worker before forcing the session terminal */
  cancelGraceMs: number;

  /** `created` sessions idle longer than this are reclaimed by sweep */
  createdIdleMs: number;

  /** Terminal sessions are kept this long before sweep removes them */
  sessionRetentionMs: number;

  /** Per-subscriber undelivered event limit before gap markers kick in */
  subscriberQueueDepth: number;

  /** Events retained per session for late subscribers */
  eventBufferSize: number;

  /** Ticker period for timeout enforcement and sweep */
  sweepIntervalMs: number;

  /** Log events included in SessionView.recentLogs */
  recentLogLimit: number;
}

export const DEFAULT_REGISTRY_CONFIG: RegistryConfig = {
  maxConcurrentSessions: 10,
  runningTimeoutMs: 30 * 60 * 1000,
  cancelGraceMs: 10 * 1000,
  createdIdleMs: 60 * 60 * 1000,
  sessionRetentionMs: 24 * 60 * 60 * 1000,
  subscriberQueueDepth: 256,
  eventBufferSize: 1000,
  sweepIntervalMs: 1000,
  recentLogLimit: 50,
};

export function resolveRegistryConfig(overrides: Partial<RegistryConfig> = {}): RegistryConfig {
  return { ...DEFAULT_REGISTRY_CONFIG, ...overrides };
}

// ============================================================================
// Runtime Configuration
// ============================================================================

/**
 * Everything createSessionRuntime needs.
 *
 * @example
 * const runtime = createSessionRuntime({
 *   createWorker: createScriptedWorkerFactory(),
 *   registry: { maxConcurrentSessions: 4 },
 * });
 */
export interface RuntimeConfig {
  /** Builds the worker for each started session */
  createWorker: WorkerFactory;

  /** Registry limits and windows (defaults apply per field) */
  registry?: Partial<RegistryConfig>;

  /** Screenshot storage; defaults to an in-memory store with 24h retention */
  artifacts?: ArtifactStore;

  /** Injectable clock, mostly for tests */
  now?: () => number;

  /** Socket.IO transport options */
  transport?: TransportOptions;

  /** Allowed CORS origin(s) for REST and Socket.IO */
  corsOrigin?: string | string[];
}

export interface TransportOptions {
  cors?: {
    origin: string | string[];
    credentials?: boolean;
  };

  /**
   * Socket.IO path
   * @default '/socket.io'
   */
  path?: string;
}
