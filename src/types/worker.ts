/**
 * Worker Adapter - the seam between the orchestration core and whatever
 * actually performs a task (browser automation, model-driven agent, ...)
 *
 * The core never inspects task semantics. A worker pushes progress into the
 * sink, observes the abort signal cooperatively, and resolves with a result.
 */

import type { LogLevel } from './events.js';

export type WorkerResult =
  | { status: 'succeeded'; result: unknown }
  | { status: 'failed'; error: string };

/**
 * Screenshot input accepted by the sink.
 * Raw bytes are stored in the ArtifactStore; a string is taken as an existing reference.
 */
export type ScreenshotInput = Uint8Array | string;

export interface WorkerEventSink {
  log(level: LogLevel, message: string): void;
  screenshot(image: ScreenshotInput, mimeType?: string): void;
  error(detail: string): void;
}

export interface WorkerAdapter {
  run(task: string, sink: WorkerEventSink, signal: AbortSignal): Promise<WorkerResult>;

  /**
   * Release whatever the worker holds (browser, page, sockets).
   * Called once the session is terminal, whether or not run() has settled.
   */
  dispose?(): void | Promise<void>;
}

/**
 * Creates one adapter per started session
 */
export type WorkerFactory = (session: { sessionId: string; task: string }) => WorkerAdapter;
