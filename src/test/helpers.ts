/**
 * Shared test fakes
 */

import type { WorkerAdapter, WorkerEventSink, WorkerFactory, WorkerResult } from '../types/worker.js';

type AbortBehaviour = 'acknowledge' | 'ignore';

/**
 * Worker driven step by step from the test.
 *
 * With onAbort 'acknowledge' the run settles as soon as the signal fires;
 * with 'ignore' it stays pending until the test settles it.
 */
export class ControlledWorker implements WorkerAdapter {
  sink?: WorkerEventSink;
  signal?: AbortSignal;
  task?: string;

  disposed = 0;

  private settleRun?: (outcome: { result: WorkerResult } | { error: unknown }) => void;
  private readonly runStarted: Promise<void>;
  private markStarted?: () => void;

  constructor(private readonly onAbort: AbortBehaviour = 'acknowledge') {
    this.runStarted = new Promise((resolve) => {
      this.markStarted = resolve;
    });
  }

  run(task: string, sink: WorkerEventSink, signal: AbortSignal): Promise<WorkerResult> {
    this.task = task;
    this.sink = sink;
    this.signal = signal;

    const settled = new Promise<WorkerResult>((resolve, reject) => {
      this.settleRun = (outcome) => {
        if ('result' in outcome) resolve(outcome.result);
        else reject(outcome.error);
      };
    });

    if (this.onAbort === 'acknowledge') {
      signal.addEventListener('abort', () => this.fail('Stopped'));
    }

    this.markStarted?.();
    return settled;
  }

  /** Resolves once run() has been called */
  started(): Promise<void> {
    return this.runStarted;
  }

  complete(result: unknown = null): void {
    this.settleRun?.({ result: { status: 'succeeded', result } });
  }

  fail(error: string): void {
    this.settleRun?.({ result: { status: 'failed', error } });
  }

  crash(error: unknown = new Error('boom')): void {
    this.settleRun?.({ error });
  }

  dispose(): void {
    this.disposed++;
  }
}

/**
 * Factory handing out ControlledWorkers, keyed by session id
 */
export function controlledWorkerFactory(onAbort: AbortBehaviour = 'acknowledge'): {
  factory: WorkerFactory;
  workers: Map<string, ControlledWorker>;
} {
  const workers = new Map<string, ControlledWorker>();
  const factory: WorkerFactory = ({ sessionId }) => {
    const worker = new ControlledWorker(onAbort);
    workers.set(sessionId, worker);
    return worker;
  };
  return { factory, workers };
}

/**
 * Let queued microtasks and one macrotask turn run
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Clock the test advances by hand
 */
export class ManualClock {
  constructor(private current = 1_000_000) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}
