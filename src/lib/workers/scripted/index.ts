/**
 * Scripted Worker - stand-in automation engine for demos and local runs
 *
 * Splits the task description into steps and walks through them on a timer,
 * logging progress and capturing a placeholder screenshot every
 * `screenshotIntervalMs`. Honors the abort signal between and during steps.
 *
 * @example
 * ```typescript
 * const runtime = createSessionRuntime({
 *   createWorker: createScriptedWorkerFactory({ stepDelayMs: 250 }),
 * });
 * ```
 */

import { setTimeout as delay } from 'timers/promises';
import type { WorkerAdapter, WorkerEventSink, WorkerFactory, WorkerResult } from '../../../types/worker.js';

// 1x1 transparent PNG
const PLACEHOLDER_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=',
  'base64'
);

const STEP_SEPARATOR = /\s*(?:[;\n]|\.(?=\s|$)|\bthen\b)\s*/i;

export interface ScriptedWorkerOptions {
  /** Time spent on each step */
  stepDelayMs?: number;

  /** Period between placeholder screenshots */
  screenshotIntervalMs?: number;
}

export function splitTaskIntoSteps(task: string): string[] {
  const steps = task
    .split(STEP_SEPARATOR)
    .map((step) => step.trim())
    .filter((step) => step.length > 0);

  return steps.length > 0 ? steps : [task.trim()];
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export class ScriptedWorker implements WorkerAdapter {
  private readonly stepDelayMs: number;
  private readonly screenshotIntervalMs: number;
  private screenshotTimer?: NodeJS.Timeout;

  constructor(options: ScriptedWorkerOptions = {}) {
    this.stepDelayMs = options.stepDelayMs ?? 1000;
    this.screenshotIntervalMs = options.screenshotIntervalMs ?? 2000;
  }

  async run(task: string, sink: WorkerEventSink, signal: AbortSignal): Promise<WorkerResult> {
    const steps = splitTaskIntoSteps(task);

    sink.log('info', 'Starting browser automation...');
    sink.log('info', `Starting task: ${task}`);
    sink.screenshot(PLACEHOLDER_PNG, 'image/png');

    this.screenshotTimer = setInterval(() => {
      sink.screenshot(PLACEHOLDER_PNG, 'image/png');
    }, this.screenshotIntervalMs);

    try {
      for (const [index, step] of steps.entries()) {
        sink.log('info', `Step ${index + 1}/${steps.length}: ${step}`);
        await delay(this.stepDelayMs, undefined, { signal });
      }
    } catch (error) {
      if (isAbortError(error)) {
        sink.log('warn', 'Task stopped before completion');
        return { status: 'failed', error: 'Stopped' };
      }
      throw error;
    } finally {
      this.stopScreenshots();
    }

    const summary = `Completed ${steps.length} step${steps.length === 1 ? '' : 's'}`;
    sink.log('success', `Task completed: ${summary}`);
    return { status: 'succeeded', result: { steps, summary } };
  }

  dispose(): void {
    this.stopScreenshots();
  }

  private stopScreenshots(): void {
    if (this.screenshotTimer) {
      clearInterval(this.screenshotTimer);
      this.screenshotTimer = undefined;
    }
  }
}

export function createScriptedWorkerFactory(options: ScriptedWorkerOptions = {}): WorkerFactory {
  return () => new ScriptedWorker(options);
}
