import { describe, it, expect } from 'vitest';
import { InvalidStateError } from '../errors.js';
import { InMemoryArtifactStore } from '../../lib/artifacts/artifact-store.js';
import type { StreamItem } from '../../types/events.js';
import type { SessionState } from '../../types/session.js';
import { ControlledWorker, ManualClock, flush } from '../../test/helpers.js';
import { TaskSession } from './task-session.js';

function createSession(options: { recentLogLimit?: number; clock?: ManualClock } = {}) {
  const clock = options.clock ?? new ManualClock();
  const artifacts = new InMemoryArtifactStore({ now: clock.now });
  const session = new TaskSession({
    sessionId: 'session-1',
    task: 'open example.com then read the title',
    bus: { bufferSize: 1000, queueDepth: 256 },
    artifacts,
    recentLogLimit: options.recentLogLimit ?? 50,
    now: clock.now,
  });
  return { session, artifacts, clock };
}

async function collect(session: TaskSession): Promise<StreamItem[]> {
  const subscription = session.getEventBus().subscribe();
  const items: StreamItem[] = [...subscription.backlog];
  for await (const item of subscription) items.push(item);
  return items;
}

async function startRunning(session: TaskSession, worker: ControlledWorker): Promise<void> {
  session.start(() => worker);
  await worker.started();
}

describe('TaskSession', () => {
  it('streams status, log and screenshot events in order for a completed run', async () => {
    const { session, artifacts } = createSession();
    const worker = new ControlledWorker();
    const stream = collect(session);

    await startRunning(session, worker);
    worker.sink?.log('info', 'start');
    worker.sink?.screenshot(new Uint8Array([1, 2, 3]));
    worker.sink?.log('info', 'done');
    worker.complete({ title: 'Example Domain' });

    const items = await stream;

    expect(items.map((item) => item.type)).toEqual([
      'status_changed',
      'log',
      'screenshot',
      'log',
      'status_changed',
    ]);
    expect(items.map((item) => item.seq)).toEqual([1, 2, 3, 4, 5]);
    expect(items[0]).toMatchObject({ payload: { state: 'running' } });
    expect(items[1]).toMatchObject({ payload: { level: 'info', message: 'start' } });
    expect(items[3]).toMatchObject({ payload: { message: 'done' } });
    expect(items[4]).toMatchObject({ payload: { state: 'completed' } });

    const screenshot = items[2];
    if (screenshot?.type !== 'screenshot') throw new Error('expected screenshot');
    expect(screenshot.payload).toMatchObject({ mimeType: 'image/png', byteLength: 3 });
    expect(artifacts.get(screenshot.payload.ref)?.data).toEqual(new Uint8Array([1, 2, 3]));

    const view = session.toView();
    expect(view.state).toBe('completed');
    expect(view.outcome).toEqual({ result: { title: 'Example Domain' } });
    expect(view.recentLogs.map((event) => event.payload.message)).toEqual(['start', 'done']);
    expect(worker.disposed).toBe(1);
    expect(worker.signal?.aborted).toBe(true);
  });

  it('passes a string screenshot through as an existing reference', async () => {
    const { session } = createSession();
    const worker = new ControlledWorker();

    await startRunning(session, worker);
    worker.sink?.screenshot('external-ref', 'image/jpeg');

    const [, screenshot] = session.getEventBus().getRetained();
    expect(screenshot).toMatchObject({
      type: 'screenshot',
      payload: { ref: 'external-ref', mimeType: 'image/jpeg', byteLength: 0 },
    });
  });

  it('records a worker failure with an error event', async () => {
    const { session } = createSession();
    const worker = new ControlledWorker();

    await startRunning(session, worker);
    worker.fail('Page not found');
    await flush();

    expect(session.state).toBe('failed');
    expect(session.toView().outcome).toEqual({
      failure: { kind: 'worker_failure', message: 'Page not found' },
    });
    const types = session.getEventBus().getRetained().map((event) => event.type);
    expect(types).toEqual(['status_changed', 'error', 'status_changed']);
  });

  it('hands out outcome copies that cannot change the stored outcome', async () => {
    const { session } = createSession();
    const worker = new ControlledWorker();

    await startRunning(session, worker);
    worker.fail('Page not found');
    await flush();

    const view = session.toView();
    if (view.outcome === null || !('failure' in view.outcome)) throw new Error('expected a failure outcome');
    view.outcome.failure.message = 'rewritten';

    expect(session.toView().outcome).toEqual({
      failure: { kind: 'worker_failure', message: 'Page not found' },
    });
  });

  it('hands out copies of a structured result', async () => {
    const { session } = createSession();
    const worker = new ControlledWorker();
    const result = { title: 'Example Domain', links: ['a'] };

    await startRunning(session, worker);
    worker.complete(result);
    await flush();

    const view = session.toView();
    if (view.outcome === null || !('result' in view.outcome)) throw new Error('expected a result outcome');
    expect(view.outcome.result).toEqual(result);
    expect(view.outcome.result).not.toBe(result);

    result.links.push('b');
    expect(session.toView().outcome).toEqual({ result: { title: 'Example Domain', links: ['a'] } });
  });

  it('turns a worker crash into an internal failure', async () => {
    const { session } = createSession();
    const worker = new ControlledWorker();

    await startRunning(session, worker);
    worker.crash(new Error('socket hang up'));
    await flush();

    expect(session.toView().outcome).toEqual({
      failure: { kind: 'internal', message: 'Worker terminated unexpectedly' },
    });
  });

  it('fails the session when the worker cannot be created', async () => {
    const { session } = createSession();

    session.start(() => {
      throw new Error('browser unavailable');
    });
    await flush();

    expect(session.state).toBe('failed');
    expect(session.toView().outcome).toEqual({
      failure: { kind: 'internal', message: 'Worker terminated unexpectedly' },
    });
  });

  it('rejects a second start', async () => {
    const { session } = createSession();
    await startRunning(session, new ControlledWorker());

    expect(() => session.start(() => new ControlledWorker())).toThrow(InvalidStateError);
  });

  describe('stop', () => {
    it('cancels a created session immediately without a worker', async () => {
      const { session } = createSession();

      const view = await session.stop('cancelled', 1000);

      expect(view.state).toBe('cancelled');
      expect(view.startedAt).toBeNull();
      expect(view.cancelRequested).toBe(true);
      expect(view.outcome).toEqual({ failure: { kind: 'cancelled', message: 'Cancelled before start' } });
      expect(() => session.start(() => new ControlledWorker())).toThrow(InvalidStateError);
    });

    it('cancels a running session once the worker acknowledges', async () => {
      const { session } = createSession();
      const worker = new ControlledWorker('acknowledge');
      await startRunning(session, worker);

      const view = await session.stop('cancelled', 1000);

      expect(view.state).toBe('cancelled');
      expect(view.cancelAcknowledged).toBe(true);
      expect(view.outcome).toEqual({ failure: { kind: 'cancelled', message: 'Cancelled by request' } });
      expect(worker.signal?.reason).toBe('cancelled');
      expect(worker.disposed).toBe(1);
    });

    it('forces cancellation after the grace period when the worker ignores it', async () => {
      const { session } = createSession();
      const worker = new ControlledWorker('ignore');
      await startRunning(session, worker);

      const view = await session.stop('cancelled', 20);

      expect(view.state).toBe('cancelled');
      expect(view.cancelAcknowledged).toBe(false);

      // Late settlement and late events change nothing
      const lastSeq = session.getEventBus().lastSeq;
      worker.sink?.log('info', 'still working');
      worker.complete('late result');
      await flush();

      expect(session.state).toBe('cancelled');
      expect(session.getEventBus().lastSeq).toBe(lastSeq);
    });

    it('shares one teardown between concurrent stops', async () => {
      const { session } = createSession();
      await startRunning(session, new ControlledWorker('ignore'));

      const first = session.stop('cancelled', 20);
      const second = session.stop('cancelled', 20);

      expect(second).toBe(first);
      await first;
    });

    it('raises the abort signal before entering timed_out', async () => {
      const { session } = createSession();
      const worker = new ControlledWorker('acknowledge');
      await startRunning(session, worker);

      let stateAtAbort: SessionState | undefined;
      worker.signal?.addEventListener('abort', () => {
        stateAtAbort = session.state;
      });

      const view = await session.stop('timed_out', 1000);

      expect(stateAtAbort).toBe('running');
      expect(view.state).toBe('timed_out');
      expect(view.outcome).toEqual({ failure: { kind: 'timed_out', message: 'Running time limit exceeded' } });
    });

    it('throws synchronously once terminal', async () => {
      const { session } = createSession();
      await session.stop('cancelled', 10);

      expect(() => session.stop('cancelled', 10)).toThrow(InvalidStateError);
    });
  });

  it('emits exactly one terminal status_changed', async () => {
    const { session } = createSession();
    const worker = new ControlledWorker('acknowledge');
    await startRunning(session, worker);

    await session.stop('cancelled', 1000);

    const terminal = session
      .getEventBus()
      .getRetained()
      .filter((event) => event.type === 'status_changed' && event.payload.state !== 'running');
    expect(terminal).toHaveLength(1);
  });

  it('keeps only the most recent logs in the view', async () => {
    const { session } = createSession({ recentLogLimit: 2 });
    const worker = new ControlledWorker();
    await startRunning(session, worker);

    worker.sink?.log('info', 'one');
    worker.sink?.log('warn', 'two');
    worker.sink?.log('success', 'three');

    expect(session.toView().recentLogs.map((event) => event.payload.message)).toEqual(['two', 'three']);
  });

  it('reports overdue, idle and expired against the injected clock', async () => {
    const clock = new ManualClock();
    const { session } = createSession({ clock });
    const idle = createSession({ clock }).session;

    expect(idle.isIdle(clock.now() + 999, 1000)).toBe(false);
    expect(idle.isIdle(clock.now() + 1000, 1000)).toBe(true);

    const worker = new ControlledWorker();
    await startRunning(session, worker);
    const startedAt = clock.now();

    expect(session.isOverdue(startedAt + 999, 1000)).toBe(false);
    expect(session.isOverdue(startedAt + 1000, 1000)).toBe(true);

    clock.advance(50);
    worker.complete();
    await flush();

    expect(session.isExpired(clock.now() + 99, 100)).toBe(false);
    expect(session.isExpired(clock.now() + 100, 100)).toBe(true);
  });
});
