import { describe, it, expect, afterEach } from 'vitest';
import { NotFoundError } from '../errors.js';
import { LocalSessionRegistry } from '../../lib/hosts/local/local-session-registry.js';
import type { RegistryConfig } from '../../types/runtime.js';
import { controlledWorkerFactory, flush, type ControlledWorker } from '../../test/helpers.js';
import { MockClientConnection } from './client-connection.js';
import { StreamingGateway } from './streaming-gateway.js';

const registries: LocalSessionRegistry[] = [];

function setup(config: Partial<RegistryConfig> = {}) {
  const { factory, workers } = controlledWorkerFactory();
  const registry = new LocalSessionRegistry({ createWorker: factory, config: { cancelGraceMs: 50, ...config } });
  registries.push(registry);
  const gateway = new StreamingGateway(registry);

  async function startSession(task = 'task'): Promise<{ sessionId: string; worker: ControlledWorker }> {
    const { sessionId } = registry.create(task);
    registry.start(sessionId);
    await flush();
    const worker = workers.get(sessionId);
    if (!worker) throw new Error('worker was not created');
    return { sessionId, worker };
  }

  return { registry, gateway, startSession };
}

afterEach(async () => {
  await Promise.all(registries.splice(0).map((registry) => registry.shutdown()));
});

describe('StreamingGateway', () => {
  it('throws NotFound for an unknown session', () => {
    const { gateway } = setup();

    expect(() => gateway.attach('missing', new MockClientConnection())).toThrow(NotFoundError);
  });

  it('relays the backlog, then live events, then ends with the terminal state', async () => {
    const { gateway, startSession } = setup();
    const { sessionId, worker } = await startSession();
    worker.sink?.log('info', 'a');
    worker.sink?.log('info', 'b');

    const connection = new MockClientConnection();
    const attachment = gateway.attach(sessionId, connection);
    worker.sink?.log('info', 'c');
    worker.complete('done');
    await attachment.done;

    expect(connection.seqs).toEqual([1, 2, 3, 4, 5]);
    expect(connection.itemsOfType('log').map((item) => item.payload.message)).toEqual(['a', 'b', 'c']);
    expect(connection.ends).toEqual([{ sessionId, state: 'completed' }]);
    expect(gateway.getAttachmentCount()).toBe(0);
  });

  it('replays a finished session and ends immediately', async () => {
    const { registry, gateway, startSession } = setup();
    const { sessionId, worker } = await startSession();
    worker.fail('Element not found');
    await flush();

    const connection = new MockClientConnection();
    await gateway.attach(sessionId, connection).done;

    expect(connection.items.map((item) => item.type)).toEqual(['status_changed', 'error', 'status_changed']);
    expect(connection.ends).toEqual([{ sessionId, state: 'failed' }]);
    expect(registry.get(sessionId).subscriberCount).toBe(0);
  });

  it('stops relaying on detach without touching the session', async () => {
    const { registry, gateway, startSession } = setup();
    const { sessionId, worker } = await startSession();

    const connection = new MockClientConnection();
    const attachment = gateway.attach(sessionId, connection);
    await flush();
    expect(registry.get(sessionId).subscriberCount).toBe(1);

    attachment.detach();
    attachment.detach();
    await attachment.done;
    worker.sink?.log('info', 'after detach');

    expect(connection.seqs).toEqual([1]);
    expect(connection.ends).toEqual([]);
    expect(registry.get(sessionId).state).toBe('running');
    expect(registry.get(sessionId).subscriberCount).toBe(0);
  });

  it('keeps a failing connection from affecting the others', async () => {
    const { registry, gateway } = setup();
    const { sessionId } = registry.create('task');

    const healthy = new MockClientConnection('healthy');
    const failing = new MockClientConnection('failing', { failOnSend: 1 });
    const healthyAttachment = gateway.attach(sessionId, healthy);
    const failingAttachment = gateway.attach(sessionId, failing);

    registry.start(sessionId);
    await failingAttachment.done;
    expect(gateway.getAttachmentCount(sessionId)).toBe(1);

    await registry.cancel(sessionId);
    await healthyAttachment.done;

    expect(failing.items).toEqual([]);
    expect(healthy.seqs).toEqual([1, 2]);
    expect(healthy.ends).toEqual([{ sessionId, state: 'cancelled' }]);
  });

  it('hands a slow connection a gap marker covering exactly what it missed', async () => {
    const { gateway, startSession } = setup({ subscriberQueueDepth: 2 });
    const { sessionId, worker } = await startSession();

    const connection = new MockClientConnection('slow', { sendDelayMs: 10 });
    const attachment = gateway.attach(sessionId, connection);
    for (let i = 1; i <= 6; i++) worker.sink?.log('info', `step ${i}`);
    worker.complete();
    await attachment.done;

    expect(connection.seqs).toEqual([1, 6, 7, 8]);
    expect(connection.items[1]).toMatchObject({ type: 'gap', payload: { fromSeq: 2, toSeq: 6, count: 5 } });
    expect(connection.ends).toEqual([{ sessionId, state: 'completed' }]);
  });

  it('detaches every attachment a connection holds', async () => {
    const { registry, gateway, startSession } = setup();
    const first = await startSession('first');
    const second = await startSession('second');

    const connection = new MockClientConnection('socket-1');
    const attachments = [
      gateway.attach(first.sessionId, connection),
      gateway.attach(second.sessionId, connection),
    ];

    expect(gateway.detachConnection('socket-1')).toBe(2);
    await Promise.all(attachments.map((attachment) => attachment.done));

    expect(gateway.getAttachmentCount()).toBe(0);
    expect(registry.get(first.sessionId).subscriberCount).toBe(0);
  });
});
