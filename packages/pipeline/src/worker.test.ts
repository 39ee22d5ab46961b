import { describe, it, expect, vi } from 'vitest';
import { silentLogger } from '@docpipe/shared';
import { InMemoryQueue } from './queue/memory';
import type { JobMessage, MessageQueue } from './queue/types';
import { ack, leave, release, type Disposition } from './stages/common';
import { processDelivery, runWorker } from './worker';

function memoryQueue(now?: () => number) {
  return new InMemoryQueue<JobMessage>({
    visibilityTimeoutMs: 1_000,
    maxDeliveries: 5,
    logger: silentLogger,
    ...(now ? { now } : {})
  });
}

describe('processDelivery', () => {
  it('acknowledges, releases or leaves as the handler decides', async () => {
    let t = 0;
    const queue = memoryQueue(() => t);
    await queue.enqueue({ jobId: 'job-1' });
    await queue.enqueue({ jobId: 'job-2' });
    await queue.enqueue({ jobId: 'job-3' });
    const decisions: Record<string, Disposition> = { 'job-1': ack(), 'job-2': release(300), 'job-3': leave() };
    const handle = async (message: { body: JobMessage }) => decisions[message.body.jobId] ?? ack();

    for (let i = 0; i < 3; i++) {
      const delivery = await queue.dequeue();
      if (!delivery) throw new Error('expected a delivery');
      expect(await processDelivery(queue, delivery, handle, silentLogger)).toBe(true);
    }

    expect(queue.size()).toBe(2);
    t = 300;
    expect((await queue.dequeue())?.message.body).toEqual({ jobId: 'job-2' });
    expect(await queue.dequeue()).toBeNull();
    t = 1_000;
    expect((await queue.dequeue())?.message.body).toEqual({ jobId: 'job-3' });
  });

  it('leaves the message in flight when the handler throws', async () => {
    const queue = memoryQueue(() => 0);
    await queue.enqueue({ jobId: 'job-1' });
    const delivery = await queue.dequeue();
    if (!delivery) throw new Error('expected a delivery');

    const ok = await processDelivery(
      queue,
      delivery,
      async () => {
        throw new Error('boom');
      },
      silentLogger
    );

    expect(ok).toBe(false);
    expect(queue.inFlight()).toBe(1);
  });

  it('survives a queue that rejects the acknowledgement', async () => {
    const queue: MessageQueue<JobMessage> = {
      enqueue: vi.fn(async () => 'msg-1'),
      dequeue: vi.fn(async () => null),
      ack: vi.fn(async () => {
        throw new Error('network');
      }),
      release: vi.fn(async () => true)
    };
    const delivery = {
      message: { id: 'msg-1', body: { jobId: 'job-1' }, deliveryCount: 1, enqueuedAt: new Date(0) },
      receipt: 'r-1'
    };

    await expect(processDelivery(queue, delivery, async () => ack(), silentLogger)).resolves.toBe(true);
    expect(queue.ack).toHaveBeenCalledWith('r-1');
  });
});

describe('runWorker', () => {
  it('processes messages until the signal aborts', async () => {
    const queue = memoryQueue();
    for (const jobId of ['job-1', 'job-2', 'job-3']) await queue.enqueue({ jobId });
    const controller = new AbortController();
    const seen: string[] = [];

    const stats = await runWorker({
      name: 'extraction',
      queue,
      signal: controller.signal,
      waitMs: 50,
      logger: silentLogger,
      handle: async (message) => {
        seen.push(message.body.jobId);
        if (seen.length === 3) controller.abort();
        return ack();
      }
    });

    expect(stats).toEqual({ processed: 3, failed: 0 });
    expect(seen).toEqual(['job-1', 'job-2', 'job-3']);
    expect(queue.size()).toBe(0);
  });

  it('runs up to `concurrency` handlers at once', async () => {
    const queue = memoryQueue();
    await queue.enqueue({ jobId: 'job-1' });
    await queue.enqueue({ jobId: 'job-2' });
    const controller = new AbortController();
    let active = 0;
    let peak = 0;
    let done = 0;

    const stats = await runWorker({
      name: 'generation',
      queue,
      signal: controller.signal,
      concurrency: 2,
      waitMs: 50,
      logger: silentLogger,
      handle: async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 20));
        active -= 1;
        done += 1;
        if (done === 2) controller.abort();
        return ack();
      }
    });

    expect(peak).toBe(2);
    expect(stats).toEqual({ processed: 2, failed: 0 });
  });

  it('backs off and keeps polling after a dequeue error', async () => {
    const controller = new AbortController();
    let calls = 0;
    const queue: MessageQueue<JobMessage> = {
      enqueue: vi.fn(async () => 'msg-1'),
      dequeue: vi.fn(async () => {
        calls += 1;
        if (calls === 1) throw new Error('throttled');
        controller.abort();
        return null;
      }),
      ack: vi.fn(async () => true),
      release: vi.fn(async () => true)
    };

    const stats = await runWorker({
      name: 'extraction',
      queue,
      signal: controller.signal,
      errorDelayMs: 5,
      logger: silentLogger,
      handle: async () => ack()
    });

    expect(calls).toBe(2);
    expect(stats).toEqual({ processed: 0, failed: 0 });
  });

  it('counts handler crashes as failures', async () => {
    const queue = memoryQueue();
    await queue.enqueue({ jobId: 'job-1' });
    const controller = new AbortController();

    const stats = await runWorker({
      name: 'extraction',
      queue,
      signal: controller.signal,
      waitMs: 20,
      logger: silentLogger,
      handle: async () => {
        controller.abort();
        throw new Error('handler bug');
      }
    });

    expect(stats).toEqual({ processed: 1, failed: 1 });
  });
});
