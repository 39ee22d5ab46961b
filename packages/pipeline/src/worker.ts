/**
 * Stage worker loop.
 *
 * Each slot dequeues one delivery at a time, hands it to the stage handler and
 * applies the returned disposition. A handler that throws is logged and its
 * message left for redelivery; the queue's delivery ceiling eventually
 * dead-letters a message that keeps failing this way.
 */

import { createLogger, type Logger } from '@docpipe/shared';
import type { Disposition } from './stages/common';
import type { Delivery, MessageQueue, QueueMessage } from './queue/types';

export interface WorkerOptions<T> {
  name: string;
  queue: MessageQueue<T>;
  handle: (message: QueueMessage<T>) => Promise<Disposition>;
  /** Stops the loop; in-flight messages finish first */
  signal: AbortSignal;
  concurrency?: number;
  /** Long-poll duration per dequeue */
  waitMs?: number;
  /** Pause after a failed dequeue */
  errorDelayMs?: number;
  logger?: Logger;
}

export interface WorkerStats {
  processed: number;
  failed: number;
}

function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Run the handler for one delivery and settle it with the queue.
 *
 * @returns false when the handler threw
 */
export async function processDelivery<T>(
  queue: MessageQueue<T>,
  delivery: Delivery<T>,
  handle: (message: QueueMessage<T>) => Promise<Disposition>,
  log: Logger
): Promise<boolean> {
  const { message, receipt } = delivery;
  let disposition: Disposition;
  let ok = true;
  try {
    disposition = await handle(message);
  } catch (err) {
    log.error('handler_failed', { messageId: message.id, deliveryCount: message.deliveryCount, decision: 'leave', error: err });
    disposition = { action: 'leave' };
    ok = false;
  }

  try {
    if (disposition.action === 'ack') {
      const acked = await queue.ack(receipt);
      if (!acked) log.warn('ack_superseded', { messageId: message.id });
    } else if (disposition.action === 'release') {
      const released = await queue.release(receipt, disposition.delayMs);
      if (!released) log.warn('release_superseded', { messageId: message.id });
    }
  } catch (err) {
    log.error('settle_failed', { messageId: message.id, action: disposition.action, error: err });
  }
  return ok;
}

/**
 * Dequeue without waiting and process whatever is visible.
 *
 * @returns false when the queue had nothing visible
 */
export async function pollOnce<T>(
  queue: MessageQueue<T>,
  handle: (message: QueueMessage<T>) => Promise<Disposition>,
  log: Logger
): Promise<boolean> {
  const delivery = await queue.dequeue({ waitMs: 0 });
  if (!delivery) return false;
  await processDelivery(queue, delivery, handle, log);
  return true;
}

export async function runWorker<T>(options: WorkerOptions<T>): Promise<WorkerStats> {
  const log = options.logger ?? createLogger('worker', { worker: options.name });
  const stats: WorkerStats = { processed: 0, failed: 0 };
  const { signal, queue } = options;
  const waitMs = options.waitMs ?? 20_000;
  const errorDelayMs = options.errorDelayMs ?? 1_000;

  const slot = async (index: number) => {
    while (!signal.aborted) {
      let delivery: Delivery<T> | null;
      try {
        delivery = await queue.dequeue({ waitMs, signal });
      } catch (err) {
        if (signal.aborted) break;
        log.error('dequeue_failed', { slot: index, error: err });
        await pause(errorDelayMs, signal);
        continue;
      }
      if (!delivery) continue;
      const ok = await processDelivery(queue, delivery, options.handle, log);
      stats.processed += 1;
      if (!ok) stats.failed += 1;
    }
  };

  const concurrency = Math.max(1, options.concurrency ?? 1);
  log.info('worker_started', { concurrency, waitMs });
  await Promise.all(Array.from({ length: concurrency }, (_, i) => slot(i)));
  log.info('worker_stopped', { ...stats });
  return stats;
}
