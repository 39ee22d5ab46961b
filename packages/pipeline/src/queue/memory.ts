/**
 * In-process message queue with visibility timeouts.
 *
 * Messages become invisible when dequeued and reappear after the visibility
 * timeout unless acknowledged. Every delivery gets a fresh receipt. When a
 * message would be delivered more than `maxDeliveries` times it is moved to
 * the dead-letter list instead and reported through `onDeadLetter`. The list
 * keeps the newest `maxDeadLetters` messages; `drainDeadLetters` empties it.
 *
 * Time comes from `now` (defaults to Date.now, which Vitest fake timers
 * control). With a hand-driven clock only non-blocking dequeues (`waitMs: 0`)
 * make sense.
 */

import { randomUUID } from 'node:crypto';
import { DeadLetterError, createLogger, type Logger } from '@docpipe/shared';
import type { Delivery, MessageQueue, QueueMessage, QueueOptions } from './types';

interface Entry<T> {
  id: string;
  seq: number;
  body: T;
  enqueuedAt: Date;
  deliveryCount: number;
  visibleAt: number;
  receipt: string | null;
}

export interface InMemoryQueueOptions<T> extends QueueOptions<T> {
  name?: string;
  now?: () => number;
  /** Longest single sleep while a blocking dequeue waits */
  pollIntervalMs?: number;
  /** Dead-lettered messages kept for inspection (default 1000) */
  maxDeadLetters?: number;
  logger?: Logger;
}

export class InMemoryQueue<T> implements MessageQueue<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly dead: QueueMessage<T>[] = [];
  private readonly waiters = new Set<() => void>();
  private readonly now: () => number;
  private readonly pollIntervalMs: number;
  private readonly maxDeadLetters: number;
  private readonly log: Logger;
  private seq = 0;

  constructor(private readonly options: InMemoryQueueOptions<T>) {
    this.now = options.now ?? (() => Date.now());
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
    this.maxDeadLetters = Math.max(0, options.maxDeadLetters ?? 1_000);
    this.log = options.logger ?? createLogger('queue', { queue: options.name ?? 'memory' });
  }

  async enqueue(body: T, options?: { delayMs?: number }): Promise<string> {
    const id = randomUUID();
    const at = this.now();
    this.entries.set(id, {
      id,
      seq: ++this.seq,
      body,
      enqueuedAt: new Date(at),
      deliveryCount: 0,
      visibleAt: at + Math.max(0, options?.delayMs ?? 0),
      receipt: null
    });
    this.wake();
    return id;
  }

  async dequeue(options?: { waitMs?: number; signal?: AbortSignal }): Promise<Delivery<T> | null> {
    const deadline = this.now() + Math.max(0, options?.waitMs ?? 0);
    for (;;) {
      const delivery = await this.receiveVisible();
      if (delivery) return delivery;

      const remaining = deadline - this.now();
      if (remaining <= 0 || options?.signal?.aborted) return null;
      const nextVisible = this.nextVisibleAt();
      const untilVisible = nextVisible === null ? Infinity : Math.max(1, nextVisible - this.now());
      await this.waitForWork(Math.min(remaining, this.pollIntervalMs, untilVisible), options?.signal);
    }
  }

  async ack(receipt: string): Promise<boolean> {
    const entry = this.findByReceipt(receipt);
    if (!entry) return false;
    this.entries.delete(entry.id);
    return true;
  }

  async release(receipt: string, delayMs: number): Promise<boolean> {
    const entry = this.findByReceipt(receipt);
    if (!entry) return false;
    entry.receipt = null;
    entry.visibleAt = this.now() + Math.max(0, delayMs);
    this.wake();
    return true;
  }

  /** Messages not yet acknowledged or dead-lettered. */
  size(): number {
    return this.entries.size;
  }

  /** Messages currently hidden by an outstanding delivery. */
  inFlight(): number {
    const at = this.now();
    return [...this.entries.values()].filter((e) => e.receipt !== null && e.visibleAt > at).length;
  }

  deadLetters(): readonly QueueMessage<T>[] {
    return this.dead;
  }

  /** Remove and return the kept dead-lettered messages, oldest first. */
  drainDeadLetters(): QueueMessage<T>[] {
    return this.dead.splice(0, this.dead.length);
  }

  private async receiveVisible(): Promise<Delivery<T> | null> {
    for (;;) {
      const at = this.now();
      const candidate = [...this.entries.values()]
        .filter((e) => e.visibleAt <= at)
        .sort((a, b) => a.visibleAt - b.visibleAt || a.seq - b.seq)[0];
      if (!candidate) return null;

      if (candidate.deliveryCount + 1 > this.options.maxDeliveries) {
        await this.deadLetter(candidate);
        continue;
      }

      candidate.deliveryCount += 1;
      candidate.receipt = randomUUID();
      candidate.visibleAt = at + this.options.visibilityTimeoutMs;
      return { message: this.snapshot(candidate), receipt: candidate.receipt };
    }
  }

  private async deadLetter(entry: Entry<T>): Promise<void> {
    this.entries.delete(entry.id);
    const message = this.snapshot(entry);
    this.dead.push(message);
    if (this.dead.length > this.maxDeadLetters) this.dead.splice(0, this.dead.length - this.maxDeadLetters);
    const error = new DeadLetterError(entry.id, entry.deliveryCount);
    this.log.warn('message_dead_lettered', { messageId: entry.id, deliveryCount: entry.deliveryCount });
    if (!this.options.onDeadLetter) return;
    try {
      await this.options.onDeadLetter(message, error);
    } catch (err) {
      this.log.error('dead_letter_handler_failed', { messageId: entry.id, error: err });
    }
  }

  private snapshot(entry: Entry<T>): QueueMessage<T> {
    return { id: entry.id, body: entry.body, deliveryCount: entry.deliveryCount, enqueuedAt: entry.enqueuedAt };
  }

  private findByReceipt(receipt: string): Entry<T> | undefined {
    for (const entry of this.entries.values()) {
      if (entry.receipt === receipt) return entry;
    }
    return undefined;
  }

  private nextVisibleAt(): number | null {
    let next: number | null = null;
    for (const entry of this.entries.values()) {
      if (next === null || entry.visibleAt < next) next = entry.visibleAt;
    }
    return next;
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) waiter();
  }

  private waitForWork(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.waiters.add(done);
      signal?.addEventListener('abort', done, { once: true });
    });
  }
}
