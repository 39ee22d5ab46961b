import { z } from 'zod';
import type { DeadLetterError } from '@docpipe/shared';

/** Body of every stage queue message. */
export interface JobMessage {
  jobId: string;
}

export const jobMessageSchema = z.object({ jobId: z.string().min(1) });

export interface QueueMessage<T> {
  id: string;
  body: T;
  /** Deliveries so far, including the current one; independent of job attempts */
  deliveryCount: number;
  enqueuedAt: Date;
}

/**
 * One delivery of a message. The receipt is unique to this delivery: after the
 * visibility timeout a redelivery carries a new receipt and the old one no
 * longer acknowledges anything.
 */
export interface Delivery<T> {
  message: QueueMessage<T>;
  receipt: string;
}

export type DeadLetterHandler<T> = (message: QueueMessage<T>, error: DeadLetterError) => Promise<void>;

export interface QueueOptions<T> {
  /** Delay before an unacknowledged delivery becomes visible again */
  visibilityTimeoutMs: number;
  /** Deliveries allowed before a message is moved to the dead-letter queue */
  maxDeliveries: number;
  /** Called after a message is dead-lettered */
  onDeadLetter?: DeadLetterHandler<T>;
}

/**
 * At-least-once work queue.
 *
 * - `dequeue` hides the returned message for the visibility timeout
 * - `ack` removes it for good; false when the receipt is no longer current
 * - `release` makes it visible again after `delayMs` (retry backoff)
 */
export interface MessageQueue<T> {
  enqueue(body: T, options?: { delayMs?: number }): Promise<string>;
  dequeue(options?: { waitMs?: number; signal?: AbortSignal }): Promise<Delivery<T> | null>;
  ack(receipt: string): Promise<boolean>;
  release(receipt: string, delayMs: number): Promise<boolean>;
}
