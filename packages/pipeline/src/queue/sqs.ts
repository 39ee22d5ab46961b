/**
 * @fileoverview Amazon SQS implementation of the stage queue.
 *
 * Maps the queue contract onto SQS primitives:
 * - dequeue → ReceiveMessage with long polling and an explicit VisibilityTimeout
 * - ack → DeleteMessage
 * - release → ChangeMessageVisibility (the backoff delay)
 * - deliveryCount → ApproximateReceiveCount
 *
 * The delivery ceiling is enforced here rather than through a redrive policy
 * so the dead-letter hook can escalate the job in the same process. Bodies
 * that do not parse are moved to the dead-letter queue on first sight.
 */

import {
  ChangeMessageVisibilityCommand,
  DeleteMessageCommand,
  ReceiveMessageCommand,
  SendMessageCommand,
  type Message,
  type SQSClient
} from '@aws-sdk/client-sqs';
import type { z } from 'zod';
import { DeadLetterError, createLogger, type Logger } from '@docpipe/shared';
import type { Delivery, MessageQueue, QueueMessage, QueueOptions } from './types';

export type SqsSender = Pick<SQSClient, 'send'>;

export interface SqsQueueOptions<T> extends QueueOptions<T> {
  client: SqsSender;
  queueUrl: string;
  deadLetterQueueUrl: string;
  /** Validates message bodies after JSON parsing */
  schema: z.ZodType<T>;
  logger?: Logger;
}

/** SQS caps a single receive wait at 20 s and a send delay at 15 min. */
const MAX_WAIT_SECONDS = 20;
const MAX_DELAY_SECONDS = 900;
const MAX_VISIBILITY_SECONDS = 43_200;

const toSeconds = (ms: number, max: number) => Math.min(max, Math.max(0, Math.ceil(ms / 1000)));

function isInvalidReceipt(err: unknown): boolean {
  return err instanceof Error && (err.name === 'ReceiptHandleIsInvalid' || err.name === 'InvalidParameterValue');
}

export class SqsQueue<T> implements MessageQueue<T> {
  private readonly log: Logger;

  constructor(private readonly options: SqsQueueOptions<T>) {
    this.log = options.logger ?? createLogger('queue', { queueUrl: options.queueUrl });
  }

  async enqueue(body: T, options?: { delayMs?: number }): Promise<string> {
    const res = await this.options.client.send(
      new SendMessageCommand({
        QueueUrl: this.options.queueUrl,
        MessageBody: JSON.stringify(body),
        DelaySeconds: toSeconds(options?.delayMs ?? 0, MAX_DELAY_SECONDS)
      })
    );
    return res.MessageId ?? '';
  }

  async dequeue(options?: { waitMs?: number; signal?: AbortSignal }): Promise<Delivery<T> | null> {
    const res = await this.options.client.send(
      new ReceiveMessageCommand({
        QueueUrl: this.options.queueUrl,
        MaxNumberOfMessages: 1,
        WaitTimeSeconds: Math.min(MAX_WAIT_SECONDS, Math.floor((options?.waitMs ?? 0) / 1000)),
        VisibilityTimeout: toSeconds(this.options.visibilityTimeoutMs, MAX_VISIBILITY_SECONDS),
        MessageSystemAttributeNames: ['ApproximateReceiveCount', 'SentTimestamp']
      }),
      options?.signal ? { abortSignal: options.signal } : {}
    );
    const raw = res.Messages?.[0];
    if (!raw?.ReceiptHandle || !raw.MessageId) return null;

    const deliveryCount = Number(raw.Attributes?.ApproximateReceiveCount ?? '1');
    const sent = Number(raw.Attributes?.SentTimestamp ?? Date.now());
    const body = this.parseBody(raw);
    if (body === null) {
      await this.moveToDeadLetter(raw, raw.ReceiptHandle, 'malformed body');
      return null;
    }

    const message: QueueMessage<T> = { id: raw.MessageId, body: body.value, deliveryCount, enqueuedAt: new Date(sent) };
    if (deliveryCount > this.options.maxDeliveries) {
      await this.moveToDeadLetter(raw, raw.ReceiptHandle, 'delivery ceiling exceeded');
      if (this.options.onDeadLetter) {
        try {
          await this.options.onDeadLetter(message, new DeadLetterError(message.id, deliveryCount - 1));
        } catch (err) {
          this.log.error('dead_letter_handler_failed', { messageId: message.id, error: err });
        }
      }
      return null;
    }
    return { message, receipt: raw.ReceiptHandle };
  }

  async ack(receipt: string): Promise<boolean> {
    try {
      await this.options.client.send(
        new DeleteMessageCommand({ QueueUrl: this.options.queueUrl, ReceiptHandle: receipt })
      );
      return true;
    } catch (err) {
      if (isInvalidReceipt(err)) return false;
      throw err;
    }
  }

  async release(receipt: string, delayMs: number): Promise<boolean> {
    try {
      await this.options.client.send(
        new ChangeMessageVisibilityCommand({
          QueueUrl: this.options.queueUrl,
          ReceiptHandle: receipt,
          VisibilityTimeout: toSeconds(delayMs, MAX_VISIBILITY_SECONDS)
        })
      );
      return true;
    } catch (err) {
      if (isInvalidReceipt(err)) return false;
      throw err;
    }
  }

  private parseBody(raw: Message): { value: T } | null {
    let json: unknown;
    try {
      json = JSON.parse(raw.Body ?? '');
    } catch (err) {
      this.log.warn('message_body_unparseable', { messageId: raw.MessageId, error: err });
      return null;
    }
    const parsed = this.options.schema.safeParse(json);
    if (!parsed.success) {
      this.log.warn('message_body_invalid', { messageId: raw.MessageId, issues: parsed.error.issues.length });
      return null;
    }
    return { value: parsed.data };
  }

  private async moveToDeadLetter(raw: Message, receipt: string, reason: string): Promise<void> {
    await this.options.client.send(
      new SendMessageCommand({
        QueueUrl: this.options.deadLetterQueueUrl,
        MessageBody: raw.Body ?? '',
        MessageAttributes: {
          sourceMessageId: { DataType: 'String', StringValue: raw.MessageId ?? 'unknown' },
          reason: { DataType: 'String', StringValue: reason }
        }
      })
    );
    await this.options.client.send(new DeleteMessageCommand({ QueueUrl: this.options.queueUrl, ReceiptHandle: receipt }));
    this.log.warn('message_dead_lettered', { messageId: raw.MessageId, reason });
  }
}
