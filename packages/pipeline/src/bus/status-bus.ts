/**
 * In-process status event fanout.
 *
 * Publishers call `publish` right after a committed transition. Each
 * subscriber gets a bounded, per-job async stream that ends with the job's
 * terminal event. Events whose version is not newer than the last one a
 * subscriber accepted are dropped, so replays from a relay or a racing
 * snapshot never show up twice.
 */

import { EventEmitter } from 'node:events';
import { createLogger, isTerminalStage, type Logger, type StatusEvent } from '@docpipe/shared';

/** Where a published event came from; relays mark what they inject. */
export type EventSource = 'local' | 'relay';

export type PublishListener = (event: StatusEvent, source: EventSource) => void;

export interface SubscribeOptions {
  signal?: AbortSignal;
  /** Per-subscriber buffer; oldest non-terminal events are dropped beyond it */
  bufferSize?: number;
  /** Treat every version up to this one as already seen */
  afterVersion?: number;
}

const ANY_EVENT = 'status';
const jobChannel = (jobId: string) => `job:${jobId}`;

/**
 * Live event stream for one job. Not restartable: once it ends, iterating
 * again yields nothing.
 */
export class StatusSubscription implements AsyncIterable<StatusEvent>, AsyncIterator<StatusEvent, void, void> {
  private static readonly DONE: IteratorReturnResult<void> = Object.freeze({ value: undefined, done: true as const });

  private readonly buffer: StatusEvent[] = [];
  private resolve: ((result: IteratorResult<StatusEvent, void>) => void) | undefined;
  private lastVersion: number;
  /** No further events will be accepted (terminal seen or closed) */
  private finished = false;
  private droppedCount = 0;
  private closedByConsumer = false;

  constructor(
    private readonly emitter: EventEmitter,
    readonly jobId: string,
    private readonly maxBuffer: number,
    afterVersion: number,
    private readonly signal?: AbortSignal
  ) {
    this.lastVersion = afterVersion;
    this.emitter.on(jobChannel(jobId), this.handleEvent);
    if (signal?.aborted) {
      this.close();
    } else {
      signal?.addEventListener('abort', this.onAbort, { once: true });
    }
  }

  /** True once the consumer closed the stream or the signal aborted. */
  get closed(): boolean {
    return this.closedByConsumer;
  }

  /** Events discarded because the buffer was full. */
  get dropped(): number {
    return this.droppedCount;
  }

  [Symbol.asyncIterator](): AsyncIterator<StatusEvent, void, void> {
    return this;
  }

  async next(): Promise<IteratorResult<StatusEvent, void>> {
    const event = this.buffer.shift();
    if (event) return { value: event, done: false };
    if (this.finished) return StatusSubscription.DONE;
    return new Promise((resolve) => {
      this.resolve = resolve;
    });
  }

  async return(): Promise<IteratorResult<StatusEvent, void>> {
    this.close();
    return StatusSubscription.DONE;
  }

  close(): void {
    if (this.closedByConsumer) return;
    this.closedByConsumer = true;
    this.buffer.length = 0;
    this.finish();
  }

  private readonly onAbort = () => {
    this.close();
  };

  private readonly handleEvent = (event: StatusEvent) => {
    if (this.finished || event.version <= this.lastVersion) return;
    this.lastVersion = event.version;
    const terminal = isTerminalStage(event.stage);

    if (this.resolve) {
      const resolve = this.resolve;
      this.resolve = undefined;
      resolve({ value: event, done: false });
    } else {
      this.enqueue(event);
    }
    if (terminal) this.finish();
  };

  private enqueue(event: StatusEvent): void {
    this.buffer.push(event);
    if (this.buffer.length <= this.maxBuffer) return;
    const idx = this.buffer.findIndex((candidate) => !isTerminalStage(candidate.stage));
    this.buffer.splice(idx >= 0 ? idx : 0, 1);
    this.droppedCount += 1;
  }

  /** Stop accepting events; pending buffered events can still be read. */
  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.emitter.removeListener(jobChannel(this.jobId), this.handleEvent);
    this.signal?.removeEventListener('abort', this.onAbort);
    if (this.resolve && this.buffer.length === 0) {
      const resolve = this.resolve;
      this.resolve = undefined;
      resolve(StatusSubscription.DONE);
    }
  }
}

export interface StatusBusOptions {
  /** Default per-subscriber buffer size */
  bufferSize?: number;
  logger?: Logger;
}

export class StatusBus {
  private readonly emitter = new EventEmitter();
  private readonly bufferSize: number;
  private readonly log: Logger;

  constructor(options: StatusBusOptions = {}) {
    this.emitter.setMaxListeners(0);
    this.bufferSize = options.bufferSize ?? 64;
    this.log = options.logger ?? createLogger('status-bus');
  }

  /** Deliver an event to every live subscriber of its job. Never throws. */
  publish(event: StatusEvent, source: EventSource = 'local'): void {
    this.log.debug('status_published', {
      jobId: event.jobId,
      stage: event.stage,
      version: event.version,
      source,
      subscribers: this.subscriberCount(event.jobId)
    });
    this.emitter.emit(jobChannel(event.jobId), event);
    this.emitter.emit(ANY_EVENT, event, source);
  }

  subscribe(jobId: string, options: SubscribeOptions = {}): StatusSubscription {
    return new StatusSubscription(
      this.emitter,
      jobId,
      Math.max(1, options.bufferSize ?? this.bufferSize),
      options.afterVersion ?? 0,
      options.signal
    );
  }

  /**
   * Observe every published event regardless of job. Listener errors are
   * logged and do not reach the publisher.
   *
   * @returns function removing the listener
   */
  onPublish(listener: PublishListener): () => void {
    const wrapped: PublishListener = (event, source) => {
      try {
        listener(event, source);
      } catch (err) {
        this.log.error('publish_listener_failed', { jobId: event.jobId, error: err });
      }
    };
    this.emitter.on(ANY_EVENT, wrapped);
    return () => {
      this.emitter.removeListener(ANY_EVENT, wrapped);
    };
  }

  subscriberCount(jobId: string): number {
    return this.emitter.listenerCount(jobChannel(jobId));
  }

  /** Ids of jobs that currently have at least one subscriber. */
  watchedJobs(): string[] {
    const prefix = jobChannel('');
    return this.emitter
      .eventNames()
      .filter((name): name is string => typeof name === 'string' && name.startsWith(prefix))
      .filter((name) => this.emitter.listenerCount(name) > 0)
      .map((name) => name.slice(prefix.length));
  }
}
