/**
 * Pipeline composition: wires the store, queues, bus, artifact gateway and
 * collaborators into the upload, watch, cancel and worker entry points.
 *
 * Queues default to in-memory ones built from the queue settings; production
 * wiring passes a factory that returns SQS queues. Either way the factory
 * receives the dead-letter escalation for its stage.
 */

import { createLogger, type Logger, type PipelineConfig, type StatusEvent } from '@docpipe/shared';
import type { AttemptStage, Job, JobStore } from '@docpipe/database';
import type { ArtifactGateway } from './artifacts/gateway';
import { StatusBus } from './bus/status-bus';
import type { Extractor, Renderer } from './collaborators';
import { createDeadLetterHandler } from './dead-letter';
import { cancelJob, type LifecycleContext } from './lifecycle';
import { InMemoryQueue } from './queue/memory';
import type { DeadLetterHandler, JobMessage, MessageQueue } from './queue/types';
import { createExtractionHandler } from './stages/extraction';
import { createGenerationHandler } from './stages/generation';
import type { StageContext, StageHandler } from './stages/stage';
import { submitUpload, type UploadRequest, type UploadResult } from './upload';
import { watchJob, type WatchOptions } from './watch';
import { runWorker, type WorkerStats } from './worker';

export type QueueFactory = (
  stage: AttemptStage,
  onDeadLetter: DeadLetterHandler<JobMessage>
) => MessageQueue<JobMessage>;

export interface PipelineDeps {
  store: JobStore;
  artifacts: ArtifactGateway;
  extractor: Extractor;
  renderer: Renderer;
  config: PipelineConfig;
  bus?: StatusBus;
  createQueue?: QueueFactory;
  now?: () => number;
  random?: () => number;
  logger?: Logger;
}

export interface Pipeline {
  readonly store: JobStore;
  readonly bus: StatusBus;
  readonly artifacts: ArtifactGateway;
  readonly extractionQueue: MessageQueue<JobMessage>;
  readonly generationQueue: MessageQueue<JobMessage>;
  readonly handleExtraction: StageHandler;
  readonly handleGeneration: StageHandler;
  submit(request: UploadRequest): Promise<UploadResult>;
  watch(jobId: string, options?: WatchOptions): AsyncGenerator<StatusEvent, void, void>;
  cancel(jobId: string, reason?: string): Promise<Job>;
  /** Run both stage workers until the signal aborts. */
  start(signal: AbortSignal): Promise<{ extraction: WorkerStats; generation: WorkerStats }>;
}

export function createPipeline(deps: PipelineDeps): Pipeline {
  const { config, store, artifacts } = deps;
  const log = deps.logger ?? createLogger('pipeline');
  const bus = deps.bus ?? new StatusBus({ bufferSize: config.statusBufferSize, logger: log.child({ component: 'status-bus' }) });
  const lifecycle: LifecycleContext = { store, bus, log };

  const createQueue: QueueFactory =
    deps.createQueue ??
    ((stage, onDeadLetter) =>
      new InMemoryQueue<JobMessage>({
        name: stage,
        visibilityTimeoutMs: config.queue.visibilityTimeoutMs,
        maxDeliveries: config.queue.maxDeliveries,
        onDeadLetter,
        ...(deps.now ? { now: deps.now } : {}),
        logger: log.child({ queue: stage })
      }));

  const extractionQueue = createQueue('extraction', createDeadLetterHandler(lifecycle, 'extraction'));
  const generationQueue = createQueue('generation', createDeadLetterHandler(lifecycle, 'generation'));

  const stageContext: StageContext = {
    ...lifecycle,
    artifacts,
    config,
    now: deps.now ?? (() => Date.now()),
    random: deps.random ?? Math.random
  };
  const handleExtraction = createExtractionHandler({ ...stageContext, extractor: deps.extractor, generationQueue });
  const handleGeneration = createGenerationHandler({ ...stageContext, renderer: deps.renderer });

  return {
    store,
    bus,
    artifacts,
    extractionQueue,
    generationQueue,
    handleExtraction,
    handleGeneration,
    submit: (request) =>
      submitUpload({ ...lifecycle, artifacts, extractionQueue, maxUploadBytes: config.maxUploadBytes }, request),
    watch: (jobId, options) => watchJob({ store, bus }, jobId, { bufferSize: config.statusBufferSize, ...options }),
    cancel: (jobId, reason) => cancelJob(lifecycle, jobId, reason),
    async start(signal) {
      const common = { signal, concurrency: config.workerConcurrency, waitMs: config.queue.waitMs };
      const [extraction, generation] = await Promise.all([
        runWorker({ ...common, name: 'extraction', queue: extractionQueue, handle: handleExtraction, logger: log.child({ worker: 'extraction' }) }),
        runWorker({ ...common, name: 'generation', queue: generationQueue, handle: handleGeneration, logger: log.child({ worker: 'generation' }) })
      ]);
      return { extraction, generation };
    }
  };
}
