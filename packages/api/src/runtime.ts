/**
 * Process wiring: store, queues, artifact storage and collaborators composed
 * into one pipeline. Lambda handlers share a lazily created runtime per
 * container that both forwards and listens for status events; the worker
 * entry point creates its own that only forwards.
 *
 * Queues are SQS when all four queue URLs are set, in-memory otherwise
 * (single-process local runs only).
 */

import { SQSClient } from '@aws-sdk/client-sqs';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { Client, type ClientConfig } from 'pg';
import { createLogger, loadPipelineConfig, type Logger, type PipelineConfig } from '@docpipe/shared';
import { getSharedDatabaseClient, resolveDatabaseConfig, type DatabaseClientConfig, type JobStore } from '@docpipe/database';
import {
  PgStatusRelay,
  SqsQueue,
  createPipeline,
  jobMessageSchema,
  resyncWatchers,
  type JobMessage,
  type Pipeline,
  type QueueFactory
} from '@docpipe/pipeline';
import { DEFAULT_LLM_MAX_RETRIES } from './services/llm/client';
import { LlmExtractor } from './services/llm/extractor';
import { PdfRenderer } from './services/render/pdf-renderer';
import { SupabaseArtifactGateway, getSupabaseStorageClient, parseSupabaseConfig } from './utils/supabase-storage';

type Env = Record<string, string | undefined>;

export interface Runtime {
  config: PipelineConfig;
  store: JobStore;
  pipeline: Pipeline;
  /** Cross-process status fanout, when started */
  relay: Pick<PgStatusRelay, 'flush' | 'stop'> | null;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  env?: Env;
  /**
   * LISTEN/NOTIFY status fanout on a dedicated connection: 'listen' forwards
   * local events and publishes other processes' events, 'forward' only sends.
   */
  relay?: RelayMode;
  logger?: Logger;
}

export type RelayMode = 'listen' | 'forward' | false;

interface QueueUrls {
  extraction: { queueUrl: string; deadLetterQueueUrl: string };
  generation: { queueUrl: string; deadLetterQueueUrl: string };
}

export function readQueueUrls(env: Env): QueueUrls | null {
  const read = (name: string) => env[name]?.trim() || undefined;
  const extraction = read('EXTRACTION_QUEUE_URL');
  const extractionDlq = read('EXTRACTION_DLQ_URL');
  const generation = read('GENERATION_QUEUE_URL');
  const generationDlq = read('GENERATION_DLQ_URL');
  if (!extraction || !extractionDlq || !generation || !generationDlq) return null;
  return {
    extraction: { queueUrl: extraction, deadLetterQueueUrl: extractionDlq },
    generation: { queueUrl: generation, deadLetterQueueUrl: generationDlq }
  };
}

function sqsQueueFactory(urls: QueueUrls, config: PipelineConfig, env: Env, log: Logger): QueueFactory {
  const client = new SQSClient({
    ...(env['AWS_REGION'] ? { region: env['AWS_REGION'] } : {}),
    requestHandler: new NodeHttpHandler({
      connectionTimeout: 5_000,
      // Long polls hold the request for up to 20s
      requestTimeout: 30_000
    })
  });
  return (stage, onDeadLetter) =>
    new SqsQueue<JobMessage>({
      client,
      ...urls[stage],
      schema: jobMessageSchema,
      visibilityTimeoutMs: config.queue.visibilityTimeoutMs,
      maxDeliveries: config.queue.maxDeliveries,
      onDeadLetter,
      logger: log.child({ queue: stage })
    });
}

function relayClientConfig(db: DatabaseClientConfig): ClientConfig {
  const config: ClientConfig = {};
  if (db.connectionString) config.connectionString = db.connectionString;
  if (db.host) config.host = db.host;
  if (db.port) config.port = db.port;
  if (db.database) config.database = db.database;
  if (db.user) config.user = db.user;
  if (db.password) config.password = db.password;
  if (db.ssl !== undefined) config.ssl = db.ssl;
  return config;
}

/**
 * Per-call LLM timeout. The stage timeout covers the first call and every
 * in-call retry, so each gets an equal share of it.
 */
export function llmAttemptTimeoutMs(stageTimeoutMs: number, maxRetries: number): number {
  return Math.max(1, Math.floor(stageTimeoutMs / (maxRetries + 1)));
}

export function readLlmMaxRetries(env: Env): number {
  const raw = env['LLM_MAX_RETRIES']?.trim();
  const parsed = raw ? Number(raw) : NaN;
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : DEFAULT_LLM_MAX_RETRIES;
}

export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const env = options.env ?? process.env;
  const log = options.logger ?? createLogger('runtime');
  const config = loadPipelineConfig(env);

  const dbConfig = await resolveDatabaseConfig(env);
  const store = getSharedDatabaseClient(dbConfig);

  const storage = parseSupabaseConfig(env);
  const artifacts = new SupabaseArtifactGateway({ client: getSupabaseStorageClient(storage), bucket: storage.bucket });

  const urls = readQueueUrls(env);
  if (!urls) log.warn('memory_queues', { reason: 'queue URLs not configured' });

  const llmRetries = readLlmMaxRetries(env);
  const pipeline = createPipeline({
    store,
    artifacts,
    config,
    extractor: new LlmExtractor({
      timeoutMs: llmAttemptTimeoutMs(config.extraction.timeoutMs, llmRetries),
      maxRetries: llmRetries,
      env
    }),
    renderer: new PdfRenderer(),
    ...(urls ? { createQueue: sqsQueueFactory(urls, config, env, log) } : {}),
    logger: log.child({ component: 'pipeline' })
  });

  let relay: PgStatusRelay | null = null;
  if (options.relay) {
    const clientConfig = relayClientConfig(dbConfig);
    relay = new PgStatusRelay({
      bus: pipeline.bus,
      createClient: () => new Client(clientConfig),
      listen: options.relay === 'listen',
      onReconnect: async () => {
        const count = await resyncWatchers({ store, bus: pipeline.bus });
        log.info('watchers_resynced', { jobs: count });
      },
      logger: log.child({ component: 'status-relay' })
    });
    try {
      await relay.start();
    } catch (err) {
      await store.end();
      throw err;
    }
  }

  return {
    config,
    store,
    pipeline,
    relay,
    async close() {
      if (relay) await relay.stop();
      await store.end();
    }
  };
}

let shared: Promise<Runtime> | null = null;

/**
 * Runtime shared by handlers in one Lambda container. A failed
 * initialization is not cached, so the next invocation retries it.
 */
export function getRuntime(): Promise<Runtime> {
  if (!shared) {
    shared = createRuntime({ relay: 'listen' }).catch((err: unknown) => {
      shared = null;
      throw err;
    });
  }
  return shared;
}

/** Test seam: serve handlers from a prepared runtime. */
export function __setRuntime(runtime: Runtime): void {
  shared = Promise.resolve(runtime);
}

export function __resetRuntime(): void {
  shared = null;
}
