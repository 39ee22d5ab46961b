/**
 * Stage worker process: consumes the extraction and generation queues until
 * SIGTERM or SIGINT, then drains in-flight jobs and closes connections.
 *
 * Unacknowledged messages reappear after the visibility timeout, so a worker
 * killed mid-job loses nothing; the next delivery picks the job up again.
 */

import { config as loadEnv } from 'dotenv';
import { pathToFileURL } from 'url';
import { createLogger, type Logger } from '@docpipe/shared';
import { shutdown } from './instrumentation';
import { createRuntime, type Runtime } from './runtime';

export interface WorkerProcessOptions {
  signal: AbortSignal;
  createRuntime?: () => Promise<Runtime>;
  logger?: Logger;
}

export async function runWorkers(options: WorkerProcessOptions): Promise<void> {
  const log = options.logger ?? createLogger('worker-process');
  const runtime = await (options.createRuntime ?? (() => createRuntime({ relay: 'forward' })))();
  log.info('workers_starting', { concurrency: runtime.config.workerConcurrency });

  try {
    const stats = await runtime.pipeline.start(options.signal);
    log.info('workers_stopped', { extraction: stats.extraction, generation: stats.generation });
  } finally {
    await runtime.close();
  }
}

async function main(): Promise<void> {
  loadEnv();
  const log = createLogger('worker-process');
  const controller = new AbortController();
  for (const name of ['SIGTERM', 'SIGINT'] as const) {
    process.once(name, () => {
      log.info('shutdown_requested', { signal: name });
      controller.abort();
    });
  }

  try {
    await runWorkers({ signal: controller.signal, logger: log });
  } finally {
    await shutdown();
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((error: unknown) => {
    createLogger('worker-process').error('worker_crashed', { error });
    process.exit(1);
  });
}
