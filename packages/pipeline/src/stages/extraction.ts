/**
 * Extraction stage: (UPLOADED →) QUEUED → EXTRACTING → EXTRACTED.
 *
 * Each delivery claims the job with a compare-and-set, counts the attempt,
 * calls the extractor under a timeout, stores the structured record and
 * commits it with the EXTRACTING → EXTRACTED transition before handing the job
 * to generation. Redeliveries for jobs that already moved on are
 * acknowledged without side effects.
 */

import { StaleTransitionError, isTerminalStage, type Logger } from '@docpipe/shared';
import { jobScope } from '../artifacts/gateway';
import type { Extractor } from '../collaborators';
import type { JobMessage, MessageQueue } from '../queue/types';
import { advance } from '../lifecycle';
import { ack, leave, release, withTimeout, type Disposition } from './common';
import {
  EXTRACTION_LAYOUT as layout,
  claim,
  commit,
  fail,
  guardStore,
  loadJob,
  recoverClaim,
  stageSettings,
  type StageContext,
  type StageHandler
} from './stage';

export interface ExtractionStageDeps extends StageContext {
  extractor: Extractor;
  /** Queue feeding the generation stage */
  generationQueue: Pick<MessageQueue<JobMessage>, 'enqueue'>;
}

const encoder = new TextEncoder();

export function createExtractionHandler(deps: ExtractionStageDeps): StageHandler {
  return guardStore(deps, layout, (jobId, log) => extract(deps, jobId, log));
}

async function handOff(deps: ExtractionStageDeps, jobId: string, log: Logger): Promise<Disposition> {
  try {
    await deps.generationQueue.enqueue({ jobId });
  } catch (err) {
    log.warn('generation_enqueue_failed', { decision: 'leave', error: err });
    return leave();
  }
  return ack();
}

async function extract(deps: ExtractionStageDeps, jobId: string, log: Logger): Promise<Disposition> {
  let job = await loadJob(deps, jobId, log);
  if (!job) return ack();

  // Upload sends the message before moving the job out of UPLOADED
  if (job.stage === 'UPLOADED') {
    try {
      job = await advance(deps, jobId, 'UPLOADED', 'QUEUED');
    } catch (err) {
      if (!(err instanceof StaleTransitionError)) throw err;
      log.info('promote_lost', { decision: 'release', actual: err.actual });
      return release(deps.config.retry.baseDelayMs);
    }
    log.info('job_promoted', { from: 'UPLOADED', to: job.stage });
  }

  if (job.stage === 'EXTRACTED') {
    log.info('duplicate_delivery', { decision: 'reenqueue_generation', observed: job.stage });
    return handOff(deps, jobId, log);
  }
  if (job.stage === 'GENERATING' || isTerminalStage(job.stage)) {
    log.info('duplicate_delivery', { decision: 'discard', observed: job.stage });
    return ack();
  }
  if (job.stage === 'EXTRACTING') {
    return recoverClaim(deps, layout, job, log);
  }

  const claimed = await claim(deps, layout, job, log);
  if ('disposition' in claimed) return claimed.disposition;
  const { attempt } = claimed;

  let ref: string;
  try {
    const [document, spec] = await Promise.all([deps.artifacts.get(job.inputRef), deps.artifacts.get(job.specRef)]);
    const record = await withTimeout('extraction', stageSettings(deps, layout).timeoutMs, (signal) =>
      deps.extractor.extract({ jobId, document, spec, signal })
    );
    ref = await deps.artifacts.put(encoder.encode(JSON.stringify(record)), {
      scope: jobScope(jobId),
      kind: 'structured',
      contentType: 'application/json'
    });
  } catch (err) {
    return fail(deps, layout, jobId, attempt, err, log);
  }

  const committed = await commit(deps, layout, jobId, 'EXTRACTED', ref, { structuredDataRef: ref, lastError: null }, log);
  if (!committed) return ack();

  log.info('extraction_committed', { attempt, structuredDataRef: ref });
  return handOff(deps, jobId, log);
}
