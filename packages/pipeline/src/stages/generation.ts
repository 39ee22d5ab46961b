/**
 * Generation stage: EXTRACTED → GENERATING → COMPLETE.
 *
 * Mirrors extraction: claim, count the attempt, render the structured record
 * into the job's template under a timeout, store the output and commit it
 * with GENERATING → COMPLETE. Exhausting the retry bound ends the job in
 * FAILED rather than DEAD_LETTERED, which keeps late-pipeline failures
 * distinguishable from unprocessable uploads.
 */

import { z } from 'zod';
import { RenderError, isTerminalStage, type Logger } from '@docpipe/shared';
import type { Job } from '@docpipe/database';
import { jobScope } from '../artifacts/gateway';
import type { Renderer, StructuredRecord } from '../collaborators';
import { ack, withTimeout, type Disposition } from './common';
import {
  GENERATION_LAYOUT as layout,
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

export interface GenerationStageDeps extends StageContext {
  renderer: Renderer;
}

const recordSchema = z.record(z.unknown());
const decoder = new TextDecoder();

export function createGenerationHandler(deps: GenerationStageDeps): StageHandler {
  return guardStore(deps, layout, (jobId, log) => generate(deps, jobId, log));
}

async function readRecord(deps: GenerationStageDeps, job: Job): Promise<StructuredRecord> {
  if (!job.structuredDataRef) {
    throw new RenderError({ message: `Job ${job.id} has no structured record`, kind: 'permanent' });
  }
  const bytes = await deps.artifacts.get(job.structuredDataRef);
  let raw: unknown;
  try {
    raw = JSON.parse(decoder.decode(bytes));
  } catch (err) {
    throw new RenderError({ message: 'Structured record is not valid JSON', kind: 'permanent', cause: err });
  }
  const parsed = recordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RenderError({ message: 'Structured record is not a JSON object', kind: 'permanent' });
  }
  return parsed.data;
}

async function generate(deps: GenerationStageDeps, jobId: string, log: Logger): Promise<Disposition> {
  const job = await loadJob(deps, jobId, log);
  if (!job) return ack();

  if (isTerminalStage(job.stage)) {
    log.info('duplicate_delivery', { decision: 'discard', observed: job.stage });
    return ack();
  }
  if (job.stage === 'UPLOADED' || job.stage === 'QUEUED' || job.stage === 'EXTRACTING') {
    log.warn('unexpected_stage', { decision: 'discard', observed: job.stage });
    return ack();
  }
  if (job.stage === 'GENERATING') {
    return recoverClaim(deps, layout, job, log);
  }

  const claimed = await claim(deps, layout, job, log);
  if ('disposition' in claimed) return claimed.disposition;
  const { attempt } = claimed;

  let ref: string;
  try {
    const [record, template] = await Promise.all([readRecord(deps, job), deps.artifacts.get(job.templateRef)]);
    const output = await withTimeout('render', stageSettings(deps, layout).timeoutMs, (signal) =>
      deps.renderer.render({ jobId, template, record, signal })
    );
    ref = await deps.artifacts.put(output, { scope: jobScope(jobId), kind: 'output', contentType: 'application/pdf' });
  } catch (err) {
    return fail(deps, layout, jobId, attempt, err, log);
  }

  const committed = await commit(deps, layout, jobId, 'COMPLETE', ref, { outputRef: ref, lastError: null }, log);
  if (committed) log.info('generation_committed', { attempt, outputRef: ref });
  return ack();
}
