/**
 * Claim, retry and commit steps shared by the extraction and generation
 * stages. A stage is described by its layout: the stage a job waits in, the
 * stage that marks it claimed, and the terminal stage used when the retry
 * bound is reached.
 */

import {
  NotFoundError,
  StaleTransitionError,
  StoreUnavailableError,
  describeError,
  isRetryable,
  type JobStage,
  type Logger,
  type PipelineConfig,
  type StageSettings
} from '@docpipe/shared';
import type { AttemptStage, Job, JobMutations } from '@docpipe/database';
import type { ArtifactGateway } from '../artifacts/gateway';
import { advance, type LifecycleContext } from '../lifecycle';
import type { QueueMessage, JobMessage } from '../queue/types';
import { ack, computeBackoff, leave, release, type Disposition } from './common';

export interface StageContext extends LifecycleContext {
  artifacts: ArtifactGateway;
  config: PipelineConfig;
  /** Wall clock used for stale-claim age */
  now: () => number;
  /** Jitter source for backoff */
  random: () => number;
}

export interface StageLayout {
  attempt: AttemptStage;
  waiting: JobStage;
  working: JobStage;
  exhausted: JobStage;
}

export const EXTRACTION_LAYOUT: StageLayout = {
  attempt: 'extraction',
  waiting: 'QUEUED',
  working: 'EXTRACTING',
  exhausted: 'DEAD_LETTERED'
};

export const GENERATION_LAYOUT: StageLayout = {
  attempt: 'generation',
  waiting: 'EXTRACTED',
  working: 'GENERATING',
  exhausted: 'FAILED'
};

export type StageHandler = (message: QueueMessage<JobMessage>) => Promise<Disposition>;

export function stageSettings(ctx: StageContext, layout: StageLayout): StageSettings {
  return ctx.config[layout.attempt];
}

/**
 * Wrap a stage body: attaches message context to the logger and turns store
 * outages into `leave`, so the visibility timeout drives redelivery.
 */
export function guardStore(
  ctx: StageContext,
  layout: StageLayout,
  body: (jobId: string, log: Logger) => Promise<Disposition>
): StageHandler {
  return async (message) => {
    const { jobId } = message.body;
    const log = ctx.log.child({ stage: layout.attempt, jobId, messageId: message.id, deliveryCount: message.deliveryCount });
    try {
      return await body(jobId, log);
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        log.warn('store_unavailable', { decision: 'leave', error: err });
        return leave();
      }
      throw err;
    }
  };
}

/** Load the job a message names; null (logged) when it does not exist. */
export async function loadJob(ctx: StageContext, jobId: string, log: Logger): Promise<Job | null> {
  try {
    return await ctx.store.get(jobId);
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err;
    log.warn('job_not_found', { decision: 'discard' });
    return null;
  }
}

/** Move a job to the layout's terminal failure stage and acknowledge. */
async function exhaust(
  ctx: StageContext,
  layout: StageLayout,
  jobId: string,
  from: JobStage,
  lastError: string,
  log: Logger
): Promise<Disposition> {
  try {
    await advance(ctx, jobId, from, layout.exhausted, { lastError });
    log.error('retries_exhausted', { decision: layout.exhausted, lastError, alarm: layout.exhausted === 'DEAD_LETTERED' });
  } catch (err) {
    if (!(err instanceof StaleTransitionError)) throw err;
    log.info('exhaust_superseded', { decision: 'discard', actual: err.actual });
  }
  return ack();
}

/**
 * A job found in the working stage. Either a peer holds it, or its holder
 * died. Claims older than the stale window are rolled back (or ended when
 * the bound is reached) and the message is retried at once; younger claims
 * are re-checked when they would turn stale.
 */
export async function recoverClaim(ctx: StageContext, layout: StageLayout, job: Job, log: Logger): Promise<Disposition> {
  const age = ctx.now() - job.updatedAt.getTime();
  if (age < ctx.config.staleClaimMs) {
    const delayMs = ctx.config.staleClaimMs - age;
    log.info('claim_in_progress', { decision: 'release', delayMs });
    return release(delayMs);
  }

  const attempts = job.attempts[layout.attempt];
  const lastError = `Abandoned ${layout.attempt} attempt ${attempts}`;
  if (attempts >= stageSettings(ctx, layout).maxAttempts) {
    return exhaust(ctx, layout, job.id, layout.working, lastError, log);
  }
  try {
    await advance(ctx, job.id, layout.working, layout.waiting, { lastError });
    log.warn('stale_claim_rolled_back', { decision: 'release', attempts, ageMs: age });
  } catch (err) {
    if (!(err instanceof StaleTransitionError)) throw err;
    log.info('stale_claim_superseded', { actual: err.actual });
  }
  return release(0);
}

/**
 * Claim a waiting job for one attempt. Returns the new attempt number, or a
 * disposition when this delivery should not proceed.
 */
export async function claim(
  ctx: StageContext,
  layout: StageLayout,
  job: Job,
  log: Logger
): Promise<{ attempt: number } | { disposition: Disposition }> {
  const { maxAttempts } = stageSettings(ctx, layout);
  if (job.attempts[layout.attempt] >= maxAttempts) {
    const lastError = job.lastError ?? `${layout.attempt} retry bound of ${maxAttempts} reached`;
    return { disposition: await exhaust(ctx, layout, job.id, layout.waiting, lastError, log) };
  }
  try {
    await advance(ctx, job.id, layout.waiting, layout.working);
  } catch (err) {
    if (!(err instanceof StaleTransitionError)) throw err;
    log.info('claim_lost', { decision: 'release', actual: err.actual });
    return { disposition: release(ctx.config.retry.baseDelayMs) };
  }
  const attempt = await ctx.store.incrementAttempt(job.id, layout.attempt);
  log.info('attempt_started', { attempt, maxAttempts });
  return { attempt };
}

/**
 * Record a failed attempt: roll back for another try with backoff, or end the
 * job when the bound is reached (or at once for non-retryable errors when
 * short-circuiting is enabled).
 */
export async function fail(
  ctx: StageContext,
  layout: StageLayout,
  jobId: string,
  attempt: number,
  error: unknown,
  log: Logger
): Promise<Disposition> {
  if (error instanceof StoreUnavailableError) throw error;
  const lastError = describeError(error);
  const { maxAttempts } = stageSettings(ctx, layout);
  const permanent = ctx.config.shortCircuitPermanentErrors && !isRetryable(error);

  if (attempt >= maxAttempts || permanent) {
    log.warn('attempt_failed', { attempt, maxAttempts, permanent, error });
    return exhaust(ctx, layout, jobId, layout.working, lastError, log);
  }

  const delayMs = computeBackoff(attempt, ctx.config.retry, ctx.random);
  try {
    await advance(ctx, jobId, layout.working, layout.waiting, { lastError });
  } catch (err) {
    if (!(err instanceof StaleTransitionError)) throw err;
    log.info('retry_superseded', { decision: 'discard', actual: err.actual });
    return ack();
  }
  log.warn('attempt_failed', { attempt, maxAttempts, decision: 'retry', delayMs, error });
  return release(delayMs);
}

/**
 * Commit an attempt's artifact with the forward transition. When the CAS loses
 * (the job was cancelled or taken over) the artifact is deleted and null is
 * returned.
 */
export async function commit(
  ctx: StageContext,
  layout: StageLayout,
  jobId: string,
  next: JobStage,
  ref: string,
  mutations: JobMutations,
  log: Logger
): Promise<Job | null> {
  try {
    return await advance(ctx, jobId, layout.working, next, mutations);
  } catch (err) {
    if (!(err instanceof StaleTransitionError)) throw err;
    log.warn('commit_lost', { decision: 'discard', actual: err.actual, ref });
    await discardArtifact(ctx, ref, log);
    return null;
  }
}

export async function discardArtifact(ctx: StageContext, ref: string, log: Logger): Promise<void> {
  try {
    await ctx.artifacts.delete(ref);
  } catch (err) {
    log.warn('artifact_cleanup_failed', { ref, error: err });
  }
}
