import {
  StaleTransitionError,
  InvalidTransitionError,
  isTerminalStage,
  type JobStage,
  type Logger,
  type TerminalStage,
  type StatusEvent
} from '@docpipe/shared';
import type { Job, JobMutations, JobStore } from '@docpipe/database';
import type { StatusBus } from './bus/status-bus';

export interface LifecycleContext {
  store: JobStore;
  bus: StatusBus;
  log: Logger;
}

export function toStatusEvent(job: Job): StatusEvent {
  return {
    jobId: job.id,
    stage: job.stage,
    timestamp: job.updatedAt.toISOString(),
    version: job.version,
    ...(job.lastError ? { error: job.lastError } : {})
  };
}

/**
 * Compare-and-set a job into `next` and publish the resulting event.
 * Errors from the store propagate unchanged; nothing is published for a
 * transition that did not commit.
 */
export async function advance(
  ctx: LifecycleContext,
  jobId: string,
  expected: JobStage,
  next: JobStage,
  mutations?: JobMutations
): Promise<Job> {
  const job = await ctx.store.transition(jobId, expected, next, mutations);
  ctx.bus.publish(toStatusEvent(job));
  ctx.log.info('stage_transition', {
    jobId,
    from: expected,
    to: next,
    version: job.version,
    lastError: job.lastError ?? undefined
  });
  return job;
}

const MAX_ABORT_ATTEMPTS = 5;

/**
 * Move a job from whatever non-terminal stage it is in to a failure terminal.
 * Retries when a worker moves the job between the read and the write.
 *
 * @throws {InvalidTransitionError} when the job already finished
 */
export async function abortJob(
  ctx: LifecycleContext,
  jobId: string,
  target: Exclude<TerminalStage, 'COMPLETE'>,
  reason: string
): Promise<Job> {
  for (let attempt = 1; ; attempt++) {
    const job = await ctx.store.get(jobId);
    if (isTerminalStage(job.stage)) throw new InvalidTransitionError(job.stage, target);
    try {
      return await advance(ctx, jobId, job.stage, target, { lastError: reason });
    } catch (err) {
      if (!(err instanceof StaleTransitionError) || attempt >= MAX_ABORT_ATTEMPTS) throw err;
      ctx.log.debug('abort_retry', { jobId, target, observed: job.stage, actual: err.actual });
    }
  }
}

export function cancelJob(ctx: LifecycleContext, jobId: string, reason = 'Cancelled by owner'): Promise<Job> {
  return abortJob(ctx, jobId, 'CANCELLED', reason);
}
