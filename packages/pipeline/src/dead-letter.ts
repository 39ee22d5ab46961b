import { InvalidTransitionError, NotFoundError, describeError } from '@docpipe/shared';
import type { AttemptStage } from '@docpipe/database';
import { abortJob, type LifecycleContext } from './lifecycle';
import type { DeadLetterHandler, JobMessage } from './queue/types';

/**
 * Escalation for messages the queue gave up on. The job, unless it already
 * finished, is moved to DEAD_LETTERED so observers see a terminal state, and
 * an alarm line is logged either way.
 */
export function createDeadLetterHandler(ctx: LifecycleContext, queue: AttemptStage): DeadLetterHandler<JobMessage> {
  return async (message, error) => {
    const { jobId } = message.body;
    const log = ctx.log.child({ jobId, queue, messageId: message.id, deliveryCount: error.deliveryCount });
    log.error('message_dead_lettered', { alarm: true, error });

    try {
      const job = await abortJob(ctx, jobId, 'DEAD_LETTERED', describeError(error));
      log.error('job_dead_lettered', { alarm: true, version: job.version });
    } catch (err) {
      if (err instanceof InvalidTransitionError) {
        log.info('dead_letter_job_already_terminal', { stage: err.from });
        return;
      }
      if (err instanceof NotFoundError) {
        log.warn('dead_letter_job_missing');
        return;
      }
      throw err;
    }
  };
}
