import { NotFoundError, isTerminalStage, type StatusEvent } from '@docpipe/shared';
import type { Job, JobStore } from '@docpipe/database';
import type { StatusBus } from './bus/status-bus';
import { toStatusEvent } from './lifecycle';

export interface WatchOptions {
  signal?: AbortSignal;
  bufferSize?: number;
}

/**
 * Status feed for one job: the current state first, then every later change
 * until the job reaches a terminal stage.
 *
 * The subscription is opened before the snapshot is read, so a transition
 * committed in between is buffered rather than lost; anything the snapshot
 * already covers is skipped by version.
 *
 * @throws {NotFoundError} when the job does not exist
 */
export async function* watchJob(
  deps: { store: JobStore; bus: StatusBus },
  jobId: string,
  options: WatchOptions = {}
): AsyncGenerator<StatusEvent, void, void> {
  const subscription = deps.bus.subscribe(jobId, options);
  try {
    const snapshot = toStatusEvent(await deps.store.get(jobId));
    yield snapshot;
    if (isTerminalStage(snapshot.stage)) return;

    for await (const event of subscription) {
      if (event.version <= snapshot.version) continue;
      yield event;
    }
  } finally {
    subscription.close();
  }
}

/**
 * Publish the stored state of every watched job as a relayed event. Run
 * after a relay reconnects so watchers catch up on anything sent while it
 * was down; versions they already saw are dropped by the bus.
 *
 * @returns number of jobs republished
 */
export async function resyncWatchers(deps: { store: JobStore; bus: StatusBus }): Promise<number> {
  let count = 0;
  for (const jobId of deps.bus.watchedJobs()) {
    let job: Job;
    try {
      job = await deps.store.get(jobId);
    } catch (err) {
      if (err instanceof NotFoundError) continue;
      throw err;
    }
    deps.bus.publish(toStatusEvent(job), 'relay');
    count += 1;
  }
  return count;
}
