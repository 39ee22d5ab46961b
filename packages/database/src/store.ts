import type { JobStage } from '@docpipe/shared';
import type { AttemptStage, CreateJobParams, Job, JobMutations } from './models/job';

/**
 * Durable record of jobs. Every stage change goes through `transition`, an
 * atomic compare-and-set on the current stage; it is the only mutual
 * exclusion between workers.
 *
 * Errors:
 * - StaleTransitionError: the job is no longer in `expected`
 * - NotFoundError: unknown job id
 * - InvalidTransitionError: `expected → next` is not a stage edge
 * - StoreUnavailableError: the backing store could not be reached
 */
export interface JobStore {
  /** Insert a job in stage UPLOADED. */
  create(params: CreateJobParams): Promise<Job>;
  get(jobId: string): Promise<Job>;
  transition(jobId: string, expected: JobStage, next: JobStage, mutations?: JobMutations): Promise<Job>;
  /** Count one more attempt at `stage` and return the new count. */
  incrementAttempt(jobId: string, stage: AttemptStage): Promise<number>;
  listByOwner(owner: string, options?: { limit?: number; stage?: JobStage }): Promise<Job[]>;
  healthCheck(): Promise<boolean>;
  end(): Promise<void>;
}
