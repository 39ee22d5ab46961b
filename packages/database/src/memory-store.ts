/**
 * In-process job store.
 *
 * Same contract as the Postgres client, backed by a Map. Used by tests and by
 * single-process local runs. Jobs are copied on the way in and out so callers
 * can never mutate stored state. Every method yields to the event loop once
 * before touching the map, which keeps interleavings realistic in tests while
 * each compare-and-set stays atomic.
 */

import { randomUUID } from 'node:crypto';
import {
  InvalidTransitionError,
  NotFoundError,
  StaleTransitionError,
  StoreUnavailableError,
  canTransition,
  type JobStage
} from '@docpipe/shared';
import {
  clearsReferences,
  jobInvariantViolations,
  type AttemptStage,
  type CreateJobParams,
  type Job,
  type JobAttempts,
  type JobMutations
} from './models/job';
import type { JobStore } from './store';

export interface InMemoryJobStoreOptions {
  now?: () => Date;
  generateId?: () => string;
  /** Per-stage attempt ceilings; a write that would exceed one is rejected */
  attemptBounds?: JobAttempts;
}

function copyJob(job: Job): Job {
  return {
    ...job,
    attempts: { ...job.attempts },
    createdAt: new Date(job.createdAt),
    updatedAt: new Date(job.updatedAt)
  };
}

export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Job>();
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly attemptBounds: JobAttempts | undefined;
  private unavailable: Error | null = null;

  constructor(options: InMemoryJobStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.attemptBounds = options.attemptBounds;
  }

  /** Make every call fail with StoreUnavailableError until cleared with `null`. */
  setUnavailable(cause: Error | null): void {
    this.unavailable = cause;
  }

  async create(params: CreateJobParams): Promise<Job> {
    await this.ready();
    const at = this.now();
    const job: Job = {
      id: this.generateId(),
      owner: params.owner,
      stage: 'UPLOADED',
      inputRef: params.inputRef,
      specRef: params.specRef,
      templateRef: params.templateRef,
      structuredDataRef: null,
      outputRef: null,
      attempts: { extraction: 0, generation: 0 },
      lastError: null,
      version: 1,
      createdAt: at,
      updatedAt: at
    };
    this.jobs.set(job.id, job);
    return copyJob(job);
  }

  async get(jobId: string): Promise<Job> {
    await this.ready();
    return copyJob(this.require(jobId));
  }

  async transition(jobId: string, expected: JobStage, next: JobStage, mutations: JobMutations = {}): Promise<Job> {
    await this.ready();
    if (!canTransition(expected, next)) throw new InvalidTransitionError(expected, next);
    const current = this.require(jobId);
    if (current.stage !== expected) throw new StaleTransitionError(jobId, expected, current.stage);

    const updated: Job = {
      ...current,
      attempts: { ...current.attempts },
      stage: next,
      version: current.version + 1,
      updatedAt: this.now()
    };
    if (mutations.structuredDataRef !== undefined) updated.structuredDataRef = mutations.structuredDataRef;
    if (mutations.outputRef !== undefined) updated.outputRef = mutations.outputRef;
    if (mutations.lastError !== undefined) updated.lastError = mutations.lastError;
    if (clearsReferences(next)) {
      updated.structuredDataRef = null;
      updated.outputRef = null;
    }

    this.check(updated, `Transition ${expected} → ${next}`);
    this.jobs.set(jobId, updated);
    return copyJob(updated);
  }

  async incrementAttempt(jobId: string, stage: AttemptStage): Promise<number> {
    await this.ready();
    const current = this.require(jobId);
    const attempts: JobAttempts = { ...current.attempts };
    attempts[stage] += 1;
    const updated: Job = { ...current, attempts, version: current.version + 1, updatedAt: this.now() };
    this.check(updated, `Attempt ${attempts[stage]} at ${stage}`);
    this.jobs.set(jobId, updated);
    return attempts[stage];
  }

  async listByOwner(owner: string, options?: { limit?: number; stage?: JobStage }): Promise<Job[]> {
    await this.ready();
    const limit = options?.limit ?? 50;
    return [...this.jobs.values()]
      .filter((job) => job.owner === owner && (!options?.stage || job.stage === options.stage))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map(copyJob);
  }

  async healthCheck(): Promise<boolean> {
    return this.unavailable === null;
  }

  async end(): Promise<void> {
    this.jobs.clear();
  }

  private check(job: Job, write: string): void {
    const violations = jobInvariantViolations(job, this.attemptBounds);
    if (violations.length > 0) {
      throw new Error(`${write} on job ${job.id} rejected: ${violations.join('; ')}`);
    }
  }

  private async ready(): Promise<void> {
    await Promise.resolve();
    if (this.unavailable) throw new StoreUnavailableError('In-memory job store unavailable', this.unavailable);
  }

  private require(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) throw new NotFoundError(jobId);
    return job;
  }
}
