import { holdsStructuredData, isTerminalStage, type JobStage } from '@docpipe/shared';

/** Stage whose attempts are counted separately on the job. */
export type AttemptStage = 'extraction' | 'generation';

export interface JobAttempts {
  extraction: number;
  generation: number;
}

/**
 * A document job. Mirrors one row of the `jobs` table.
 *
 * Ownership follows `stage`: only the worker for the current stage mutates
 * the job, and only through a compare-and-set transition.
 */
export interface Job {
  /** Opaque unique identifier (UUID), immutable */
  id: string;
  /** Submitting identity (API key id) */
  owner: string;
  stage: JobStage;
  /** Uploaded document */
  inputRef: string;
  /** Extraction field specification */
  specRef: string;
  /** Output layout template */
  templateRef: string;
  /** Structured record, set by extraction */
  structuredDataRef: string | null;
  /** Rendered document, set by generation */
  outputRef: string | null;
  attempts: JobAttempts;
  /** Last failure description; cleared by a successful forward step */
  lastError: string | null;
  /** Write counter, bumped on every change */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateJobParams {
  owner: string;
  inputRef: string;
  specRef: string;
  templateRef: string;
}

/** Field changes applied together with a stage transition. */
export interface JobMutations {
  structuredDataRef?: string | null;
  outputRef?: string | null;
  lastError?: string | null;
}

/** Stages that end a job without output; both references are cleared on entry. */
export function clearsReferences(stage: JobStage): boolean {
  return isTerminalStage(stage) && stage !== 'COMPLETE';
}

/**
 * Invariants every stored job satisfies. Returns human-readable violations,
 * empty when the job is consistent.
 */
export function jobInvariantViolations(job: Job, bounds?: JobAttempts): string[] {
  const violations: string[] = [];
  if ((job.structuredDataRef !== null) !== holdsStructuredData(job.stage)) {
    violations.push(`structuredDataRef must be ${holdsStructuredData(job.stage) ? 'set' : 'null'} in ${job.stage}`);
  }
  if ((job.outputRef !== null) !== (job.stage === 'COMPLETE')) {
    violations.push(`outputRef must be ${job.stage === 'COMPLETE' ? 'set' : 'null'} in ${job.stage}`);
  }
  if (job.stage === 'COMPLETE' && job.lastError !== null) {
    violations.push('lastError must be null in COMPLETE');
  }
  if (bounds) {
    if (job.attempts.extraction > bounds.extraction) violations.push('extraction attempts exceed the bound');
    if (job.attempts.generation > bounds.generation) violations.push('generation attempts exceed the bound');
  }
  return violations;
}
