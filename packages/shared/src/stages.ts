/**
 * @fileoverview Job stage vocabulary
 *
 * Every job moves through the same ordered set of stages. The transition table
 * below is the single source of truth for which compare-and-set moves the job
 * store accepts; workers never invent edges of their own.
 *
 * Forward path:
 *   UPLOADED → QUEUED → EXTRACTING → EXTRACTED → GENERATING → COMPLETE
 *
 * Retry rollbacks (stay inside the same phase):
 *   EXTRACTING → QUEUED, GENERATING → EXTRACTED
 *
 * Any non-terminal stage may also move to FAILED, DEAD_LETTERED or CANCELLED.
 */

export const JOB_STAGES = [
  'UPLOADED',
  'QUEUED',
  'EXTRACTING',
  'EXTRACTED',
  'GENERATING',
  'COMPLETE',
  'FAILED',
  'DEAD_LETTERED',
  'CANCELLED'
] as const;

export type JobStage = (typeof JOB_STAGES)[number];

export type TerminalStage = Extract<JobStage, 'COMPLETE' | 'FAILED' | 'DEAD_LETTERED' | 'CANCELLED'>;

export const TERMINAL_STAGES: readonly TerminalStage[] = ['COMPLETE', 'FAILED', 'DEAD_LETTERED', 'CANCELLED'];

const ABORT_EDGES: readonly JobStage[] = ['FAILED', 'DEAD_LETTERED', 'CANCELLED'];

const TRANSITIONS: Record<JobStage, readonly JobStage[]> = {
  UPLOADED: ['QUEUED', ...ABORT_EDGES],
  QUEUED: ['EXTRACTING', ...ABORT_EDGES],
  EXTRACTING: ['EXTRACTED', 'QUEUED', ...ABORT_EDGES],
  EXTRACTED: ['GENERATING', ...ABORT_EDGES],
  GENERATING: ['COMPLETE', 'EXTRACTED', ...ABORT_EDGES],
  COMPLETE: [],
  FAILED: [],
  DEAD_LETTERED: [],
  CANCELLED: []
};

/**
 * Phase of a stage. Observed stage sequences are non-decreasing in phase even
 * though retry rollbacks move between the two stages of a phase.
 */
const PHASES: Record<JobStage, number> = {
  UPLOADED: 0,
  QUEUED: 1,
  EXTRACTING: 1,
  EXTRACTED: 2,
  GENERATING: 2,
  COMPLETE: 3,
  FAILED: 3,
  DEAD_LETTERED: 3,
  CANCELLED: 3
};

export function isJobStage(value: unknown): value is JobStage {
  return JOB_STAGES.some((stage) => stage === value);
}

export function isTerminalStage(stage: JobStage): stage is TerminalStage {
  return TERMINAL_STAGES.some((terminal) => terminal === stage);
}

export function canTransition(from: JobStage, to: JobStage): boolean {
  return TRANSITIONS[from].includes(to);
}

export function stagePhase(stage: JobStage): number {
  return PHASES[stage];
}

/** Stages in which a structured data reference must be present. */
export function holdsStructuredData(stage: JobStage): boolean {
  return stage === 'EXTRACTED' || stage === 'GENERATING' || stage === 'COMPLETE';
}
