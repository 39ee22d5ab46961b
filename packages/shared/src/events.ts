import { z } from 'zod';
import { JOB_STAGES, type JobStage } from './stages';

/**
 * Status event emitted on job creation and after every committed transition.
 * `version` is the job's write counter after the change, so observers can
 * discard anything they have already seen.
 */
export interface StatusEvent {
  jobId: string;
  stage: JobStage;
  timestamp: string;
  version: number;
  error?: string | null;
}

export const statusEventSchema = z.object({
  jobId: z.string().min(1),
  stage: z.enum(JOB_STAGES),
  timestamp: z.string(),
  version: z.number().int().nonnegative(),
  error: z.string().nullable().optional()
});

export function parseStatusEvent(raw: unknown): StatusEvent | null {
  const parsed = statusEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
