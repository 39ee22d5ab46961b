/**
 * @fileoverview Pipeline configuration
 *
 * Retry bounds, timeouts and queue settings are read from the environment and
 * validated with Zod. Empty strings count as unset so that a blank line in a
 * .env file falls back to the default instead of failing validation.
 *
 * Environment Variables:
 * - EXTRACTION_MAX_ATTEMPTS / GENERATION_MAX_ATTEMPTS: per-stage retry bound (default 3)
 * - QUEUE_MAX_DELIVERIES: hard delivery ceiling before dead-lettering (default 10)
 * - QUEUE_VISIBILITY_TIMEOUT_MS: redelivery delay for unacknowledged messages (default 15 min)
 * - QUEUE_WAIT_MS: how long a dequeue blocks waiting for work (default 20 s)
 * - EXTRACTION_TIMEOUT_MS / RENDER_TIMEOUT_MS: collaborator call timeouts (5 min / 2 min)
 * - RETRY_BACKOFF_BASE_MS / RETRY_BACKOFF_MAX_MS: release delay after a failed attempt
 * - STALE_CLAIM_MS: age after which an in-flight claim is treated as abandoned
 * - WORKER_CONCURRENCY: messages processed in parallel per worker
 * - SHORT_CIRCUIT_PERMANENT_ERRORS: dead-letter permanent collaborator failures at once
 * - MAX_UPLOAD_BYTES: largest accepted upload (default 15 MB)
 * - STATUS_BUFFER_SIZE: per-subscriber event buffer
 */

import { z } from 'zod';
import { ConfigError } from './errors';

export interface StageSettings {
  /** Attempts allowed before the stage gives up on a job */
  maxAttempts: number;
  /** Per-call collaborator timeout */
  timeoutMs: number;
}

export interface PipelineConfig {
  extraction: StageSettings;
  generation: StageSettings;
  queue: {
    visibilityTimeoutMs: number;
    maxDeliveries: number;
    waitMs: number;
  };
  retry: {
    baseDelayMs: number;
    maxDelayMs: number;
  };
  staleClaimMs: number;
  workerConcurrency: number;
  shortCircuitPermanentErrors: boolean;
  maxUploadBytes: number;
  statusBufferSize: number;
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

function intSetting(fallback: number, min = 1) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));
}

const flagSetting = z.preprocess(
  blankToUndefined,
  z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((v) => v === 'true' || v === '1')
);

const envSchema = z.object({
  EXTRACTION_MAX_ATTEMPTS: intSetting(3),
  GENERATION_MAX_ATTEMPTS: intSetting(3),
  QUEUE_MAX_DELIVERIES: intSetting(10),
  QUEUE_VISIBILITY_TIMEOUT_MS: intSetting(15 * 60_000),
  QUEUE_WAIT_MS: intSetting(20_000, 0),
  EXTRACTION_TIMEOUT_MS: intSetting(5 * 60_000),
  RENDER_TIMEOUT_MS: intSetting(2 * 60_000),
  RETRY_BACKOFF_BASE_MS: intSetting(1_000, 0),
  RETRY_BACKOFF_MAX_MS: intSetting(60_000, 0),
  STALE_CLAIM_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).optional()),
  WORKER_CONCURRENCY: intSetting(1),
  SHORT_CIRCUIT_PERMANENT_ERRORS: flagSetting,
  MAX_UPLOAD_BYTES: intSetting(15 * 1024 * 1024),
  STATUS_BUFFER_SIZE: intSetting(64)
});

type RawSettings = z.infer<typeof envSchema>;

function crossFieldIssues(raw: RawSettings): string[] {
  const issues: string[] = [];
  if (raw.QUEUE_VISIBILITY_TIMEOUT_MS <= raw.EXTRACTION_TIMEOUT_MS) {
    issues.push('QUEUE_VISIBILITY_TIMEOUT_MS must exceed EXTRACTION_TIMEOUT_MS');
  }
  if (raw.QUEUE_VISIBILITY_TIMEOUT_MS <= raw.RENDER_TIMEOUT_MS) {
    issues.push('QUEUE_VISIBILITY_TIMEOUT_MS must exceed RENDER_TIMEOUT_MS');
  }
  if (raw.QUEUE_MAX_DELIVERIES <= Math.max(raw.EXTRACTION_MAX_ATTEMPTS, raw.GENERATION_MAX_ATTEMPTS)) {
    issues.push('QUEUE_MAX_DELIVERIES must exceed the stage retry bounds');
  }
  if (raw.RETRY_BACKOFF_MAX_MS < raw.RETRY_BACKOFF_BASE_MS) {
    issues.push('RETRY_BACKOFF_MAX_MS must not be below RETRY_BACKOFF_BASE_MS');
  }
  return issues;
}

/**
 * Parse pipeline settings from an environment map.
 *
 * @throws {ConfigError} listing every invalid setting
 */
export function loadPipelineConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const raw = parsed.data;
  const issues = crossFieldIssues(raw);
  if (issues.length > 0) throw new ConfigError(issues);

  return {
    extraction: { maxAttempts: raw.EXTRACTION_MAX_ATTEMPTS, timeoutMs: raw.EXTRACTION_TIMEOUT_MS },
    generation: { maxAttempts: raw.GENERATION_MAX_ATTEMPTS, timeoutMs: raw.RENDER_TIMEOUT_MS },
    queue: {
      visibilityTimeoutMs: raw.QUEUE_VISIBILITY_TIMEOUT_MS,
      maxDeliveries: raw.QUEUE_MAX_DELIVERIES,
      waitMs: raw.QUEUE_WAIT_MS
    },
    retry: { baseDelayMs: raw.RETRY_BACKOFF_BASE_MS, maxDelayMs: raw.RETRY_BACKOFF_MAX_MS },
    staleClaimMs: raw.STALE_CLAIM_MS ?? Math.max(raw.EXTRACTION_TIMEOUT_MS, raw.RENDER_TIMEOUT_MS) + 60_000,
    workerConcurrency: raw.WORKER_CONCURRENCY,
    shortCircuitPermanentErrors: raw.SHORT_CIRCUIT_PERMANENT_ERRORS,
    maxUploadBytes: raw.MAX_UPLOAD_BYTES,
    statusBufferSize: raw.STATUS_BUFFER_SIZE
  };
}

/** Required string setting, trimmed. */
export function requireEnv(name: string, env: Record<string, string | undefined> = process.env): string {
  const value = env[name]?.trim();
  if (!value) throw new ConfigError([`${name}: required`]);
  return value;
}
