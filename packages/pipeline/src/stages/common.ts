import { CollaboratorTimeoutError } from '@docpipe/shared';

/**
 * What the worker does with a delivery once a stage has handled it.
 *
 * - ack: processed or discarded for good
 * - release: make visible again after `delayMs` (retry backoff)
 * - leave: do nothing; the visibility timeout redelivers it
 */
export type Disposition = { action: 'ack' } | { action: 'release'; delayMs: number } | { action: 'leave' };

export const ack = (): Disposition => ({ action: 'ack' });
export const release = (delayMs: number): Disposition => ({ action: 'release', delayMs });
export const leave = (): Disposition => ({ action: 'leave' });

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Adds random jitter in [0, spread) to a base delay. */
export function jitter(base: number, spread: number, random: () => number = Math.random): number {
  return base + Math.floor(random() * spread);
}

/**
 * Release delay after the `attempt`-th failure: base · 2^(attempt-1) plus up
 * to 20% jitter, capped at the maximum.
 */
export function computeBackoff(attempt: number, policy: BackoffPolicy, random: () => number = Math.random): number {
  const exponent = Math.max(0, attempt - 1);
  const exp = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
  return Math.min(policy.maxDelayMs, jitter(exp, Math.floor(exp / 5), random));
}

/**
 * Run `call` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with CollaboratorTimeoutError at the deadline even if the
 * callee ignores the signal.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new CollaboratorTimeoutError(operation, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  try {
    return await Promise.race([Promise.resolve().then(() => call(controller.signal)), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
