/**
 * @fileoverview Pipeline error taxonomy
 *
 * All failures that cross a component boundary are instances of PipelineError.
 * Each carries a machine-readable `code` and a `retryable` flag so that stage
 * workers can decide between "release with backoff", "leave for redelivery"
 * and "terminal" without inspecting messages.
 *
 * | Error                      | Retryable | Raised by                         |
 * |----------------------------|-----------|-----------------------------------|
 * | StaleTransitionError       | no        | job store CAS mismatch            |
 * | NotFoundError              | no        | job store lookups                 |
 * | InvalidTransitionError     | no        | edge missing from stage table     |
 * | StoreUnavailableError      | yes       | job store I/O                     |
 * | StorageUnavailableError    | yes       | artifact gateway I/O              |
 * | ArtifactNotFoundError      | no        | artifact gateway reads            |
 * | ExtractionError            | by kind   | extraction collaborator           |
 * | RenderError                | by kind   | rendering collaborator            |
 * | CollaboratorTimeoutError   | yes       | per-call timeouts                 |
 * | DeadLetterError            | no        | queue delivery ceiling            |
 * | UploadRejectedError        | no        | upload validation                 |
 * | UploadFailedError          | yes       | upload persistence / enqueue      |
 * | ConfigError                | no        | environment parsing               |
 */

import type { JobStage } from './stages';

export type PipelineErrorCode =
  | 'STALE_TRANSITION'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'STORE_UNAVAILABLE'
  | 'STORAGE_UNAVAILABLE'
  | 'ARTIFACT_NOT_FOUND'
  | 'EXTRACTION_FAILED'
  | 'RENDER_FAILED'
  | 'COLLABORATOR_TIMEOUT'
  | 'DEAD_LETTER'
  | 'UPLOAD_REJECTED'
  | 'UPLOAD_FAILED'
  | 'CONFIG';

/** Whether a collaborator failure is worth another attempt. */
export type FailureKind = 'transient' | 'permanent';

export class PipelineError extends Error {
  /** Machine-readable error code */
  readonly code: PipelineErrorCode;
  /** True when repeating the same operation later may succeed */
  readonly retryable: boolean;
  /** Message of the underlying cause, when one was wrapped */
  causeMessage?: string;

  constructor(options: { message: string; code: PipelineErrorCode; retryable: boolean; cause?: unknown }) {
    super(options.message);
    this.name = 'PipelineError';
    this.code = options.code;
    this.retryable = options.retryable;
    const cm = options.cause instanceof Error ? options.cause.message : undefined;
    if (cm !== undefined) this.causeMessage = cm;
  }

  /** Extra fields contributed by subclasses to the serialized form. */
  protected details(): Record<string, unknown> {
    return {};
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      ...(this.causeMessage !== undefined ? { causeMessage: this.causeMessage } : {}),
      ...this.details()
    };
  }
}

export class StaleTransitionError extends PipelineError {
  readonly jobId: string;
  readonly expected: JobStage;
  readonly actual: JobStage;

  constructor(jobId: string, expected: JobStage, actual: JobStage) {
    super({
      message: `Job ${jobId} is in stage ${actual}, expected ${expected}`,
      code: 'STALE_TRANSITION',
      retryable: false
    });
    this.name = 'StaleTransitionError';
    this.jobId = jobId;
    this.expected = expected;
    this.actual = actual;
  }

  protected override details() {
    return { jobId: this.jobId, expected: this.expected, actual: this.actual };
  }
}

export class NotFoundError extends PipelineError {
  readonly jobId: string;

  constructor(jobId: string) {
    super({ message: `Job ${jobId} not found`, code: 'NOT_FOUND', retryable: false });
    this.name = 'NotFoundError';
    this.jobId = jobId;
  }

  protected override details() {
    return { jobId: this.jobId };
  }
}

export class InvalidTransitionError extends PipelineError {
  readonly from: JobStage;
  readonly to: JobStage;

  constructor(from: JobStage, to: JobStage) {
    super({ message: `Transition ${from} → ${to} is not allowed`, code: 'INVALID_TRANSITION', retryable: false });
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }

  protected override details() {
    return { from: this.from, to: this.to };
  }
}

export class StoreUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super({ message, code: 'STORE_UNAVAILABLE', retryable: true, cause });
    this.name = 'StoreUnavailableError';
  }
}

export class StorageUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super({ message, code: 'STORAGE_UNAVAILABLE', retryable: true, cause });
    this.name = 'StorageUnavailableError';
  }
}

export class ArtifactNotFoundError extends PipelineError {
  readonly ref: string;

  constructor(ref: string) {
    super({ message: `Artifact ${ref} not found`, code: 'ARTIFACT_NOT_FOUND', retryable: false });
    this.name = 'ArtifactNotFoundError';
    this.ref = ref;
  }

  protected override details() {
    return { ref: this.ref };
  }
}

export class ExtractionError extends PipelineError {
  readonly kind: FailureKind;
  /** Provider-specific category, when the collaborator reports one */
  readonly category: string | undefined;

  constructor(options: { message: string; kind: FailureKind; category?: string; cause?: unknown }) {
    super({
      message: options.message,
      code: 'EXTRACTION_FAILED',
      retryable: options.kind === 'transient',
      cause: options.cause
    });
    this.name = 'ExtractionError';
    this.kind = options.kind;
    this.category = options.category;
  }

  protected override details() {
    return { kind: this.kind, ...(this.category ? { category: this.category } : {}) };
  }
}

export class RenderError extends PipelineError {
  readonly kind: FailureKind;

  constructor(options: { message: string; kind: FailureKind; cause?: unknown }) {
    super({
      message: options.message,
      code: 'RENDER_FAILED',
      retryable: options.kind === 'transient',
      cause: options.cause
    });
    this.name = 'RenderError';
    this.kind = options.kind;
  }

  protected override details() {
    return { kind: this.kind };
  }
}

export class CollaboratorTimeoutError extends PipelineError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super({
      message: `${operation} timed out after ${timeoutMs}ms`,
      code: 'COLLABORATOR_TIMEOUT',
      retryable: true
    });
    this.name = 'CollaboratorTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }

  protected override details() {
    return { operation: this.operation, timeoutMs: this.timeoutMs };
  }
}

export class DeadLetterError extends PipelineError {
  readonly messageId: string;
  readonly deliveryCount: number;

  constructor(messageId: string, deliveryCount: number, reason?: string) {
    super({
      message: reason ?? `Message ${messageId} exceeded the delivery ceiling after ${deliveryCount} deliveries`,
      code: 'DEAD_LETTER',
      retryable: false
    });
    this.name = 'DeadLetterError';
    this.messageId = messageId;
    this.deliveryCount = deliveryCount;
  }

  protected override details() {
    return { messageId: this.messageId, deliveryCount: this.deliveryCount };
  }
}

export class UploadRejectedError extends PipelineError {
  constructor(message: string) {
    super({ message, code: 'UPLOAD_REJECTED', retryable: false });
    this.name = 'UploadRejectedError';
  }
}

export class UploadFailedError extends PipelineError {
  readonly jobId: string | undefined;

  constructor(message: string, options?: { jobId?: string; cause?: unknown }) {
    super({ message, code: 'UPLOAD_FAILED', retryable: true, cause: options?.cause });
    this.name = 'UploadFailedError';
    this.jobId = options?.jobId;
  }

  protected override details() {
    return this.jobId ? { jobId: this.jobId } : {};
  }
}

export class ConfigError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super({ message: `Invalid configuration: ${issues.join('; ')}`, code: 'CONFIG', retryable: false });
    this.name = 'ConfigError';
    this.issues = issues;
  }

  protected override details() {
    return { issues: this.issues };
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

/** True for pipeline errors flagged retryable; unknown errors count as transient. */
export function isRetryable(err: unknown): boolean {
  return err instanceof PipelineError ? err.retryable : true;
}

/** One-line description stored as a job's `lastError`. */
export function describeError(err: unknown): string {
  if (err instanceof PipelineError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Plain object form for log lines. */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof PipelineError) return err.toJSON();
  if (err instanceof Error) return { name: err.name, message: err.message };
  return { message: String(err) };
}
