/**
 * Upload boundary: validates a document, stores it, creates the job and puts
 * it on the extraction queue.
 *
 * Validation failures are UploadRejectedError (the client must change the
 * request). Store or storage outages before the message is sent are
 * UploadFailedError (retry later); once it is sent the upload succeeds even
 * if the job is still UPLOADED.
 */

import {
  StaleTransitionError,
  StorageUnavailableError,
  StoreUnavailableError,
  UploadFailedError,
  UploadRejectedError,
  describeError,
  type JobStage
} from '@docpipe/shared';
import type { Job } from '@docpipe/database';
import { uploadScope, type ArtifactGateway } from './artifacts/gateway';
import { abortJob, advance, toStatusEvent, type LifecycleContext } from './lifecycle';
import type { JobMessage, MessageQueue } from './queue/types';

export interface UploadDeps extends LifecycleContext {
  artifacts: ArtifactGateway;
  extractionQueue: Pick<MessageQueue<JobMessage>, 'enqueue'>;
  maxUploadBytes: number;
}

export interface UploadRequest {
  owner: string;
  document: Uint8Array;
  specRef: string;
  templateRef: string;
}

export interface UploadResult {
  jobId: string;
  stage: JobStage;
  createdAt: Date;
}

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-

export function isPdf(bytes: Uint8Array): boolean {
  return bytes.length >= PDF_MAGIC.length && PDF_MAGIC.every((b, i) => bytes[i] === b);
}

function validate(request: UploadRequest, maxUploadBytes: number): void {
  if (!request.owner.trim()) throw new UploadRejectedError('owner is required');
  if (!request.specRef.trim()) throw new UploadRejectedError('spec_ref is required');
  if (!request.templateRef.trim()) throw new UploadRejectedError('template_ref is required');
  if (request.document.length === 0) throw new UploadRejectedError('Document is empty');
  if (request.document.length > maxUploadBytes) {
    throw new UploadRejectedError(`Document exceeds the ${maxUploadBytes} byte limit`);
  }
  if (!isPdf(request.document)) throw new UploadRejectedError('Document is not a PDF');
}

const isOutage = (err: unknown) => err instanceof StoreUnavailableError || err instanceof StorageUnavailableError;

export async function submitUpload(deps: UploadDeps, request: UploadRequest): Promise<UploadResult> {
  validate(request, deps.maxUploadBytes);
  const log = deps.log.child({ owner: request.owner });

  let inputRef: string;
  try {
    inputRef = await deps.artifacts.put(request.document, {
      scope: uploadScope(request.owner),
      kind: 'input',
      contentType: 'application/pdf'
    });
  } catch (err) {
    if (!isOutage(err)) throw err;
    throw new UploadFailedError('Could not store the document', { cause: err });
  }

  let job: Job;
  try {
    job = await deps.store.create({
      owner: request.owner,
      inputRef,
      specRef: request.specRef.trim(),
      templateRef: request.templateRef.trim()
    });
  } catch (err) {
    if (!isOutage(err)) throw err;
    await deps.artifacts.delete(inputRef).catch((cleanupErr: unknown) => {
      log.warn('upload_cleanup_failed', { inputRef, error: cleanupErr });
    });
    throw new UploadFailedError('Could not create the job', { cause: err });
  }
  deps.bus.publish(toStatusEvent(job));
  const jobId = job.id;

  // The message goes out before the job leaves UPLOADED: extraction promotes
  // an UPLOADED job itself, so a failed advance below never strands it.
  try {
    await deps.extractionQueue.enqueue({ jobId });
  } catch (err) {
    log.error('upload_enqueue_failed', { jobId, error: err });
    await abortJob(deps, jobId, 'CANCELLED', `Upload abandoned: ${describeError(err)}`).catch((abortErr: unknown) => {
      log.error('upload_abort_failed', { jobId, error: abortErr });
    });
    throw new UploadFailedError('Could not queue the job', { jobId, cause: err });
  }

  let stage: JobStage = job.stage;
  try {
    stage = (await advance(deps, jobId, 'UPLOADED', 'QUEUED')).stage;
  } catch (err) {
    if (err instanceof StaleTransitionError) {
      stage = err.actual;
    } else if (isOutage(err)) {
      log.warn('upload_advance_deferred', { jobId, error: err });
    } else {
      throw err;
    }
  }

  log.info('job_submitted', { jobId, inputRef, stage, bytes: request.document.length });
  return { jobId, stage, createdAt: job.createdAt };
}
