/**
 * @fileoverview Job Management Lambda Handler
 *
 * API Gateway integration for the document pipeline. Clients upload a PDF
 * with references to a stored spec and template, then poll or cancel the job.
 *
 * API Endpoints:
 * - POST /jobs - Upload a document and queue it for extraction
 * - GET /jobs - List the caller's jobs (?stage=, ?limit=)
 * - GET /jobs/{jobId} - Complete job record
 * - GET /jobs/{jobId}/status - Stage, attempts and last error
 * - GET /jobs/{jobId}/events - Long poll for the next change (?after=<version>&wait_ms=)
 * - POST /jobs/{jobId}/cancel - Cancel a job that has not finished
 * - GET / - Health check
 *
 * The caller is identified by the API Gateway key id; jobs of other callers
 * answer 404. Retryable failures (store or storage outages) answer 503.
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import {
  InvalidTransitionError,
  NotFoundError,
  UploadRejectedError,
  createLogger,
  isJobStage,
  isPipelineError,
  isTerminalStage,
  type StatusEvent
} from '@docpipe/shared';
import type { Job } from '@docpipe/database';
import { API_VERSION } from '../index';
import { getRuntime, type Runtime } from '../runtime';

const baseLog = createLogger('job-management');

const createJobSchema = z.object({
  document_base64: z.string().min(1, 'document_base64 is required'),
  spec_ref: z.string().trim().min(1, 'spec_ref is required').max(512),
  template_ref: z.string().trim().min(1, 'template_ref is required').max(512)
});

const cancelSchema = z.object({ reason: z.string().trim().min(1).max(500).optional() });

const eventsQuerySchema = z.object({
  after: z.coerce.number().int().min(0).default(0),
  wait_ms: z.coerce.number().int().min(0).max(20_000).default(10_000)
});

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

class BadRequest extends Error {}

function readJsonBody(event: APIGatewayProxyEvent): unknown {
  if (!event.body) return {};
  const text = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
  try {
    return JSON.parse(text);
  } catch {
    throw new BadRequest('Request body must be valid JSON');
  }
}

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, fallback: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new BadRequest(`${where}${issue?.message ?? fallback}`);
  }
  return parsed.data;
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, event: APIGatewayProxyEvent): T {
  return parseInput(schema, readJsonBody(event), 'Invalid request body');
}

function decodeDocument(base64: string): Uint8Array {
  const compact = base64.replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(compact)) {
    throw new BadRequest('document_base64 must be base64 encoded');
  }
  return new Uint8Array(Buffer.from(compact, 'base64'));
}

function toJobResponse(job: Job) {
  return {
    id: job.id,
    stage: job.stage,
    input_ref: job.inputRef,
    spec_ref: job.specRef,
    template_ref: job.templateRef,
    structured_data_ref: job.structuredDataRef,
    output_ref: job.outputRef,
    attempts: job.attempts,
    last_error: job.lastError,
    version: job.version,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString()
  };
}

function toStatusResponse(job: Job) {
  return {
    id: job.id,
    stage: job.stage,
    ...(job.lastError !== null ? { last_error: job.lastError } : {}),
    attempts: job.attempts,
    updated_at: job.updatedAt.toISOString()
  };
}

/** Load a job the caller may see, or answer 404. */
async function loadOwnedJob(
  runtime: Runtime,
  jobId: string | undefined,
  clientId: string | null
): Promise<Job | APIGatewayProxyResult> {
  if (!jobId || !isUuid(jobId)) {
    return json(400, errorBody('VALIDATION_ERROR', 'job_id must be a valid UUID'));
  }
  try {
    const job = await runtime.store.get(jobId);
    if (clientId && job.owner !== clientId) {
      return json(404, errorBody('NOT_FOUND', 'Job not found'));
    }
    return job;
  } catch (err) {
    if (err instanceof NotFoundError) return json(404, errorBody('NOT_FOUND', 'Job not found'));
    throw err;
  }
}

function toEventResponse(event: StatusEvent) {
  return {
    stage: event.stage,
    version: event.version,
    timestamp: event.timestamp,
    ...(event.error ? { error: event.error } : {})
  };
}

/**
 * Wait up to `waitMs` for the job's first state newer than `after`. Returns
 * the current state straight away when it is already newer; intermediate
 * stages a slow poller missed collapse into the latest one.
 */
async function nextEvent(runtime: Runtime, jobId: string, after: number, waitMs: number): Promise<StatusEvent | null> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), waitMs);
  try {
    for await (const event of runtime.pipeline.watch(jobId, { signal: controller.signal })) {
      if (event.version > after) return event;
    }
    return null;
  } finally {
    clearTimeout(timer);
  }
}

const isResponse = (value: Job | APIGatewayProxyResult): value is APIGatewayProxyResult => 'statusCode' in value;

/**
 * Main Lambda handler for job management operations.
 *
 * @example
 * ```typescript
 * const res = await handler({
 *   ...event,
 *   httpMethod: 'POST',
 *   resource: '/jobs',
 *   body: JSON.stringify({ document_base64, spec_ref: 'specs/lease', template_ref: 'templates/summary' })
 * });
 * ```
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const start = Date.now();
  const clientId = event.requestContext?.identity?.apiKeyId ?? null;
  const log = baseLog.child({ clientId, method: event.httpMethod, resource: event.resource, path: event.path });

  log.info('request_received');

  let runtime: Runtime | null = null;
  try {
    runtime = await getRuntime();
    const { httpMethod, resource, pathParameters } = event;

    switch (httpMethod) {
      case 'POST': {
        if (resource === '/jobs') {
          if (!clientId) return json(401, errorBody('UNAUTHORIZED', 'An API key is required'));
          const body = parseBody(createJobSchema, event);
          const document = decodeDocument(body.document_base64);

          const result = await runtime.pipeline.submit({
            owner: clientId,
            document,
            specRef: body.spec_ref,
            templateRef: body.template_ref
          });
          log.info('job_created', { jobId: result.jobId, bytes: document.byteLength });
          return json(201, { job_id: result.jobId, stage: result.stage, created_at: result.createdAt.toISOString() });
        }

        if (resource === '/jobs/{jobId}/cancel') {
          const owned = await loadOwnedJob(runtime, pathParameters?.['jobId'], clientId);
          if (isResponse(owned)) return owned;
          const { reason } = parseBody(cancelSchema, event);
          const job = await runtime.pipeline.cancel(owned.id, reason);
          log.info('job_cancelled', { jobId: job.id, from: owned.stage });
          return json(200, toStatusResponse(job));
        }
        break;
      }
      case 'GET': {
        if (resource === '/') {
          const healthy = await runtime.store.healthCheck();
          return json(200, {
            status: healthy ? 'healthy' : 'down',
            version: API_VERSION,
            timestamp: new Date().toISOString(),
            database: healthy ? 'connected' : 'disconnected'
          });
        }

        if (resource === '/jobs') {
          if (!clientId) return json(401, errorBody('UNAUTHORIZED', 'An API key is required'));
          const stage = event.queryStringParameters?.['stage'];
          if (stage !== undefined && !isJobStage(stage)) {
            return json(400, errorBody('VALIDATION_ERROR', `Unknown stage ${stage}`));
          }
          const limitParam = event.queryStringParameters?.['limit'];
          const limit = limitParam === undefined ? 20 : Number(limitParam);
          if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
            return json(400, errorBody('VALIDATION_ERROR', 'limit must be an integer between 1 and 100'));
          }
          const jobs = await runtime.store.listByOwner(clientId, { limit, ...(stage ? { stage } : {}) });
          return json(200, { jobs: jobs.map(toStatusResponse) });
        }

        if (resource === '/jobs/{jobId}') {
          const owned = await loadOwnedJob(runtime, pathParameters?.['jobId'], clientId);
          return isResponse(owned) ? owned : json(200, toJobResponse(owned));
        }

        if (resource === '/jobs/{jobId}/status') {
          const owned = await loadOwnedJob(runtime, pathParameters?.['jobId'], clientId);
          return isResponse(owned) ? owned : json(200, toStatusResponse(owned));
        }

        if (resource === '/jobs/{jobId}/events') {
          const owned = await loadOwnedJob(runtime, pathParameters?.['jobId'], clientId);
          if (isResponse(owned)) return owned;
          const query = parseInput(eventsQuerySchema, event.queryStringParameters ?? {}, 'Invalid query');
          const next = await nextEvent(runtime, owned.id, query.after, query.wait_ms);
          return json(200, {
            id: owned.id,
            events: next ? [toEventResponse(next)] : [],
            terminal: isTerminalStage(next?.stage ?? owned.stage)
          });
        }
        break;
      }
      default:
        return json(405, errorBody('METHOD_NOT_ALLOWED', `HTTP ${httpMethod} not supported`));
    }

    return json(404, errorBody('NOT_FOUND', 'Endpoint not found'));
  } catch (error) {
    if (error instanceof BadRequest || error instanceof UploadRejectedError) {
      return json(400, errorBody('VALIDATION_ERROR', error.message));
    }
    if (error instanceof InvalidTransitionError) {
      return json(409, errorBody('CONFLICT', `Job is already ${error.from}`));
    }
    if (isPipelineError(error) && error.retryable) {
      log.warn('request_unavailable', { error });
      return json(503, errorBody('SERVICE_UNAVAILABLE', 'Temporarily unavailable, retry later'), { 'Retry-After': '5' });
    }
    log.error('request_failed', { error });
    return json(500, errorBody('INTERNAL_SERVER_ERROR', 'An error occurred processing your request'));
  } finally {
    // The shared runtime outlives the invocation; never close it here, but
    // make sure this request's status events left the process
    await runtime?.relay?.flush();
    log.info('request_completed', { duration_ms: Date.now() - start });
  }
};

/**
 * Standard JSON response with CORS headers.
 *
 * @example
 * ```typescript
 * return json(404, errorBody('NOT_FOUND', 'Job not found'));
 * ```
 */
function json(statusCode: number, body: unknown, headers: Record<string, string> = {}): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      'Access-Control-Allow-Origin': '*',
      'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
      'Access-Control-Allow-Headers': 'Content-Type,X-Api-Key,Authorization',
      ...headers
    },
    body: JSON.stringify(body)
  };
}

function errorBody(error_code: string, message: string) {
  return { error_code, message };
}

function isUuid(id: string): boolean {
  return /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i.test(id);
}
